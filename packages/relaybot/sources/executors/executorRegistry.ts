import { getLogger } from "../log.js";
import type { ExecutorLayer } from "../settings.js";
import { AvailabilityCache } from "./availabilityCache.js";
import { ExecutorNotAvailableError } from "./executorNotAvailableError.js";
import type { Executor, ExecutorMetadata } from "./executorTypes.js";

const logger = getLogger("executors.registry");

export type ExecutorRegistryOptions = {
    /** Metadata loaded from the executor config file. */
    metadata?: Iterable<ExecutorMetadata>;
};

/**
 * Holds registered executors per layer and memoizes their availability.
 * At most one executor exists per (provider, layer); the last registration wins.
 */
export class ExecutorRegistry {
    private apiExecutors = new Map<string, Executor>();
    private cliExecutors = new Map<string, Executor>();
    private metadata = new Map<string, ExecutorMetadata>();
    private availability = new AvailabilityCache();

    constructor(options: ExecutorRegistryOptions = {}) {
        for (const entry of options.metadata ?? []) {
            this.metadata.set(registryKey(entry.provider, entry.layer), entry);
        }
    }

    registerApiExecutor(provider: string, executor: Executor, metadata?: ExecutorMetadata): void {
        this.register(provider, "api", executor, metadata);
    }

    registerCliExecutor(provider: string, executor: Executor, metadata?: ExecutorMetadata): void {
        this.register(provider, "cli", executor, metadata);
    }

    /**
     * Returns the executor for a pair or throws ExecutorNotAvailableError.
     * Expects: availability is probed at most once per pair until clearAvailabilityCache().
     */
    async getExecutor(provider: string, layer: ExecutorLayer): Promise<Executor> {
        const executor = this.executorsFor(layer).get(provider);
        if (!executor) {
            throw new ExecutorNotAvailableError(provider, layer, "Executor not registered");
        }
        const available = await this.availability.resolve(registryKey(provider, layer), () => executor.isAvailable());
        if (!available) {
            throw new ExecutorNotAvailableError(provider, layer, this.unavailableReason(provider, layer));
        }
        return executor;
    }

    async isExecutorAvailable(provider: string, layer: ExecutorLayer): Promise<boolean> {
        try {
            await this.getExecutor(provider, layer);
            return true;
        } catch (error) {
            if (error instanceof ExecutorNotAvailableError) {
                return false;
            }
            throw error;
        }
    }

    /**
     * Lists reachable executors as `provider/layer`, api before cli, in registration order.
     */
    async listAvailableExecutors(layer?: ExecutorLayer): Promise<string[]> {
        const layers: ExecutorLayer[] = layer ? [layer] : ["api", "cli"];
        const available: string[] = [];
        for (const current of layers) {
            for (const provider of this.executorsFor(current).keys()) {
                if (await this.isExecutorAvailable(provider, current)) {
                    available.push(`${provider}/${current}`);
                }
            }
        }
        return available;
    }

    /** Lists every registered pair regardless of availability. */
    listRegistered(): Array<{ provider: string; layer: ExecutorLayer }> {
        return [
            ...[...this.apiExecutors.keys()].map((provider) => ({ provider, layer: "api" as const })),
            ...[...this.cliExecutors.keys()].map((provider) => ({ provider, layer: "cli" as const }))
        ];
    }

    getExecutorMetadata(provider: string, layer: ExecutorLayer): ExecutorMetadata | null {
        return this.metadata.get(registryKey(provider, layer)) ?? null;
    }

    clearAvailabilityCache(): void {
        this.availability.clear();
    }

    private register(provider: string, layer: ExecutorLayer, executor: Executor, metadata?: ExecutorMetadata): void {
        this.executorsFor(layer).set(provider, executor);
        if (metadata) {
            this.metadata.set(registryKey(provider, layer), metadata);
        }
        logger.info({ provider, layer, name: metadata?.name }, "register: Executor registered");
    }

    private executorsFor(layer: ExecutorLayer): Map<string, Executor> {
        return layer === "api" ? this.apiExecutors : this.cliExecutors;
    }

    private unavailableReason(provider: string, layer: ExecutorLayer): string {
        const metadata = this.getExecutorMetadata(provider, layer);
        if (metadata && metadata.configRequired.length > 0) {
            return `Missing required configuration: ${metadata.configRequired.join(", ")}`;
        }
        return layer === "api"
            ? "API key not configured or invalid"
            : "CLI tool not installed or target directory not accessible";
    }
}

function registryKey(provider: string, layer: string): string {
    return `${provider}_${layer}`;
}

import path from "node:path";

import { configLoad } from "../config/configLoad.js";
import { ExecutorNotAvailableError } from "../executors/executorNotAvailableError.js";
import { ExecutorRegistry } from "../executors/executorRegistry.js";
import { executorsRegister } from "../executors/executorsRegister.js";
import { DEFAULT_SETTINGS_PATH, type ExecutorLayer } from "../settings.js";

export type ExecutorsCommandOptions = {
    settings?: string;
    json?: boolean;
};

export type ExecutorStatus = {
    provider: string;
    layer: ExecutorLayer;
    name: string;
    prefixes: string[];
    available: boolean;
    reason: string | null;
};

/**
 * Prints every registered executor with its availability.
 */
export async function executorsCommand(options: ExecutorsCommandOptions): Promise<void> {
    const settingsPath = path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH);
    const config = await configLoad(settingsPath);
    const registry = new ExecutorRegistry();
    await executorsRegister(registry, config);
    const statuses = await executorsStatusList(registry);

    if (options.json) {
        console.log(JSON.stringify(statuses, null, 2));
        return;
    }
    console.log("\nExecutors:");
    console.log("─".repeat(60));
    for (const status of statuses) {
        const pair = `${status.provider}/${status.layer}`.padEnd(12);
        const state = status.available ? "available" : `unavailable (${status.reason ?? "unknown"})`;
        const prefixes = status.prefixes.length > 0 ? ` [${status.prefixes.join(", ")}]` : "";
        console.log(`  ${pair} ${status.name}${prefixes}: ${state}`);
    }
}

export async function executorsStatusList(registry: ExecutorRegistry): Promise<ExecutorStatus[]> {
    const statuses: ExecutorStatus[] = [];
    for (const { provider, layer } of registry.listRegistered()) {
        const metadata = registry.getExecutorMetadata(provider, layer);
        let reason: string | null = null;
        try {
            await registry.getExecutor(provider, layer);
        } catch (error) {
            if (!(error instanceof ExecutorNotAvailableError)) {
                throw error;
            }
            reason = error.reason;
        }
        statuses.push({
            provider,
            layer,
            name: metadata?.name ?? `${provider} ${layer}`,
            prefixes: metadata?.commandPrefixes ?? [],
            available: reason === null,
            reason
        });
    }
    return statuses;
}

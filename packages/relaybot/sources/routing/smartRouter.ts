import { ExecutorNotAvailableError } from "../executors/executorNotAvailableError.js";
import type { ExecutorRegistry } from "../executors/executorRegistry.js";
import type { Executor } from "../executors/executorTypes.js";
import { getLogger } from "../log.js";
import { KNOWN_PROVIDERS, type ExecutorLayer } from "../settings.js";
import { cliKeywordsDetect } from "./cliKeywordsDetect.js";
import { IntentClassifier } from "./intent/intentClassifier.js";
import type { IntentClassification } from "./intent/intentTypes.js";
import type { ParsedCommand } from "./routingTypes.js";

const logger = getLogger("routing.router");

const CLASSIFIER_PROVIDERS = ["openai", "gemini", "claude"];
const CLI_PROVIDERS = ["claude", "gemini"];
const NO_CLI_REASON =
    "No CLI executor configured. Install Claude Code CLI or Gemini CLI and configure TARGET_PROJECT_DIR.";

export type IntentClassify = {
    classify(message: string): Promise<IntentClassification>;
};

export type SmartRouterOptions = {
    defaultProvider?: string;
    defaultLayer?: ExecutorLayer;
    /** When null the first available CLI provider is used. */
    defaultCliProvider?: string | null;
    useAiIntentClassification?: boolean;
    classifierBuild?: (executor: Executor) => IntentClassify;
};

export type RouteResult = {
    executor: Executor;
    provider: string;
    layer: ExecutorLayer;
    fallback: boolean;
};

/**
 * Chooses an executor per message: explicit prefix first, then intent, then the fallback cascade.
 * Holds no per-message state; only the lazily built classifier is kept.
 */
export class SmartRouter {
    readonly defaultProvider: string;
    readonly defaultLayer: ExecutorLayer;
    readonly defaultCliProvider: string | null;
    readonly useAiIntentClassification: boolean;
    private readonly registry: ExecutorRegistry;
    private readonly classifierBuild: (executor: Executor) => IntentClassify;
    private classifier: IntentClassify | null = null;

    constructor(registry: ExecutorRegistry, options: SmartRouterOptions = {}) {
        this.registry = registry;
        this.defaultProvider = options.defaultProvider ?? "claude";
        this.defaultLayer = options.defaultLayer ?? "api";
        this.defaultCliProvider = options.defaultCliProvider ?? null;
        this.useAiIntentClassification = options.useAiIntentClassification ?? true;
        this.classifierBuild =
            options.classifierBuild ?? ((executor) => new IntentClassifier(executor, { useCache: true }));
        logger.info(
            {
                defaultProvider: this.defaultProvider,
                defaultLayer: this.defaultLayer,
                defaultCliProvider: this.defaultCliProvider ?? "auto-detect",
                aiIntent: this.useAiIntentClassification
            },
            "init: Router ready"
        );
    }

    async route(parsed: ParsedCommand): Promise<Executor> {
        const result = await this.routeResolve(parsed);
        return result.executor;
    }

    /**
     * Resolves the executor along with the pair it was selected for.
     * Throws ExecutorNotAvailableError when nothing in the cascade is reachable.
     */
    async routeResolve(parsed: ParsedCommand): Promise<RouteResult> {
        if (parsed.explicit) {
            logger.info({ provider: parsed.provider, layer: parsed.layer }, "route: Explicit prefix");
            return this.selectOrFallback(parsed.provider, parsed.layer);
        }

        const needsCli = await this.needsCliResolve(parsed.message);
        if (!needsCli) {
            logger.info({ provider: this.defaultProvider, layer: this.defaultLayer }, "route: Using defaults");
            return this.selectOrFallback(this.defaultProvider, this.defaultLayer);
        }

        const provider = this.defaultCliProvider ?? (await this.cliProviderDetect());
        if (!provider) {
            logger.error("route: No CLI executor available");
            throw new ExecutorNotAvailableError("cli", "cli", NO_CLI_REASON);
        }
        logger.info({ provider, layer: "cli" }, "route: Intent needs CLI");
        return this.selectOrFallback(provider, "cli");
    }

    private async selectOrFallback(provider: string, layer: ExecutorLayer): Promise<RouteResult> {
        try {
            const executor = await this.registry.getExecutor(provider, layer);
            return { executor, provider, layer, fallback: false };
        } catch (error) {
            if (!(error instanceof ExecutorNotAvailableError)) {
                throw error;
            }
            logger.warn({ provider, layer, reason: error.reason }, "route: Executor unavailable, trying fallback");
            return this.fallback(provider, layer);
        }
    }

    private async fallback(provider: string, layer: ExecutorLayer): Promise<RouteResult> {
        const otherLayer: ExecutorLayer = layer === "api" ? "cli" : "api";
        const alternatives = KNOWN_PROVIDERS.filter((candidate) => candidate !== provider);
        const attempts: Array<{ provider: string; layer: ExecutorLayer }> = [
            { provider, layer: otherLayer },
            ...alternatives.map((candidate) => ({ provider: candidate, layer })),
            ...alternatives.map((candidate) => ({ provider: candidate, layer: otherLayer }))
        ];

        for (const attempt of attempts) {
            if (!(await this.registry.isExecutorAvailable(attempt.provider, attempt.layer))) {
                logger.debug(attempt, "fallback: Candidate unavailable");
                continue;
            }
            const executor = await this.registry.getExecutor(attempt.provider, attempt.layer);
            logger.warn(
                { from: `${provider}/${layer}`, to: `${attempt.provider}/${attempt.layer}` },
                "fallback: Using alternative executor"
            );
            return { executor, provider: attempt.provider, layer: attempt.layer, fallback: true };
        }

        logger.error({ provider, layer }, "fallback: All alternatives exhausted");
        throw new ExecutorNotAvailableError(
            provider,
            layer,
            `No executor available. Tried: ${provider}/${layer}, ${provider}/${otherLayer}, and all alternative providers.`
        );
    }

    private async needsCliResolve(message: string): Promise<boolean> {
        if (!this.useAiIntentClassification) {
            return cliKeywordsDetect(message);
        }
        const classifier = await this.classifierResolve();
        if (!classifier) {
            logger.warn("route: No API executor for intent classification, using keywords");
            return cliKeywordsDetect(message);
        }
        let classification: IntentClassification;
        try {
            classification = await classifier.classify(message);
        } catch (error) {
            logger.warn({ error }, "route: Intent classification failed, using keywords");
            return cliKeywordsDetect(message);
        }
        logger.info(
            {
                needsCli: classification.needsCli,
                confidence: classification.confidence,
                category: classification.category
            },
            "route: Intent classified"
        );
        return classification.needsCli;
    }

    private async classifierResolve(): Promise<IntentClassify | null> {
        if (this.classifier) {
            return this.classifier;
        }
        for (const provider of CLASSIFIER_PROVIDERS) {
            if (await this.registry.isExecutorAvailable(provider, "api")) {
                const executor = await this.registry.getExecutor(provider, "api");
                logger.debug({ provider }, "route: Intent classifier backend selected");
                this.classifier = this.classifierBuild(executor);
                return this.classifier;
            }
        }
        return null;
    }

    private async cliProviderDetect(): Promise<string | null> {
        for (const provider of CLI_PROVIDERS) {
            if (await this.registry.isExecutorAvailable(provider, "cli")) {
                logger.info({ provider }, "route: Auto-detected CLI provider");
                return provider;
            }
        }
        return null;
    }
}

import { getLogger } from "../../log.js";
import type { Executor } from "../../executors/executorTypes.js";
import { intentKeywordClassify } from "./intentKeywordClassify.js";
import { intentPromptBuild } from "./intentPromptBuild.js";
import { intentResponseParse } from "./intentResponseParse.js";
import type { IntentClassification, IntentStrategy } from "./intentTypes.js";

const logger = getLogger("routing.intent");

const CLASSIFY_TEMPERATURE = 0.1;
const CLASSIFY_MAX_TOKENS = 200;

export type IntentClassifierOptions = {
    useCache?: boolean;
    promptBuild?: (message: string) => Promise<string>;
};

/**
 * Decides whether a message needs the CLI layer.
 * Tries the cache, then the model, then keyword search; never throws.
 */
export class IntentClassifier {
    private readonly executor: Executor | null;
    private readonly cache = new Map<string, IntentClassification>();
    private readonly useCache: boolean;
    private readonly promptBuild: (message: string) => Promise<string>;
    private readonly strategies: IntentStrategy[];

    constructor(executor: Executor | null, options: IntentClassifierOptions = {}) {
        this.executor = executor;
        this.useCache = options.useCache ?? true;
        this.promptBuild = options.promptBuild ?? intentPromptBuild;
        this.strategies = [
            { name: "cache", classify: async (message) => this.cacheLookup(message) },
            { name: "ai", classify: (message) => this.aiClassify(message) }
        ];
    }

    async classify(message: string): Promise<IntentClassification> {
        for (const strategy of this.strategies) {
            const result = await strategy.classify(message);
            if (result) {
                logger.debug(
                    { strategy: strategy.name, needsCli: result.needsCli, category: result.category },
                    "classify: Strategy answered"
                );
                return result;
            }
        }
        const fallback = intentKeywordClassify(message);
        logger.info({ needsCli: fallback.needsCli, category: fallback.category }, "classify: Keyword fallback");
        return fallback;
    }

    clearCache(): void {
        this.cache.clear();
        logger.info("classify: Cache cleared");
    }

    private cacheLookup(message: string): IntentClassification | null {
        if (!this.useCache) {
            return null;
        }
        return this.cache.get(message) ?? null;
    }

    private async aiClassify(message: string): Promise<IntentClassification | null> {
        if (!this.executor) {
            return null;
        }
        try {
            const prompt = await this.promptBuild(message);
            const result = await this.executor.execute(prompt, undefined, {
                temperature: CLASSIFY_TEMPERATURE,
                maxTokens: CLASSIFY_MAX_TOKENS
            });
            if (!result.success) {
                logger.warn({ error: result.errorMessage }, "classify: Model call failed");
                return null;
            }
            const classification = intentResponseParse(result.stdout.trim());
            if (classification && this.useCache) {
                this.cache.set(message, classification);
            }
            if (classification) {
                logger.info(
                    {
                        needsCli: classification.needsCli,
                        confidence: classification.confidence,
                        category: classification.category
                    },
                    "classify: Model classification"
                );
            }
            return classification;
        } catch (error) {
            logger.warn({ error }, "classify: Model classification threw, falling back");
            return null;
        }
    }
}

import { getLogger } from "../../log.js";
import type { KnownProvider } from "../../settings.js";
import type { SessionMessage } from "../../sessions/sessionTypes.js";
import { sessionHistoryFormat } from "../../sessions/sessionHistoryFormat.js";
import { executionFailureBuild, executionSuccessBuild } from "../executionResultBuild.js";
import type { ExecutionResult, Executor, ExecutorParams } from "../executorTypes.js";
import { type ApiCompletionRun, apiCompletionRun } from "./apiCompletionRun.js";

const logger = getLogger("executors.api");

const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_TIMEOUT_SECONDS = 600;

const API_PROVIDERS: Record<KnownProvider, { libraryProvider: string; defaultModel: string }> = {
    claude: { libraryProvider: "anthropic", defaultModel: "claude-sonnet-4-5" },
    gemini: { libraryProvider: "google", defaultModel: "gemini-2.5-flash" },
    openai: { libraryProvider: "openai", defaultModel: "gpt-4o" }
};

export type ApiExecutorOptions = {
    provider: KnownProvider;
    apiKey: string | null;
    model?: string | null;
    baseUrl?: string | null;
    timeoutSeconds?: number;
    completionRun?: ApiCompletionRun;
};

/**
 * Executor backed by a hosted model API. Available when an API key is configured.
 * Conversation history is passed as system context ahead of the prompt.
 */
export class ApiExecutor implements Executor {
    readonly provider: KnownProvider;
    readonly model: string;
    private readonly apiKey: string | null;
    private readonly baseUrl: string | null;
    private readonly timeoutSeconds: number;
    private readonly completionRun: ApiCompletionRun;

    constructor(options: ApiExecutorOptions) {
        this.provider = options.provider;
        this.model = options.model ?? API_PROVIDERS[options.provider].defaultModel;
        this.apiKey = options.apiKey;
        this.baseUrl = options.baseUrl ?? null;
        this.timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
        this.completionRun = options.completionRun ?? apiCompletionRun;
    }

    providerName(): string {
        return `${this.provider}-api`;
    }

    async isAvailable(): Promise<boolean> {
        return Boolean(this.apiKey);
    }

    async execute(
        prompt: string,
        history?: readonly SessionMessage[],
        params: ExecutorParams = {}
    ): Promise<ExecutionResult> {
        const startedAt = Date.now();
        const elapsed = () => (Date.now() - startedAt) / 1000;
        if (!this.apiKey) {
            return executionFailureBuild(`${this.providerName()} API key not configured`, 0);
        }

        const signal = AbortSignal.timeout(this.timeoutSeconds * 1000);
        logger.info({ provider: this.providerName(), model: this.model }, "execute: Calling model API");
        try {
            const response = await this.completionRun({
                provider: API_PROVIDERS[this.provider].libraryProvider,
                modelId: this.model,
                apiKey: this.apiKey,
                baseUrl: this.baseUrl,
                systemPrompt: systemPromptBuild(params.systemPrompt, history),
                prompt,
                temperature: params.temperature,
                maxTokens: params.maxTokens ?? DEFAULT_MAX_TOKENS,
                signal
            });
            if (response.stopReason === "error" || response.stopReason === "aborted") {
                const message = signal.aborted
                    ? this.timeoutMessage()
                    : (response.errorMessage ?? `Request ended with ${response.stopReason}`);
                logger.warn({ provider: this.providerName(), stopReason: response.stopReason }, "execute: Model API failed");
                return executionFailureBuild(message, elapsed());
            }
            logger.info(
                { provider: this.providerName(), seconds: elapsed(), length: response.text.length },
                "execute: Model API completed"
            );
            return executionSuccessBuild(response.text, elapsed());
        } catch (error) {
            logger.warn({ provider: this.providerName(), error }, "execute: Model API threw");
            const message = signal.aborted
                ? this.timeoutMessage()
                : `${this.providerName()} request failed: ${error instanceof Error ? error.message : String(error)}`;
            return executionFailureBuild(message, elapsed(), error instanceof Error ? error.message : "");
        }
    }

    private timeoutMessage(): string {
        return `${this.providerName()} request timed out after ${this.timeoutSeconds}s`;
    }
}

function systemPromptBuild(systemPrompt: string | undefined, history: readonly SessionMessage[] | undefined): string | undefined {
    const parts = [systemPrompt ?? "", sessionHistoryFormat(history ?? [])].filter((part) => part.length > 0);
    return parts.length > 0 ? parts.join("\n\n") : undefined;
}

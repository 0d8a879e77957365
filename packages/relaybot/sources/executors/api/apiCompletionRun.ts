import { type Api, type AssistantMessage, complete, getModel, type Model } from "@mariozechner/pi-ai";

export type ApiCompletionRequest = {
    /** Inference library provider id, such as anthropic or google. */
    provider: string;
    modelId: string;
    apiKey: string;
    baseUrl: string | null;
    systemPrompt: string | undefined;
    prompt: string;
    temperature?: number;
    maxTokens?: number;
    signal: AbortSignal;
};

export type ApiCompletionResponse = {
    text: string;
    stopReason: string;
    errorMessage: string | null;
};

export type ApiCompletionRun = (request: ApiCompletionRequest) => Promise<ApiCompletionResponse>;

/**
 * Sends one user turn through the multi-provider inference library.
 * Expects: the model id is known to the library for the provider.
 */
export async function apiCompletionRun(request: ApiCompletionRequest): Promise<ApiCompletionResponse> {
    const known = getModel(request.provider as never, request.modelId as never);
    if (!known) {
        throw new Error(`Unknown ${request.provider} model: ${request.modelId}`);
    }
    const base = known as Model<Api>;
    const model: Model<Api> = request.baseUrl ? { ...base, baseUrl: request.baseUrl } : base;

    const message = await complete(
        model,
        {
            systemPrompt: request.systemPrompt,
            messages: [{ role: "user", content: request.prompt, timestamp: Date.now() }]
        },
        {
            apiKey: request.apiKey,
            temperature: request.temperature,
            maxTokens: request.maxTokens,
            signal: request.signal
        }
    );

    return {
        text: assistantTextExtract(message),
        stopReason: message.stopReason,
        errorMessage: message.errorMessage ?? null
    };
}

function assistantTextExtract(message: AssistantMessage): string {
    const parts: string[] = [];
    for (const block of message.content) {
        if (block.type === "text") {
            parts.push(block.text);
        }
    }
    return parts.join("");
}

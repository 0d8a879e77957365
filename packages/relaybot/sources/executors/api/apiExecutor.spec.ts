import { describe, expect, it, vi } from "vitest";

import type { ApiCompletionRequest, ApiCompletionResponse } from "./apiCompletionRun.js";
import { ApiExecutor } from "./apiExecutor.js";

function completionRunBuild(response: ApiCompletionResponse | Error) {
    return vi.fn(async (_request: ApiCompletionRequest): Promise<ApiCompletionResponse> => {
        if (response instanceof Error) {
            throw response;
        }
        return response;
    });
}

describe("ApiExecutor", () => {
    it("is available only with an api key", async () => {
        await expect(new ApiExecutor({ provider: "claude", apiKey: "test-secret" }).isAvailable()).resolves.toBe(true);
        await expect(new ApiExecutor({ provider: "claude", apiKey: null }).isAvailable()).resolves.toBe(false);
        await expect(new ApiExecutor({ provider: "claude", apiKey: "" }).isAvailable()).resolves.toBe(false);
    });

    it("names itself after the provider and layer", () => {
        expect(new ApiExecutor({ provider: "gemini", apiKey: null }).providerName()).toBe("gemini-api");
    });

    it("maps providers to the inference library and forwards parameters", async () => {
        const completionRun = completionRunBuild({ text: "answer", stopReason: "stop", errorMessage: null });
        const executor = new ApiExecutor({
            provider: "openai",
            apiKey: "test-secret",
            model: "gpt-4o-mini",
            baseUrl: "http://localhost:8080/v1",
            completionRun
        });

        const result = await executor.execute(
            "What is 2+2?",
            [
                { role: "user", content: "hi", timestamp: 1 },
                { role: "assistant", content: "hello", timestamp: 2 }
            ],
            { temperature: 0.3, maxTokens: 100, systemPrompt: "Be brief." }
        );

        expect(result).toMatchObject({ success: true, stdout: "answer", stderr: "", errorMessage: null });
        const request = completionRun.mock.calls[0]?.[0];
        expect(request).toMatchObject({
            provider: "openai",
            modelId: "gpt-4o-mini",
            apiKey: "test-secret",
            baseUrl: "http://localhost:8080/v1",
            prompt: "What is 2+2?",
            temperature: 0.3,
            maxTokens: 100,
            systemPrompt: "Be brief.\n\nPrevious conversation:\nUser: hi\nAssistant: hello"
        });
    });

    it("uses default models and output cap", async () => {
        const completionRun = completionRunBuild({ text: "ok", stopReason: "stop", errorMessage: null });
        const executor = new ApiExecutor({ provider: "claude", apiKey: "test-secret", completionRun });

        await executor.execute("hi");

        expect(completionRun.mock.calls[0]?.[0]).toMatchObject({
            provider: "anthropic",
            modelId: "claude-sonnet-4-5",
            maxTokens: 4096,
            systemPrompt: undefined,
            baseUrl: null
        });
    });

    it("turns error stop reasons into failed results", async () => {
        const executor = new ApiExecutor({
            provider: "gemini",
            apiKey: "test-secret",
            completionRun: completionRunBuild({ text: "", stopReason: "error", errorMessage: "quota exceeded" })
        });

        const result = await executor.execute("hi");

        expect(result).toMatchObject({ success: false, stdout: "", errorMessage: "quota exceeded" });
    });

    it("turns thrown errors into failed results", async () => {
        const executor = new ApiExecutor({
            provider: "claude",
            apiKey: "test-secret",
            completionRun: completionRunBuild(new Error("connect ECONNREFUSED"))
        });

        const result = await executor.execute("hi");

        expect(result).toMatchObject({
            success: false,
            stdout: "",
            stderr: "connect ECONNREFUSED",
            errorMessage: "claude-api request failed: connect ECONNREFUSED"
        });
    });

    it("fails without calling the api when no key is configured", async () => {
        const completionRun = completionRunBuild({ text: "never", stopReason: "stop", errorMessage: null });
        const executor = new ApiExecutor({ provider: "openai", apiKey: null, completionRun });

        const result = await executor.execute("hi");

        expect(result).toEqual({
            success: false,
            stdout: "",
            stderr: "",
            errorMessage: "openai-api API key not configured",
            executionTimeSeconds: 0
        });
        expect(completionRun).not.toHaveBeenCalled();
    });
});

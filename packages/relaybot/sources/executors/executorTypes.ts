import type { ExecutorLayer } from "../settings.js";
import type { SessionMessage } from "../sessions/sessionTypes.js";

export type ExecutorParams = {
    temperature?: number;
    maxTokens?: number;
    systemPrompt?: string;
    /** CLI executors receive the user id instead of history. */
    userId?: string;
};

export type ExecutionSuccess = {
    success: true;
    stdout: string;
    stderr: string;
    errorMessage: null;
    executionTimeSeconds: number;
};

export type ExecutionFailure = {
    success: false;
    stdout: "";
    stderr: string;
    errorMessage: string;
    executionTimeSeconds: number;
};

export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

/**
 * A backend that answers prompts, identified in the registry by (provider, layer).
 * execute never throws; failures come back as a failed ExecutionResult.
 */
export interface Executor {
    execute(prompt: string, history?: readonly SessionMessage[], params?: ExecutorParams): Promise<ExecutionResult>;
    isAvailable(): Promise<boolean>;
    providerName(): string;
}

export type ExecutorMetadata = {
    name: string;
    provider: string;
    layer: ExecutorLayer;
    version: string;
    description: string;
    capabilities: string[];
    commandPrefixes: string[];
    priority: number;
    configRequired: string[];
};

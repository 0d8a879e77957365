/**
 * Raised when a (provider, layer) executor is missing or reports itself unavailable.
 */
export class ExecutorNotAvailableError extends Error {
    readonly provider: string;
    readonly layer: string;
    readonly reason: string;

    constructor(provider: string, layer: string, reason: string, options?: { cause?: unknown }) {
        super(`Executor ${provider}/${layer} not available: ${reason}`, { cause: options?.cause });
        this.name = "ExecutorNotAvailableError";
        this.provider = provider;
        this.layer = layer;
        this.reason = reason;
    }
}

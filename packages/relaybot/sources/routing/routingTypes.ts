import type { ExecutorLayer } from "../settings.js";

export type ParsedCommand = Readonly<{
    provider: string;
    layer: ExecutorLayer;
    message: string;
    /** True when the message started with a provider prefix such as `@gemini-cli`. */
    explicit: boolean;
}>;

export type CommandPrefix = Readonly<{
    prefix: string;
    provider: string;
    layer: ExecutorLayer;
}>;

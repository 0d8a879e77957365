import type { CommandPrefix } from "./routingTypes.js";

export const COMMAND_PREFIXES: readonly CommandPrefix[] = [
    { prefix: "@claude-api", provider: "claude", layer: "api" },
    { prefix: "@claude", provider: "claude", layer: "api" },
    { prefix: "@gemini-api", provider: "gemini", layer: "api" },
    { prefix: "@gemini", provider: "gemini", layer: "api" },
    { prefix: "@openai", provider: "openai", layer: "api" },
    { prefix: "@gpt", provider: "openai", layer: "api" },
    { prefix: "@claude-cli", provider: "claude", layer: "cli" },
    { prefix: "@code", provider: "claude", layer: "cli" },
    { prefix: "@gemini-cli", provider: "gemini", layer: "cli" }
];

/**
 * Returns prefixes ordered longest first so `@claude-cli` is tried before `@claude`.
 */
export function commandPrefixesSorted(prefixes: readonly CommandPrefix[] = COMMAND_PREFIXES): CommandPrefix[] {
    return [...prefixes].sort((left, right) => right.prefix.length - left.prefix.length);
}

/**
 * Lists the prefixes that select a provider/layer pair, in table order.
 */
export function commandPrefixesFor(provider: string, layer: string): string[] {
    return COMMAND_PREFIXES.filter((entry) => entry.provider === provider && entry.layer === layer).map(
        (entry) => entry.prefix
    );
}

import { getLogger } from "../log.js";
import { commandPrefixesSorted } from "./commandPrefixes.js";
import type { ParsedCommand } from "./routingTypes.js";

const logger = getLogger("routing.command");
const SORTED_PREFIXES = commandPrefixesSorted();

/**
 * Extracts an explicit provider/layer selection from the start of a message.
 * Expects: message is the raw user text; without a prefix it is returned unchanged.
 */
export function commandParse(message: string): ParsedCommand {
    const lowered = message.toLowerCase();
    for (const entry of SORTED_PREFIXES) {
        if (!lowered.startsWith(entry.prefix)) {
            continue;
        }
        const clean = message.slice(entry.prefix.length).trim();
        logger.debug(
            { provider: entry.provider, layer: entry.layer, length: clean.length },
            "parse: Explicit prefix matched"
        );
        return { provider: entry.provider, layer: entry.layer, message: clean, explicit: true };
    }
    return { provider: "claude", layer: "api", message, explicit: false };
}

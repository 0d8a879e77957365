import { z } from "zod";

import { getLogger } from "../../log.js";
import type { IntentClassification } from "./intentTypes.js";

const logger = getLogger("routing.intent");

const responseSchema = z
    .object({
        needs_cli: z.boolean().optional(),
        confidence: z.number().optional(),
        reason: z.string().optional(),
        category: z.string().optional()
    })
    .passthrough();

/**
 * Parses a model reply into a classification, tolerating code fences or prose around the JSON.
 * Returns null when no valid JSON object is found.
 */
export function intentResponseParse(text: string): IntentClassification | null {
    const start = text.indexOf("{");
    const end = text.lastIndexOf("}");
    if (start < 0 || end < start) {
        logger.warn({ length: text.length }, "parse: No JSON object in classification reply");
        return null;
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text.slice(start, end + 1));
    } catch (error) {
        logger.warn({ error }, "parse: Classification reply is not valid JSON");
        return null;
    }

    const parsed = responseSchema.safeParse(raw);
    if (!parsed.success) {
        logger.warn({ issues: parsed.error.issues.length }, "parse: Classification reply has invalid fields");
        return null;
    }

    return {
        needsCli: parsed.data.needs_cli ?? false,
        confidence: confidenceClamp(parsed.data.confidence ?? 0.5),
        reason: parsed.data.reason ?? "AI judgement",
        category: parsed.data.category ?? "unknown"
    };
}

function confidenceClamp(value: number): number {
    if (Number.isNaN(value)) {
        return 0.5;
    }
    return Math.min(1, Math.max(0, value));
}

import { promises as fs } from "node:fs";

import { z } from "zod";

import { getLogger } from "../log.js";
import { EXECUTOR_LAYERS } from "../settings.js";
import type { ExecutorMetadata } from "./executorTypes.js";

const logger = getLogger("executors.metadata");

const metadataEntrySchema = z.object({
    provider: z.string().min(1),
    layer: z.enum(EXECUTOR_LAYERS),
    name: z.string().optional(),
    version: z.string().optional(),
    description: z.string().optional(),
    capabilities: z.array(z.string()).optional(),
    command_prefixes: z.array(z.string()).optional(),
    priority: z.number().optional(),
    config_required: z.array(z.string()).optional()
});

/**
 * Reads executor metadata from a JSON file shaped `{ executors: [...] }`.
 * Malformed entries are skipped; read or parse failures yield an empty list.
 */
export async function executorMetadataLoad(configPath: string): Promise<ExecutorMetadata[]> {
    let raw: unknown;
    try {
        raw = JSON.parse(await fs.readFile(configPath, "utf8"));
    } catch (error) {
        logger.error({ configPath, error }, "load: Failed to read executor metadata");
        return [];
    }
    return executorMetadataParse(raw);
}

export function executorMetadataParse(raw: unknown): ExecutorMetadata[] {
    if (typeof raw !== "object" || raw === null || !("executors" in raw) || !Array.isArray(raw.executors)) {
        return [];
    }
    const entries: ExecutorMetadata[] = [];
    for (const entry of raw.executors) {
        const parsed = metadataEntrySchema.safeParse(entry);
        if (!parsed.success) {
            logger.warn({ issues: parsed.error.issues.length }, "load: Skipped malformed executor entry");
            continue;
        }
        const value = parsed.data;
        entries.push({
            name: value.name ?? `${value.provider} ${value.layer}`,
            provider: value.provider,
            layer: value.layer,
            version: value.version ?? "1.0.0",
            description: value.description ?? "",
            capabilities: value.capabilities ?? [],
            commandPrefixes: value.command_prefixes ?? [],
            priority: value.priority ?? 10,
            configRequired: value.config_required ?? []
        });
    }
    return entries;
}

import { z } from "zod";

import { EXECUTOR_LAYERS, KNOWN_PROVIDERS, type SettingsConfig } from "../settings.js";

/**
 * Parses raw settings data into a validated SettingsConfig.
 * Expects: raw is JSON-compatible and matches the settings schema.
 */
export function configSettingsParse(raw: unknown): SettingsConfig {
    const provider = z.enum(KNOWN_PROVIDERS);
    const layer = z.enum(EXECUTOR_LAYERS);
    const positiveInt = z.number().int().positive();

    const apiProvider = z
        .object({
            apiKey: z.string().min(1).optional(),
            model: z.string().min(1).optional(),
            baseUrl: z.string().url().optional()
        })
        .passthrough();

    const settingsSchema = z
        .object({
            router: z
                .object({
                    defaultProvider: provider.optional(),
                    defaultLayer: layer.optional(),
                    defaultCliProvider: provider.optional(),
                    useAiIntentClassification: z.boolean().optional()
                })
                .passthrough()
                .optional(),
            dedup: z
                .object({
                    cacheSize: positiveInt.optional()
                })
                .passthrough()
                .optional(),
            sessions: z
                .object({
                    storagePath: z.string().min(1).optional(),
                    maxMessages: positiveInt.optional(),
                    timeoutSeconds: positiveInt.optional()
                })
                .passthrough()
                .optional(),
            executors: z
                .object({
                    configPath: z.string().min(1).optional(),
                    timeoutSeconds: positiveInt.optional(),
                    targetDir: z.string().min(1).optional(),
                    claudeCliTargetDir: z.string().min(1).optional(),
                    geminiCliTargetDir: z.string().min(1).optional(),
                    claude: apiProvider.optional(),
                    gemini: apiProvider.optional(),
                    openai: apiProvider.optional()
                })
                .passthrough()
                .optional(),
            assistant: z
                .object({
                    responseLanguage: z.string().min(1).optional()
                })
                .passthrough()
                .optional()
        })
        .passthrough();

    return settingsSchema.parse(raw);
}

import path from "node:path";

import type { ApiProviderSettings, SettingsConfig } from "../settings.js";
import { freezeDeep } from "../util/freezeDeep.js";
import type { Config, ConfigOverrides, ResolvedApiProvider } from "./configTypes.js";

const DEFAULT_CACHE_SIZE = 1000;
const DEFAULT_MAX_MESSAGES = 50;
const DEFAULT_SESSION_TIMEOUT_SECONDS = 86_400;
const DEFAULT_EXECUTOR_TIMEOUT_SECONDS = 600;

/**
 * Resolves derived paths and defaults into an immutable Config snapshot.
 * Expects: settingsPath is absolute; settings already validated.
 */
export function configResolve(settings: SettingsConfig, settingsPath: string, overrides: ConfigOverrides = {}): Config {
    const resolvedSettingsPath = path.resolve(settingsPath);
    const configDir = path.dirname(resolvedSettingsPath);
    const dataDir = path.join(configDir, "data");
    const executors = settings.executors;
    const targetDir = pathOptionalResolve(executors?.targetDir);

    return freezeDeep({
        settingsPath: resolvedSettingsPath,
        configDir,
        dataDir,
        router: {
            defaultProvider: settings.router?.defaultProvider ?? "claude",
            defaultLayer: settings.router?.defaultLayer ?? "api",
            defaultCliProvider: settings.router?.defaultCliProvider ?? null,
            useAiIntentClassification: settings.router?.useAiIntentClassification ?? true
        },
        dedup: {
            cacheSize: settings.dedup?.cacheSize ?? DEFAULT_CACHE_SIZE
        },
        sessions: {
            storagePath: path.resolve(settings.sessions?.storagePath ?? path.join(dataDir, "sessions.json")),
            maxMessages: settings.sessions?.maxMessages ?? DEFAULT_MAX_MESSAGES,
            timeoutSeconds: settings.sessions?.timeoutSeconds ?? DEFAULT_SESSION_TIMEOUT_SECONDS
        },
        executors: {
            configPath: pathOptionalResolve(executors?.configPath),
            timeoutSeconds: executors?.timeoutSeconds ?? DEFAULT_EXECUTOR_TIMEOUT_SECONDS,
            cliTargetDirs: {
                claude: pathOptionalResolve(executors?.claudeCliTargetDir) ?? targetDir,
                gemini: pathOptionalResolve(executors?.geminiCliTargetDir) ?? targetDir
            },
            api: {
                claude: apiProviderResolve(executors?.claude),
                gemini: apiProviderResolve(executors?.gemini),
                openai: apiProviderResolve(executors?.openai)
            }
        },
        assistant: {
            responseLanguage: settings.assistant?.responseLanguage ?? null
        },
        settings: structuredClone(settings),
        verbose: overrides.verbose ?? false
    });
}

function apiProviderResolve(settings: ApiProviderSettings | undefined): ResolvedApiProvider {
    return {
        apiKey: settings?.apiKey ?? null,
        model: settings?.model ?? null,
        baseUrl: settings?.baseUrl ?? null
    };
}

function pathOptionalResolve(value: string | undefined): string | null {
    return value ? path.resolve(value) : null;
}

import { resolveRelaybotPath } from "./paths.js";

export const DEFAULT_SETTINGS_PATH = resolveRelaybotPath("settings.json");

export const KNOWN_PROVIDERS = ["claude", "gemini", "openai"] as const;
export type KnownProvider = (typeof KNOWN_PROVIDERS)[number];

export const EXECUTOR_LAYERS = ["api", "cli"] as const;
export type ExecutorLayer = (typeof EXECUTOR_LAYERS)[number];

export type RouterSettings = {
    defaultProvider?: KnownProvider;
    defaultLayer?: ExecutorLayer;
    /** When unset the router probes available CLI executors. */
    defaultCliProvider?: KnownProvider;
    useAiIntentClassification?: boolean;
};

export type DedupSettings = {
    cacheSize?: number;
};

export type SessionSettings = {
    storagePath?: string;
    maxMessages?: number;
    timeoutSeconds?: number;
};

export type ApiProviderSettings = {
    apiKey?: string;
    model?: string;
    baseUrl?: string;
};

export type ExecutorSettings = {
    /** Optional JSON file with executor metadata entries. */
    configPath?: string;
    timeoutSeconds?: number;
    /** Shared CLI target directory; per-provider directories take precedence. */
    targetDir?: string;
    claudeCliTargetDir?: string;
    geminiCliTargetDir?: string;
    claude?: ApiProviderSettings;
    gemini?: ApiProviderSettings;
    openai?: ApiProviderSettings;
};

export type AssistantSettings = {
    /** Language code such as zh-CN or en-US; unset lets the model decide. */
    responseLanguage?: string;
};

export type SettingsConfig = {
    router?: RouterSettings;
    dedup?: DedupSettings;
    sessions?: SessionSettings;
    executors?: ExecutorSettings;
    assistant?: AssistantSettings;
};

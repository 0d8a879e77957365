import type { KnownProvider, ExecutorLayer, SettingsConfig } from "../settings.js";

export type ResolvedApiProvider = {
    apiKey: string | null;
    model: string | null;
    baseUrl: string | null;
};

export type CliProvider = "claude" | "gemini";

export type Config = {
    settingsPath: string;
    configDir: string;
    dataDir: string;
    router: {
        defaultProvider: KnownProvider;
        defaultLayer: ExecutorLayer;
        defaultCliProvider: KnownProvider | null;
        useAiIntentClassification: boolean;
    };
    dedup: {
        cacheSize: number;
    };
    sessions: {
        storagePath: string;
        maxMessages: number;
        timeoutSeconds: number;
    };
    executors: {
        configPath: string | null;
        timeoutSeconds: number;
        cliTargetDirs: Record<CliProvider, string | null>;
        api: Record<KnownProvider, ResolvedApiProvider>;
    };
    assistant: {
        responseLanguage: string | null;
    };
    settings: SettingsConfig;
    verbose: boolean;
};

export type ConfigOverrides = {
    verbose?: boolean;
};

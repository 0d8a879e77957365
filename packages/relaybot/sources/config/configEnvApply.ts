type EnvBinding = {
    env: string;
    path: string[];
    kind: "string" | "integer" | "boolean";
};

const ENV_BINDINGS: EnvBinding[] = [
    { env: "DEFAULT_PROVIDER", path: ["router", "defaultProvider"], kind: "string" },
    { env: "DEFAULT_LAYER", path: ["router", "defaultLayer"], kind: "string" },
    { env: "DEFAULT_CLI_PROVIDER", path: ["router", "defaultCliProvider"], kind: "string" },
    { env: "USE_AI_INTENT_CLASSIFICATION", path: ["router", "useAiIntentClassification"], kind: "boolean" },
    { env: "CACHE_SIZE", path: ["dedup", "cacheSize"], kind: "integer" },
    { env: "SESSION_STORAGE_PATH", path: ["sessions", "storagePath"], kind: "string" },
    { env: "MAX_SESSION_MESSAGES", path: ["sessions", "maxMessages"], kind: "integer" },
    { env: "SESSION_TIMEOUT", path: ["sessions", "timeoutSeconds"], kind: "integer" },
    { env: "EXECUTORS_CONFIG_PATH", path: ["executors", "configPath"], kind: "string" },
    { env: "AI_TIMEOUT", path: ["executors", "timeoutSeconds"], kind: "integer" },
    { env: "TARGET_PROJECT_DIR", path: ["executors", "targetDir"], kind: "string" },
    { env: "CLAUDE_CLI_TARGET_DIR", path: ["executors", "claudeCliTargetDir"], kind: "string" },
    { env: "GEMINI_CLI_TARGET_DIR", path: ["executors", "geminiCliTargetDir"], kind: "string" },
    { env: "CLAUDE_API_KEY", path: ["executors", "claude", "apiKey"], kind: "string" },
    { env: "GEMINI_API_KEY", path: ["executors", "gemini", "apiKey"], kind: "string" },
    { env: "OPENAI_API_KEY", path: ["executors", "openai", "apiKey"], kind: "string" },
    { env: "OPENAI_BASE_URL", path: ["executors", "openai", "baseUrl"], kind: "string" },
    { env: "OPENAI_MODEL", path: ["executors", "openai", "model"], kind: "string" },
    { env: "RESPONSE_LANGUAGE", path: ["assistant", "responseLanguage"], kind: "string" }
];

/**
 * Overlays deployment environment variables onto raw settings before validation.
 * Values that do not convert are passed through as strings so validation reports them.
 * Expects: raw is the parsed settings JSON; blank variables are ignored.
 */
export function configEnvApply(raw: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
    if (!recordIs(raw)) {
        return raw;
    }
    const result: Record<string, unknown> = structuredClone(raw);
    for (const binding of ENV_BINDINGS) {
        const value = env[binding.env]?.trim();
        if (!value) {
            continue;
        }
        valueAssign(result, binding.path, valueConvert(value, binding.kind));
    }
    return result;
}

function valueConvert(value: string, kind: EnvBinding["kind"]): unknown {
    if (kind === "integer") {
        return /^-?\d+$/.test(value) ? Number.parseInt(value, 10) : value;
    }
    if (kind === "boolean") {
        const normalized = value.toLowerCase();
        if (normalized === "true" || normalized === "1" || normalized === "yes") {
            return true;
        }
        if (normalized === "false" || normalized === "0" || normalized === "no") {
            return false;
        }
        return value;
    }
    return value;
}

function valueAssign(target: Record<string, unknown>, path: string[], value: unknown): void {
    let cursor = target;
    for (const key of path.slice(0, -1)) {
        const next = cursor[key];
        if (recordIs(next)) {
            cursor = next;
            continue;
        }
        const created: Record<string, unknown> = {};
        cursor[key] = created;
        cursor = created;
    }
    const leaf = path[path.length - 1];
    if (leaf !== undefined) {
        cursor[leaf] = value;
    }
}

function recordIs(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

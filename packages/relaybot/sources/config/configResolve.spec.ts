import path from "node:path";

import { describe, expect, it } from "vitest";

import { configResolve } from "./configResolve.js";

describe("configResolve", () => {
    it("applies defaults for an empty settings document", () => {
        const config = configResolve({}, "/tmp/relaybot/settings.json");

        expect(config.configDir).toBe(path.resolve("/tmp/relaybot"));
        expect(config.dataDir).toBe(path.resolve("/tmp/relaybot/data"));
        expect(config.router).toEqual({
            defaultProvider: "claude",
            defaultLayer: "api",
            defaultCliProvider: null,
            useAiIntentClassification: true
        });
        expect(config.dedup.cacheSize).toBe(1000);
        expect(config.sessions).toEqual({
            storagePath: path.resolve("/tmp/relaybot/data/sessions.json"),
            maxMessages: 50,
            timeoutSeconds: 86_400
        });
        expect(config.executors.timeoutSeconds).toBe(600);
        expect(config.executors.configPath).toBeNull();
        expect(config.assistant.responseLanguage).toBeNull();
        expect(config.verbose).toBe(false);
    });

    it("uses the shared target directory when no per-provider directory is set", () => {
        const config = configResolve(
            {
                executors: {
                    targetDir: "/srv/project",
                    geminiCliTargetDir: "/srv/other"
                }
            },
            "/tmp/relaybot/settings.json"
        );

        expect(config.executors.cliTargetDirs).toEqual({
            claude: path.resolve("/srv/project"),
            gemini: path.resolve("/srv/other")
        });
    });

    it("resolves api provider settings with nulls for missing fields", () => {
        const config = configResolve(
            { executors: { openai: { apiKey: "test-secret", model: "gpt-4o" } } },
            "/tmp/relaybot/settings.json"
        );

        expect(config.executors.api.openai).toEqual({ apiKey: "test-secret", model: "gpt-4o", baseUrl: null });
        expect(config.executors.api.claude).toEqual({ apiKey: null, model: null, baseUrl: null });
    });

    it("returns a frozen snapshot", () => {
        const config = configResolve({ router: { defaultLayer: "cli" } }, "/tmp/relaybot/settings.json", {
            verbose: true
        });

        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.router)).toBe(true);
        expect(Object.isFrozen(config.settings.router)).toBe(true);
        expect(config.verbose).toBe(true);
    });
});

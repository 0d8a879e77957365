import { promises as fs } from "node:fs";
import path from "node:path";

import { DEFAULT_SETTINGS_PATH } from "../settings.js";
import { configEnvApply } from "./configEnvApply.js";
import { configResolve } from "./configResolve.js";
import { configSettingsParse } from "./configSettingsParse.js";
import type { Config, ConfigOverrides } from "./configTypes.js";

/**
 * Loads, validates, and resolves the config from disk into an immutable snapshot.
 * Expects: settingsPath points at the JSON settings file; a missing file means defaults.
 */
export async function configLoad(
    settingsPath: string = DEFAULT_SETTINGS_PATH,
    overrides: ConfigOverrides = {},
    env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
    const resolvedPath = path.resolve(settingsPath);
    let raw: unknown = {};

    try {
        const content = await fs.readFile(resolvedPath, "utf8");
        raw = JSON.parse(content);
    } catch (error) {
        if (!errorCodeIs(error, "ENOENT")) {
            throw error;
        }
    }

    const settings = configSettingsParse(configEnvApply(raw, env));
    return configResolve(settings, resolvedPath, overrides);
}

function errorCodeIs(error: unknown, code: string): boolean {
    return error instanceof Error && "code" in error && error.code === code;
}

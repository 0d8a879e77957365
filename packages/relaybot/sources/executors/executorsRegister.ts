import type { CliProvider, Config } from "../config/configTypes.js";
import { getLogger } from "../log.js";
import { commandPrefixesFor } from "../routing/commandPrefixes.js";
import type { ExecutorLayer, KnownProvider } from "../settings.js";
import type { ApiCompletionRun } from "./api/apiCompletionRun.js";
import { ApiExecutor } from "./api/apiExecutor.js";
import { CliExecutor } from "./cli/cliExecutor.js";
import type { CliRun } from "./cli/cliRun.js";
import { executorMetadataLoad } from "./executorMetadataLoad.js";
import type { ExecutorRegistry } from "./executorRegistry.js";
import type { ExecutorMetadata } from "./executorTypes.js";

const logger = getLogger("executors.register");

const API_PROVIDERS: readonly KnownProvider[] = ["claude", "gemini", "openai"];
const CLI_PROVIDERS: readonly CliProvider[] = ["claude", "gemini"];

const DISPLAY_NAMES: Record<string, string> = {
    claude_api: "Claude API",
    gemini_api: "Gemini API",
    openai_api: "OpenAI API",
    claude_cli: "Claude Code CLI",
    gemini_cli: "Gemini CLI"
};

const CAPABILITIES: Record<ExecutorLayer, string[]> = {
    api: ["chat", "reasoning", "history"],
    cli: ["code", "files", "shell"]
};

export type ExecutorsRegisterOptions = {
    apiRun?: ApiCompletionRun;
    cliRun?: CliRun;
};

/**
 * Registers every API and CLI executor with metadata.
 * Entries from the executor metadata file replace the built-in ones for the same pair.
 */
export async function executorsRegister(
    registry: ExecutorRegistry,
    config: Config,
    options: ExecutorsRegisterOptions = {}
): Promise<void> {
    const fileMetadata = new Map<string, ExecutorMetadata>();
    if (config.executors.configPath) {
        for (const entry of await executorMetadataLoad(config.executors.configPath)) {
            fileMetadata.set(`${entry.provider}_${entry.layer}`, entry);
        }
    }
    const metadataFor = (provider: string, layer: ExecutorLayer, configRequired: string[]) =>
        fileMetadata.get(`${provider}_${layer}`) ?? metadataBuild(provider, layer, configRequired);

    for (const provider of API_PROVIDERS) {
        const settings = config.executors.api[provider];
        registry.registerApiExecutor(
            provider,
            new ApiExecutor({
                provider,
                apiKey: settings.apiKey,
                model: settings.model,
                baseUrl: settings.baseUrl,
                timeoutSeconds: config.executors.timeoutSeconds,
                completionRun: options.apiRun
            }),
            metadataFor(provider, "api", [`executors.${provider}.apiKey`])
        );
    }

    for (const provider of CLI_PROVIDERS) {
        registry.registerCliExecutor(
            provider,
            new CliExecutor({
                provider,
                targetDir: config.executors.cliTargetDirs[provider],
                timeoutSeconds: config.executors.timeoutSeconds,
                run: options.cliRun
            }),
            metadataFor(provider, "cli", [`executors.${provider}CliTargetDir`])
        );
    }

    logger.info(
        { api: API_PROVIDERS.length, cli: CLI_PROVIDERS.length, fileEntries: fileMetadata.size },
        "register: Executors registered"
    );
}

function metadataBuild(provider: string, layer: ExecutorLayer, configRequired: string[]): ExecutorMetadata {
    const key = `${provider}_${layer}`;
    return {
        name: DISPLAY_NAMES[key] ?? `${provider} ${layer}`,
        provider,
        layer,
        version: "1.0.0",
        description: layer === "api" ? `${provider} hosted model API` : `${provider} coding CLI in a target directory`,
        capabilities: [...CAPABILITIES[layer]],
        commandPrefixes: commandPrefixesFor(provider, layer),
        priority: layer === "api" ? 1 : 2,
        configRequired
    };
}

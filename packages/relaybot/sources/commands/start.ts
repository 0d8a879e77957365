import path from "node:path";

import { configLoad } from "../config/configLoad.js";
import { ConsoleConnector } from "../connectors/consoleConnector.js";
import { DedupCache } from "../dedup/dedupCache.js";
import { ExecutorRegistry } from "../executors/executorRegistry.js";
import { executorsRegister } from "../executors/executorsRegister.js";
import { getLogger } from "../log.js";
import { MessagePipeline } from "../pipeline/messagePipeline.js";
import { SmartRouter } from "../routing/smartRouter.js";
import { SessionManager } from "../sessions/sessionManager.js";
import { DEFAULT_SETTINGS_PATH } from "../settings.js";
import { awaitShutdown, onShutdown } from "../util/shutdown.js";

const logger = getLogger("command.start");

export type StartOptions = {
    settings?: string;
    verbose?: boolean;
};

export async function startCommand(options: StartOptions): Promise<void> {
    const settingsPath = path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH);
    const config = await configLoad(settingsPath, { verbose: options.verbose ?? false });
    logger.info({ settings: config.settingsPath }, "start: Starting relaybot");

    const registry = new ExecutorRegistry();
    await executorsRegister(registry, config);
    const router = new SmartRouter(registry, config.router);
    const sessions = new SessionManager(config.sessions);
    await sessions.load();

    const connector = new ConsoleConnector();
    const pipeline = new MessagePipeline({
        dedup: new DedupCache(config.dedup.cacheSize),
        router,
        registry,
        sessions,
        reply: (chatId, text) => connector.sendMessage(chatId, text),
        responseLanguage: config.assistant.responseLanguage,
        verbose: config.verbose
    });
    connector.onMessage((message) => pipeline.handle(message));
    onShutdown("console-connector", () => connector.shutdown());

    const available = await registry.listAvailableExecutors();
    if (available.length === 0) {
        logger.warn("start: No executors available; configure an API key or a CLI target directory");
    }
    logger.info({ executors: available.join(", ") }, "ready: Ready. Type a message and press enter.");

    const reason = await Promise.race([connector.start().then(() => "eof" as const), awaitShutdown()]);
    logger.info({ reason }, "event: Stopped");
    process.exit(0);
}

import path from "node:path";

import { configLoad } from "../config/configLoad.js";
import { getLogger } from "../log.js";
import { SessionManager } from "../sessions/sessionManager.js";
import { DEFAULT_SETTINGS_PATH } from "../settings.js";

const logger = getLogger("command.sessions");

export type SessionsCleanupOptions = {
    settings?: string;
};

/**
 * Archives sessions idle longer than the configured timeout and prints how many were removed.
 */
export async function sessionsCleanupCommand(options: SessionsCleanupOptions): Promise<void> {
    const settingsPath = path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH);
    const config = await configLoad(settingsPath);
    const sessions = new SessionManager(config.sessions);
    const removed = await sessions.cleanupExpiredSessions();
    logger.info({ removed, storagePath: config.sessions.storagePath }, "cleanup: Expired sessions archived");
    console.log(`Archived ${removed} expired session${removed === 1 ? "" : "s"}.`);
}

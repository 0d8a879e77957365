import { promises as fs } from "node:fs";
import path from "node:path";

import { createId } from "@paralleldrive/cuid2";

import { getLogger } from "../log.js";
import { atomicWrite } from "../util/atomicWrite.js";
import { type FileLockOptions, fileLockRun } from "../util/fileLock.js";
import { AsyncLock } from "../util/lock.js";
import { sessionCommandParse } from "./sessionCommandParse.js";
import { sessionFileNameSanitize } from "./sessionFileNameSanitize.js";
import { SESSION_HELP_TEXT } from "./sessionHelpText.js";
import { sessionHistoryFormat, sessionHistoryListFormat } from "./sessionHistoryFormat.js";
import { sessionRecordBuild, sessionStoreBuild, sessionStoreParse } from "./sessionStoreParse.js";
import type { Session, SessionInfo, SessionMessage, SessionRole } from "./sessionTypes.js";

const logger = getLogger("sessions.manager");

export const DEFAULT_SESSION_MAX_MESSAGES = 50;
export const DEFAULT_SESSION_TIMEOUT_SECONDS = 86_400;

export type SessionManagerOptions = {
    storagePath: string;
    maxMessages?: number;
    timeoutSeconds?: number;
    /** Current time in epoch seconds. */
    now?: () => number;
    idGenerate?: () => string;
    fileLock?: FileLockOptions;
};

/**
 * Owns per-user conversation sessions: rotation, expiry, archival and persistence.
 * The whole map is written to one JSON document after every mutation; save and archive
 * failures are logged and the in-memory state stays authoritative.
 */
export class SessionManager {
    readonly storagePath: string;
    readonly archiveDir: string;
    readonly maxMessages: number;
    readonly timeoutSeconds: number;
    private readonly lockPath: string;
    private readonly now: () => number;
    private readonly idGenerate: () => string;
    private readonly fileLockOptions: FileLockOptions;
    private readonly lock = new AsyncLock();
    private sessions = new Map<string, Session>();
    private loaded = false;

    constructor(options: SessionManagerOptions) {
        this.storagePath = path.resolve(options.storagePath);
        this.archiveDir = path.join(path.dirname(this.storagePath), "archived_sessions");
        this.lockPath = `${this.storagePath}.lock`;
        this.maxMessages = options.maxMessages ?? DEFAULT_SESSION_MAX_MESSAGES;
        this.timeoutSeconds = options.timeoutSeconds ?? DEFAULT_SESSION_TIMEOUT_SECONDS;
        this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
        this.idGenerate = options.idGenerate ?? createId;
        this.fileLockOptions = options.fileLock ?? {};
    }

    async load(): Promise<void> {
        await this.lock.inLock(async () => {
            this.loaded = false;
            await this.loadUnlocked();
        });
    }

    /**
     * Returns the live session, replacing it first when it expired or reached the message ceiling.
     * Expects: refreshes lastActive and persists.
     */
    async getOrCreateSession(userId: string): Promise<Session> {
        return this.lock.inLock(async () => {
            await this.loadUnlocked();
            const session = await this.sessionResolveUnlocked(userId);
            session.lastActive = this.now();
            await this.persistUnlocked();
            return sessionClone(session);
        });
    }

    async addMessage(userId: string, role: SessionRole, content: string): Promise<void> {
        await this.lock.inLock(async () => {
            await this.loadUnlocked();
            const session = await this.sessionResolveUnlocked(userId);
            const timestamp = this.now();
            session.messages.push({ role, content, timestamp });
            session.lastActive = timestamp;
            await this.persistUnlocked();
            logger.debug(
                { sessionId: session.sessionId, role, length: content.length },
                "message: Added to session"
            );
        });
    }

    async getConversationHistory(userId: string, maxMessages?: number): Promise<SessionMessage[]> {
        return this.lock.inLock(async () => {
            await this.loadUnlocked();
            const messages = this.sessions.get(userId)?.messages ?? [];
            const selected = maxMessages !== undefined && maxMessages > 0 ? messages.slice(-maxMessages) : messages;
            return selected.map((message) => ({ ...message }));
        });
    }

    async formatHistoryForAI(userId: string): Promise<string> {
        return sessionHistoryFormat(await this.getConversationHistory(userId));
    }

    /**
     * Archives any live session for the user and starts an empty one.
     */
    async createNewSession(userId: string): Promise<Session> {
        return this.lock.inLock(async () => {
            await this.loadUnlocked();
            const session = await this.sessionReplaceUnlocked(userId);
            await this.persistUnlocked();
            return sessionClone(session);
        });
    }

    async getSessionInfo(userId: string): Promise<SessionInfo> {
        return this.lock.inLock(async () => {
            await this.loadUnlocked();
            const session = this.sessions.get(userId);
            if (!session) {
                return { exists: false };
            }
            return {
                exists: true,
                sessionId: session.sessionId,
                messageCount: session.messages.length,
                createdAt: session.createdAt,
                lastActive: session.lastActive,
                ageSeconds: this.now() - session.createdAt
            };
        });
    }

    /**
     * Archives and removes every session idle for longer than the timeout.
     * Returns the number of sessions removed.
     */
    async cleanupExpiredSessions(): Promise<number> {
        return this.lock.inLock(async () => {
            await this.loadUnlocked();
            const expired = [...this.sessions.entries()].filter(([, session]) => this.sessionExpired(session));
            for (const [userId, session] of expired) {
                await this.archiveUnlocked(session);
                this.sessions.delete(userId);
                logger.info({ sessionId: session.sessionId, userId }, "cleanup: Expired session removed");
            }
            if (expired.length > 0) {
                await this.persistUnlocked();
            }
            return expired.length;
        });
    }

    isSessionCommand(text: string): boolean {
        return sessionCommandParse(text) !== null;
    }

    /**
     * Runs a session command and returns the reply, or null when text is not a command.
     */
    async handleSessionCommand(userId: string, text: string): Promise<string | null> {
        const command = sessionCommandParse(text);
        if (command === "help") {
            return SESSION_HELP_TEXT;
        }
        if (command === "new") {
            await this.createNewSession(userId);
            return "✅ 已创建新会话 / New session created";
        }
        if (command === "info") {
            const info = await this.getSessionInfo(userId);
            if (!info.exists) {
                return "ℹ️ 当前没有活跃会话 / No active session";
            }
            return [
                "📊 会话信息 / Session Info:",
                `- Session ID: ${info.sessionId.slice(0, 8)}...`,
                `- 消息数 / Messages: ${info.messageCount}`,
                `- 会话时长 / Age: ${info.ageSeconds}s`
            ].join("\n");
        }
        if (command === "history") {
            return sessionHistoryListFormat(await this.getConversationHistory(userId));
        }
        return null;
    }

    private async sessionResolveUnlocked(userId: string): Promise<Session> {
        const existing = this.sessions.get(userId);
        if (!existing) {
            return this.sessionReplaceUnlocked(userId);
        }
        const expired = this.sessionExpired(existing);
        const full = existing.messages.length >= this.maxMessages;
        if (expired || full) {
            logger.info({ userId, sessionId: existing.sessionId, expired, full }, "rotate: Session replaced");
            return this.sessionReplaceUnlocked(userId);
        }
        return existing;
    }

    private async sessionReplaceUnlocked(userId: string): Promise<Session> {
        const previous = this.sessions.get(userId);
        if (previous) {
            await this.archiveUnlocked(previous);
        }
        const createdAt = this.now();
        const session: Session = {
            sessionId: this.idGenerate(),
            userId,
            createdAt,
            lastActive: createdAt,
            messages: []
        };
        this.sessions.set(userId, session);
        logger.info({ userId, sessionId: session.sessionId }, "create: New session");
        return session;
    }

    private sessionExpired(session: Session): boolean {
        return this.now() - session.lastActive > this.timeoutSeconds;
    }

    private async archiveUnlocked(session: Session): Promise<void> {
        const fileName = `${sessionFileNameSanitize(session.userId)}_${session.sessionId}_${this.now()}.json`;
        const archivePath = path.join(this.archiveDir, fileName);
        try {
            await atomicWrite(archivePath, `${JSON.stringify(sessionRecordBuild(session), null, 2)}\n`);
            logger.debug({ archivePath }, "archive: Session archived");
        } catch (error) {
            logger.error({ sessionId: session.sessionId, error }, "archive: Failed to archive session");
        }
    }

    private async loadUnlocked(): Promise<void> {
        if (this.loaded) {
            return;
        }
        this.loaded = true;
        this.sessions = await this.storeRead();
    }

    private async storeRead(): Promise<Map<string, Session>> {
        let content: string;
        try {
            content = await fs.readFile(this.storagePath, "utf8");
        } catch (error) {
            if (error instanceof Error && "code" in error && error.code === "ENOENT") {
                logger.info({ storagePath: this.storagePath }, "load: No session store, starting fresh");
            } else {
                logger.warn({ storagePath: this.storagePath, error }, "load: Failed to read session store");
            }
            return new Map();
        }

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (error) {
            logger.warn({ storagePath: this.storagePath, error }, "load: Session store is not valid JSON");
            return new Map();
        }

        const sessions = sessionStoreParse(raw);
        if (!sessions) {
            logger.warn({ storagePath: this.storagePath }, "load: Session store has invalid data");
            return new Map();
        }
        logger.info({ count: sessions.size }, "load: Sessions loaded");
        return sessions;
    }

    private async persistUnlocked(): Promise<void> {
        const payload = `${JSON.stringify(sessionStoreBuild(this.sessions), null, 2)}\n`;
        try {
            await fs.mkdir(path.dirname(this.storagePath), { recursive: true });
            await fileLockRun(this.lockPath, () => atomicWrite(this.storagePath, payload), this.fileLockOptions);
            logger.debug({ count: this.sessions.size }, "save: Sessions saved");
        } catch (error) {
            logger.error({ storagePath: this.storagePath, error }, "save: Failed to save sessions");
        }
    }
}

function sessionClone(session: Session): Session {
    return { ...session, messages: session.messages.map((message) => ({ ...message })) };
}

import { z } from "zod";

import type { Session } from "./sessionTypes.js";

const sessionMessageSchema = z.object({
    role: z.enum(["user", "assistant"]),
    content: z.string(),
    timestamp: z.number()
});

const sessionRecordSchema = z
    .object({
        session_id: z.string().min(1),
        user_id: z.string(),
        created_at: z.number(),
        last_active: z.number(),
        messages: z.array(sessionMessageSchema).default([])
    })
    .passthrough();

const sessionStoreSchema = z
    .object({
        sessions: z.record(sessionRecordSchema).default({})
    })
    .passthrough();

export type SessionRecord = z.input<typeof sessionRecordSchema>;

export type SessionStore = {
    sessions: Record<string, SessionRecord>;
};

/**
 * Parses the persisted session document into live sessions keyed by user id.
 * Returns null when the document does not match the store schema.
 */
export function sessionStoreParse(raw: unknown): Map<string, Session> | null {
    const parsed = sessionStoreSchema.safeParse(raw);
    if (!parsed.success) {
        return null;
    }
    const sessions = new Map<string, Session>();
    for (const [userId, record] of Object.entries(parsed.data.sessions)) {
        sessions.set(userId, {
            sessionId: record.session_id,
            userId: record.user_id,
            createdAt: record.created_at,
            lastActive: record.last_active,
            messages: record.messages.map((message) => ({ ...message }))
        });
    }
    return sessions;
}

export function sessionRecordBuild(session: Session): SessionRecord {
    return {
        session_id: session.sessionId,
        user_id: session.userId,
        created_at: session.createdAt,
        last_active: session.lastActive,
        messages: session.messages.map((message) => ({
            role: message.role,
            content: message.content,
            timestamp: message.timestamp
        }))
    };
}

export function sessionStoreBuild(sessions: ReadonlyMap<string, Session>): SessionStore {
    const records: Record<string, SessionRecord> = {};
    for (const [userId, session] of sessions) {
        records[userId] = sessionRecordBuild(session);
    }
    return { sessions: records };
}

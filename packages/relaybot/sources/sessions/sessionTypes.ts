export type SessionRole = "user" | "assistant";

export type SessionMessage = {
    role: SessionRole;
    content: string;
    /** Epoch seconds. */
    timestamp: number;
};

export type Session = {
    sessionId: string;
    userId: string;
    createdAt: number;
    lastActive: number;
    messages: SessionMessage[];
};

export type SessionInfo =
    | { exists: false }
    | {
          exists: true;
          sessionId: string;
          messageCount: number;
          createdAt: number;
          lastActive: number;
          ageSeconds: number;
      };

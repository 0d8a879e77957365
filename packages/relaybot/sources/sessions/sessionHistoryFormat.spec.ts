import { describe, expect, it } from "vitest";

import { sessionHistoryFormat, sessionHistoryListFormat } from "./sessionHistoryFormat.js";
import type { SessionMessage } from "./sessionTypes.js";

const messages: SessionMessage[] = [
    { role: "user", content: "What is a monad?", timestamp: 1 },
    { role: "assistant", content: "A design pattern.", timestamp: 2 }
];

describe("sessionHistoryFormat", () => {
    it("renders messages in order", () => {
        expect(sessionHistoryFormat(messages)).toBe(
            "Previous conversation:\nUser: What is a monad?\nAssistant: A design pattern."
        );
    });

    it("returns an empty string without history", () => {
        expect(sessionHistoryFormat([])).toBe("");
    });
});

describe("sessionHistoryListFormat", () => {
    it("numbers entries and truncates long content", () => {
        const long = "y".repeat(120);

        expect(sessionHistoryListFormat([...messages, { role: "user", content: long, timestamp: 3 }])).toBe(
            [
                "📜 对话历史 / Conversation History:",
                "1. 👤 User: What is a monad?",
                "2. 🤖 Assistant: A design pattern.",
                `3. 👤 User: ${"y".repeat(100)}...`
            ].join("\n")
        );
    });

    it("reports an empty history", () => {
        expect(sessionHistoryListFormat([])).toBe("ℹ️ 当前会话没有历史记录 / No history in current session");
    });
});

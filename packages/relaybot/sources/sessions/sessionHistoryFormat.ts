import type { SessionMessage } from "./sessionTypes.js";

const PREVIEW_LENGTH = 100;

/**
 * Renders history as model context, or an empty string when there is none.
 */
export function sessionHistoryFormat(messages: readonly SessionMessage[]): string {
    if (messages.length === 0) {
        return "";
    }
    const lines = ["Previous conversation:"];
    for (const message of messages) {
        lines.push(`${message.role === "user" ? "User" : "Assistant"}: ${message.content}`);
    }
    return lines.join("\n");
}

/**
 * Renders a numbered history listing for the /history command.
 */
export function sessionHistoryListFormat(messages: readonly SessionMessage[]): string {
    if (messages.length === 0) {
        return "ℹ️ 当前会话没有历史记录 / No history in current session";
    }
    const lines = ["📜 对话历史 / Conversation History:"];
    messages.forEach((message, index) => {
        const label = message.role === "user" ? "👤 User" : "🤖 Assistant";
        const preview =
            message.content.length > PREVIEW_LENGTH ? `${message.content.slice(0, PREVIEW_LENGTH)}...` : message.content;
        lines.push(`${index + 1}. ${label}: ${preview}`);
    });
    return lines.join("\n");
}

export type SessionCommand = "new" | "info" | "history" | "help";

const SESSION_COMMANDS: ReadonlyArray<[SessionCommand, readonly string[]]> = [
    ["new", ["/new", "新会话"]],
    ["info", ["/session", "会话信息"]],
    ["history", ["/history", "历史记录"]],
    ["help", ["/help", "帮助", "help"]]
];

/**
 * Recognizes a whole-message session command, ignoring case and surrounding whitespace.
 */
export function sessionCommandParse(text: string): SessionCommand | null {
    const normalized = text.trim().toLowerCase();
    for (const [command, aliases] of SESSION_COMMANDS) {
        if (aliases.includes(normalized)) {
            return command;
        }
    }
    return null;
}

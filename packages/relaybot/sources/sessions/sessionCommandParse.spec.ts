import { describe, expect, it } from "vitest";

import { sessionCommandParse } from "./sessionCommandParse.js";

describe("sessionCommandParse", () => {
    it("recognizes english and chinese aliases", () => {
        expect(sessionCommandParse("/new")).toBe("new");
        expect(sessionCommandParse("新会话")).toBe("new");
        expect(sessionCommandParse("/session")).toBe("info");
        expect(sessionCommandParse("会话信息")).toBe("info");
        expect(sessionCommandParse("/history")).toBe("history");
        expect(sessionCommandParse("历史记录")).toBe("history");
        expect(sessionCommandParse("/help")).toBe("help");
        expect(sessionCommandParse("帮助")).toBe("help");
        expect(sessionCommandParse("help")).toBe("help");
    });

    it("ignores case and surrounding whitespace", () => {
        expect(sessionCommandParse("  /NEW \n")).toBe("new");
        expect(sessionCommandParse("\t/History")).toBe("history");
    });

    it("returns null for commands embedded in other text", () => {
        expect(sessionCommandParse("/new please")).toBeNull();
        expect(sessionCommandParse("show /history")).toBeNull();
        expect(sessionCommandParse("hello")).toBeNull();
    });
});

import { describe, expect, it } from "vitest";

import { cliKeywordFind, cliKeywordsDetect } from "./cliKeywordsDetect.js";

describe("cliKeywordsDetect", () => {
    it("detects english keywords case-insensitively", () => {
        expect(cliKeywordsDetect("Please Analyze Project layout")).toBe(true);
        expect(cliKeywordsDetect("READ FILE src/main.ts")).toBe(true);
    });

    it("detects chinese keywords", () => {
        expect(cliKeywordsDetect("帮我查看代码")).toBe(true);
        expect(cliKeywordsDetect("看看项目结构")).toBe(true);
    });

    it("returns false for general questions", () => {
        expect(cliKeywordsDetect("什么是机器学习")).toBe(false);
        expect(cliKeywordsDetect("tell me a joke")).toBe(false);
    });
});

describe("cliKeywordFind", () => {
    it("returns the first matching keyword", () => {
        expect(cliKeywordFind("please View Code and run script")).toBe("view code");
    });

    it("returns null without a match", () => {
        expect(cliKeywordFind("hello")).toBeNull();
    });
});

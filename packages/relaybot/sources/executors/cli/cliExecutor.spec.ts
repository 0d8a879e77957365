import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { CliInvocation } from "./cliArgsBuild.js";
import { CliExecutor } from "./cliExecutor.js";
import type { CliRunOptions, CliRunResult } from "./cliRun.js";

function runBuild(result: CliRunResult | Error) {
    return vi.fn(async (_invocation: CliInvocation, _options: CliRunOptions): Promise<CliRunResult> => {
        if (result instanceof Error) {
            throw result;
        }
        return result;
    });
}

describe("CliExecutor", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "relaybot-cli-"));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it("is available only when the target directory exists", async () => {
        await expect(new CliExecutor({ provider: "claude", targetDir: dir }).isAvailable()).resolves.toBe(true);
        await expect(
            new CliExecutor({ provider: "claude", targetDir: path.join(dir, "missing") }).isAvailable()
        ).resolves.toBe(false);
        await expect(new CliExecutor({ provider: "gemini", targetDir: null }).isAvailable()).resolves.toBe(false);
    });

    it("treats a file as an unavailable target", async () => {
        const file = path.join(dir, "notes.txt");
        await fs.writeFile(file, "x");

        await expect(new CliExecutor({ provider: "claude", targetDir: file }).isAvailable()).resolves.toBe(false);
    });

    it("runs the cli inside the target directory and returns trimmed output", async () => {
        const run = runBuild({ exitCode: 0, stdout: "done\n", stderr: "", timedOut: false });
        const executor = new CliExecutor({ provider: "claude", targetDir: dir, timeoutSeconds: 30, run });

        const result = await executor.execute("refactor utils", [{ role: "user", content: "ignored", timestamp: 1 }]);

        expect(result).toMatchObject({ success: true, stdout: "done", errorMessage: null });
        expect(run).toHaveBeenCalledWith(
            { command: "claude", args: ["--add-dir", dir, "-p", "refactor utils"] },
            { cwd: dir, timeoutMs: 30_000 }
        );
        expect(executor.providerName()).toBe("claude-cli");
    });

    it("reports non-zero exits with stderr", async () => {
        const executor = new CliExecutor({
            provider: "gemini",
            targetDir: dir,
            run: runBuild({ exitCode: 2, stdout: "partial", stderr: "bad flag\n", timedOut: false })
        });

        const result = await executor.execute("hi");

        expect(result).toMatchObject({
            success: false,
            stdout: "",
            stderr: "bad flag\n",
            errorMessage: "gemini-cli exited with code 2: bad flag"
        });
    });

    it("reports timeouts", async () => {
        const executor = new CliExecutor({
            provider: "claude",
            targetDir: dir,
            timeoutSeconds: 5,
            run: runBuild({ exitCode: null, stdout: "", stderr: "", timedOut: true })
        });

        const result = await executor.execute("hi");

        expect(result).toMatchObject({ success: false, errorMessage: "claude-cli timed out after 5s" });
    });

    it("reports a missing binary", async () => {
        const executor = new CliExecutor({
            provider: "claude",
            targetDir: dir,
            run: runBuild(new Error("spawn claude ENOENT"))
        });

        const result = await executor.execute("hi");

        expect(result).toMatchObject({
            success: false,
            errorMessage: "claude CLI could not be started: spawn claude ENOENT"
        });
    });

    it("fails without running when the target directory is gone", async () => {
        const run = runBuild({ exitCode: 0, stdout: "x", stderr: "", timedOut: false });
        const missing = path.join(dir, "gone");
        const executor = new CliExecutor({ provider: "claude", targetDir: missing, run });

        const result = await executor.execute("hi");

        expect(result).toMatchObject({ success: false, errorMessage: `Target directory not accessible: ${missing}` });
        expect(run).not.toHaveBeenCalled();
    });
});

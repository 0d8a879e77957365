import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { FileLockTimeoutError, fileLockRun } from "./fileLock.js";

describe("fileLockRun", () => {
    let dir: string;
    let lockPath: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "relaybot-lock-"));
        lockPath = path.join(dir, "store.json.lock");
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it("holds the lock file while running and removes it afterwards", async () => {
        const seen = await fileLockRun(lockPath, async () => {
            const stat = await fs.stat(lockPath);
            return stat.isFile();
        });

        expect(seen).toBe(true);
        await expect(fs.stat(lockPath)).rejects.toThrow();
    });

    it("removes the lock file when the callback throws", async () => {
        await expect(
            fileLockRun(lockPath, () => {
                throw new Error("boom");
            })
        ).rejects.toThrow("boom");
        await expect(fs.stat(lockPath)).rejects.toThrow();
    });

    it("times out while another holder keeps a fresh lock", async () => {
        await fs.writeFile(lockPath, "other", "utf8");

        await expect(fileLockRun(lockPath, () => "never", { timeoutMs: 50, retryMs: 10 })).rejects.toBeInstanceOf(
            FileLockTimeoutError
        );
    });

    it("takes over a stale lock", async () => {
        await fs.writeFile(lockPath, "other", "utf8");
        const past = new Date(Date.now() - 60_000);
        await fs.utimes(lockPath, past, past);

        await expect(fileLockRun(lockPath, () => "ran", { timeoutMs: 50, staleMs: 1_000 })).resolves.toBe("ran");
    });

    it("makes a second holder wait for the first to finish", async () => {
        const events: string[] = [];
        let entered: () => void = () => undefined;
        const firstEntered = new Promise<void>((resolve) => {
            entered = resolve;
        });
        const first = fileLockRun(lockPath, async () => {
            events.push("first-start");
            entered();
            await new Promise((resolve) => setTimeout(resolve, 30));
            events.push("first-end");
        });

        await firstEntered;
        const second = fileLockRun(lockPath, async () => {
            events.push("second-start");
        });
        await Promise.all([first, second]);

        expect(events).toEqual(["first-start", "first-end", "second-start"]);
    });

    it("lets only one waiter take over a stale lock", async () => {
        await fs.writeFile(lockPath, "other", "utf8");
        const past = new Date(Date.now() - 60_000);
        await fs.utimes(lockPath, past, past);
        let active = 0;
        let maxActive = 0;
        const hold = async () => {
            active += 1;
            maxActive = Math.max(maxActive, active);
            await new Promise((resolve) => setTimeout(resolve, 30));
            active -= 1;
        };

        await Promise.all([
            fileLockRun(lockPath, hold, { staleMs: 1_000, retryMs: 5 }),
            fileLockRun(lockPath, hold, { staleMs: 1_000, retryMs: 5 }),
            fileLockRun(lockPath, hold, { staleMs: 1_000, retryMs: 5 })
        ]);

        expect(maxActive).toBe(1);
        expect((await fs.readdir(dir)).sort()).toEqual([]);
    });

    it("leaves a lock file in place when another holder owns it", async () => {
        await fileLockRun(lockPath, async () => {
            await fs.writeFile(lockPath, "other", "utf8");
        });

        await expect(fs.readFile(lockPath, "utf8")).resolves.toBe("other");
    });
});

import { promises as fs, type Stats } from "node:fs";

import { createId } from "@paralleldrive/cuid2";

export type FileLockOptions = {
    timeoutMs?: number;
    staleMs?: number;
    retryMs?: number;
};

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_STALE_MS = 10_000;
const DEFAULT_RETRY_MS = 25;

export class FileLockTimeoutError extends Error {
    readonly lockPath: string;

    constructor(lockPath: string, timeoutMs: number) {
        super(`Timed out after ${timeoutMs}ms waiting for lock: ${lockPath}`);
        this.name = "FileLockTimeoutError";
        this.lockPath = lockPath;
    }
}

/**
 * Runs func while holding an exclusive lock file shared across processes.
 * Lock files older than staleMs are treated as abandoned and removed.
 * Release only removes the lock file while it still holds this holder's token.
 * Expects: the lock file's directory exists.
 */
export async function fileLockRun<T>(
    lockPath: string,
    func: () => Promise<T> | T,
    options: FileLockOptions = {}
): Promise<T> {
    const token = `${process.pid}:${createId()}`;
    await fileLockAcquire(lockPath, token, options);
    try {
        return await func();
    } finally {
        await fileLockRelease(lockPath, token);
    }
}

async function fileLockAcquire(lockPath: string, token: string, options: FileLockOptions): Promise<void> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const staleMs = options.staleMs ?? DEFAULT_STALE_MS;
    const retryMs = options.retryMs ?? DEFAULT_RETRY_MS;
    const startedAt = Date.now();

    for (;;) {
        try {
            const handle = await fs.open(lockPath, "wx");
            try {
                await handle.writeFile(token, "utf8");
            } finally {
                await handle.close();
            }
            return;
        } catch (error) {
            if (!errorCodeIs(error, "EEXIST")) {
                throw error;
            }
        }

        if (await lockStaleRemove(lockPath, staleMs)) {
            continue;
        }
        if (Date.now() - startedAt >= timeoutMs) {
            throw new FileLockTimeoutError(lockPath, timeoutMs);
        }
        await new Promise<void>((resolve) => setTimeout(resolve, retryMs));
    }
}

/**
 * Removes an abandoned lock file. Returns true when acquisition should retry right away.
 * The lock is moved aside atomically first so that only one waiter takes it over.
 */
async function lockStaleRemove(lockPath: string, staleMs: number): Promise<boolean> {
    const stat = await lockStat(lockPath);
    if (!stat) {
        return true;
    }
    if (Date.now() - stat.mtimeMs <= staleMs) {
        return false;
    }
    const movedPath = `${lockPath}.stale-${createId()}`;
    try {
        await fs.rename(lockPath, movedPath);
    } catch (error) {
        if (errorCodeIs(error, "ENOENT")) {
            return true;
        }
        throw error;
    }
    const moved = await fs.stat(movedPath);
    if (moved.ino !== stat.ino) {
        // A live lock replaced the stale one before the rename; put it back.
        try {
            await fs.link(movedPath, lockPath);
        } catch (error) {
            if (!errorCodeIs(error, "EEXIST")) {
                throw error;
            }
        }
    }
    await fs.rm(movedPath, { force: true });
    return true;
}

async function lockStat(lockPath: string): Promise<Stats | null> {
    try {
        return await fs.stat(lockPath);
    } catch (error) {
        if (errorCodeIs(error, "ENOENT")) {
            return null;
        }
        throw error;
    }
}

async function fileLockRelease(lockPath: string, token: string): Promise<void> {
    let content: string;
    try {
        content = await fs.readFile(lockPath, "utf8");
    } catch (error) {
        if (errorCodeIs(error, "ENOENT")) {
            return;
        }
        throw error;
    }
    if (content === token) {
        await fs.rm(lockPath, { force: true });
    }
}

function errorCodeIs(error: unknown, code: string): boolean {
    return error instanceof Error && "code" in error && error.code === code;
}

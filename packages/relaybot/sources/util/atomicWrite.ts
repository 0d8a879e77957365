import { promises as fs } from "node:fs";
import path from "node:path";

/**
 * Writes a file atomically by renaming a temp file into place.
 * Creates the parent directory; removes the temp file when the write fails.
 */
export async function atomicWrite(filePath: string, payload: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.tmp-${process.pid}-${Date.now()}`;
    try {
        await fs.writeFile(tempPath, payload, { encoding: "utf8", mode: 0o600 });
        await fs.rename(tempPath, filePath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
    }
}

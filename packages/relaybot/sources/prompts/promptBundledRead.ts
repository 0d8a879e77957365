import { promises as fs } from "node:fs";

/**
 * Reads a bundled prompt template from the prompts directory.
 * Expects: filename matches a bundled prompt file.
 */
export async function promptBundledRead(filename: string): Promise<string> {
    return fs.readFile(new URL(`./${filename}`, import.meta.url), "utf8");
}

import os from "node:os";
import path from "node:path";

function resolveRelaybotRoot(): string {
    const root = process.env.RELAYBOT_ROOT_DIR?.trim();
    if (root) {
        return path.resolve(root);
    }
    return path.join(os.homedir(), ".relaybot");
}

export const DEFAULT_RELAYBOT_DIR = resolveRelaybotRoot();

export function resolveRelaybotPath(...segments: string[]): string {
    return path.join(DEFAULT_RELAYBOT_DIR, ...segments);
}

import { execFile as execFileCallback } from "node:child_process";
import { promisify } from "node:util";

import type { CliInvocation } from "./cliArgsBuild.js";

const execFile = promisify(execFileCallback);

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export type CliRunOptions = {
    cwd: string;
    timeoutMs: number;
};

export type CliRunResult = {
    exitCode: number | null;
    stdout: string;
    stderr: string;
    timedOut: boolean;
};

export type CliRun = (invocation: CliInvocation, options: CliRunOptions) => Promise<CliRunResult>;

/**
 * Runs a CLI to completion and captures its output.
 * Non-zero exits and timeouts resolve; spawn failures such as ENOENT reject.
 */
export async function cliRun(invocation: CliInvocation, options: CliRunOptions): Promise<CliRunResult> {
    try {
        const result = await execFile(invocation.command, invocation.args, {
            cwd: options.cwd,
            timeout: options.timeoutMs,
            encoding: "utf8",
            maxBuffer: MAX_OUTPUT_BYTES,
            windowsHide: true
        });
        return { exitCode: 0, stdout: result.stdout, stderr: result.stderr, timedOut: false };
    } catch (error) {
        if (!execFailureIs(error) || typeof error.code === "string") {
            throw error;
        }
        return {
            exitCode: typeof error.code === "number" ? error.code : null,
            stdout: typeof error.stdout === "string" ? error.stdout : "",
            stderr: typeof error.stderr === "string" ? error.stderr : "",
            timedOut: error.killed === true
        };
    }
}

function execFailureIs(
    error: unknown
): error is Error & { code?: unknown; killed?: unknown; stdout?: unknown; stderr?: unknown } {
    return error instanceof Error;
}

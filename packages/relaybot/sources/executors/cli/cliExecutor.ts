import { promises as fs } from "node:fs";

import type { CliProvider } from "../../config/configTypes.js";
import { getLogger } from "../../log.js";
import type { SessionMessage } from "../../sessions/sessionTypes.js";
import { executionFailureBuild, executionSuccessBuild } from "../executionResultBuild.js";
import type { ExecutionResult, Executor, ExecutorParams } from "../executorTypes.js";
import { cliArgsBuild } from "./cliArgsBuild.js";
import { type CliRun, cliRun } from "./cliRun.js";

const logger = getLogger("executors.cli");

const DEFAULT_TIMEOUT_SECONDS = 600;

export type CliExecutorOptions = {
    provider: CliProvider;
    targetDir: string | null;
    timeoutSeconds?: number;
    run?: CliRun;
};

/**
 * Executor that shells out to a local coding-assistant CLI inside a target directory.
 * History is not forwarded; the CLI keeps its own context.
 */
export class CliExecutor implements Executor {
    readonly provider: CliProvider;
    readonly targetDir: string | null;
    private readonly timeoutSeconds: number;
    private readonly run: CliRun;

    constructor(options: CliExecutorOptions) {
        this.provider = options.provider;
        this.targetDir = options.targetDir;
        this.timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
        this.run = options.run ?? cliRun;
    }

    providerName(): string {
        return `${this.provider}-cli`;
    }

    async isAvailable(): Promise<boolean> {
        if (!this.targetDir) {
            return false;
        }
        return directoryExists(this.targetDir);
    }

    async execute(
        prompt: string,
        _history?: readonly SessionMessage[],
        params: ExecutorParams = {}
    ): Promise<ExecutionResult> {
        const startedAt = Date.now();
        const elapsed = () => (Date.now() - startedAt) / 1000;
        const targetDir = this.targetDir;
        if (!targetDir || !(await directoryExists(targetDir))) {
            return executionFailureBuild(`Target directory not accessible: ${targetDir ?? "(not configured)"}`, 0);
        }

        const invocation = cliArgsBuild(this.provider, prompt, targetDir);
        logger.info(
            { provider: this.providerName(), cwd: targetDir, userId: params.userId },
            "execute: Running CLI executor"
        );
        try {
            const result = await this.run(invocation, { cwd: targetDir, timeoutMs: this.timeoutSeconds * 1000 });
            if (result.timedOut) {
                logger.warn({ provider: this.providerName() }, "execute: CLI executor timed out");
                return executionFailureBuild(
                    `${this.providerName()} timed out after ${this.timeoutSeconds}s`,
                    elapsed(),
                    result.stderr
                );
            }
            if (result.exitCode !== 0) {
                const detail = result.stderr.trim();
                logger.warn({ provider: this.providerName(), exitCode: result.exitCode }, "execute: CLI executor failed");
                return executionFailureBuild(
                    `${this.providerName()} exited with code ${result.exitCode ?? "unknown"}${detail ? `: ${detail}` : ""}`,
                    elapsed(),
                    result.stderr
                );
            }
            return executionSuccessBuild(result.stdout.trim(), elapsed(), result.stderr);
        } catch (error) {
            logger.warn({ provider: this.providerName(), error }, "execute: CLI executor could not start");
            const message = error instanceof Error ? error.message : String(error);
            return executionFailureBuild(`${invocation.command} CLI could not be started: ${message}`, elapsed());
        }
    }
}

async function directoryExists(target: string): Promise<boolean> {
    try {
        return (await fs.stat(target)).isDirectory();
    } catch {
        return false;
    }
}

import type { ExecutionFailure, ExecutionSuccess } from "./executorTypes.js";

export function executionSuccessBuild(
    stdout: string,
    executionTimeSeconds: number,
    stderr: string = ""
): ExecutionSuccess {
    return { success: true, stdout, stderr, errorMessage: null, executionTimeSeconds };
}

/**
 * Builds a failed result; stdout is always empty on failure.
 */
export function executionFailureBuild(
    errorMessage: string,
    executionTimeSeconds: number,
    stderr: string = ""
): ExecutionFailure {
    return { success: false, stdout: "", stderr, errorMessage, executionTimeSeconds };
}

import type { CliProvider } from "../../config/configTypes.js";

export type CliInvocation = {
    command: string;
    args: string[];
};

/**
 * Builds the command line for a coding-assistant CLI in non-interactive mode.
 * Expects: targetDir is the directory the tool may read and edit.
 */
export function cliArgsBuild(provider: CliProvider, prompt: string, targetDir: string): CliInvocation {
    if (provider === "claude") {
        return { command: "claude", args: ["--add-dir", targetDir, "-p", prompt] };
    }
    return { command: "gemini", args: ["-p", prompt] };
}

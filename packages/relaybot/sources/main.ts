#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { Command } from "commander";
import { executorsCommand } from "./commands/executors.js";
import { sessionsCleanupCommand } from "./commands/sessions.js";
import { startCommand } from "./commands/start.js";
import { initLogging } from "./log.js";
import { DEFAULT_SETTINGS_PATH } from "./settings.js";

const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
const version =
    typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
        ? pkg.version
        : "0.0.0";

const program = new Command();

initLogging();

program.name("relaybot").description("Chat bot that routes messages to AI executors").version(version);

program
    .command("start")
    .description("Run the bot against the console connector")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("-v, --verbose", "Log routing decisions and prompt previews")
    .action(startCommand);

program
    .command("executors")
    .description("List registered executors and their availability")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("--json", "Print statuses as json")
    .action(executorsCommand);

const sessionsCommand = program.command("sessions").description("Manage conversation sessions");

sessionsCommand
    .command("cleanup")
    .description("Archive and remove expired sessions")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(sessionsCleanupCommand);

if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
}

await program.parseAsync(process.argv);

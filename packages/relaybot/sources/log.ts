import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogFormat = "pretty" | "json";
export type LogDestination = "stdout" | "stderr" | string;

export type LogConfig = {
    level: string;
    format: LogFormat;
    destination: LogDestination;
    redact: string[];
    service: string;
    environment: string;
};

const DEFAULT_REDACT = ["apiKey", "token", "secret", "password", "*.apiKey", "*.token", "*.secret", "*.password"];
const MODULE_WIDTH = 18;
const DETAIL_MAX_LENGTH = 160;
const PRETTY_HIDDEN_FIELDS = new Set([
    "pid",
    "hostname",
    "level",
    "time",
    "service",
    "environment",
    "module",
    "msg",
    "__level",
    "__time"
]);

const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }
    rootLogger = loggerBuild(resolveLogConfig(overrides));
    return rootLogger;
}

export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: moduleNormalize(moduleName) });
}

export function resetLogging(): void {
    rootLogger = null;
}

export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const production = process.env.NODE_ENV === "production";
    const level =
        overrides.level ??
        envValue("RELAYBOT_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (unitTestIs() ? "silent" : production ? "info" : "debug");
    const destination =
        overrides.destination ??
        envValue("RELAYBOT_LOG_DEST") ??
        envValue("LOG_DEST") ??
        (process.stdout.isTTY ? "stderr" : "stdout");
    const forceJson = booleanFlagParse(envValue("RELAYBOT_LOG_JSON")) ?? false;
    let format =
        overrides.format ??
        formatParse(envValue("RELAYBOT_LOG_FORMAT")) ??
        formatParse(envValue("LOG_FORMAT")) ??
        (forceJson ? "json" : "pretty");
    if (destination !== "stdout" && destination !== "stderr") {
        format = "json";
    }

    return {
        level: level.toLowerCase(),
        format,
        destination,
        redact: overrides.redact ?? redactListMerge(DEFAULT_REDACT, envValue("RELAYBOT_LOG_REDACT")),
        service: overrides.service ?? envValue("RELAYBOT_LOG_SERVICE") ?? "relaybot",
        environment: overrides.environment ?? envValue("NODE_ENV") ?? "development"
    };
}

function loggerBuild(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: {
            service: config.service,
            environment: config.environment
        },
        redact: config.redact.length > 0 ? { paths: config.redact, censor: "[REDACTED]" } : undefined,
        errorKey: "error",
        serializers: {
            error: pino.stdSerializers.err
        }
    };

    if (config.format === "pretty") {
        const prettyFactory = prettyFactoryResolve();
        if (prettyFactory) {
            const prettyStream = prettyFactory({
                colorize: true,
                translateTime: false,
                ignore: "pid,hostname,level,service,environment,module",
                hideObject: true,
                levelKey: "__level",
                timestampKey: "__time",
                messageFormat: formatPrettyMessage,
                destination: config.destination === "stderr" ? 2 : 1
            }) as DestinationStream;
            return pino(options, prettyStream);
        }
    }

    const destination = destinationResolve(config.destination);
    return destination ? pino(options, destination) : pino(options);
}

/**
 * Renders one pretty log line as `[hh:mm:ss] [module] message key=value`.
 * Expects: log is a pino record; messageKey names the message field.
 */
export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const time = timeFormat(log.time);
    const moduleLabel = `[${moduleNormalize(typeof log.module === "string" ? log.module : undefined)
        .slice(0, MODULE_WIDTH)
        .padEnd(MODULE_WIDTH, " ")}]`;
    const rawMessage = log[messageKey];
    const message = rawMessage === undefined || rawMessage === null ? "" : String(rawMessage);

    const details: string[] = [];
    for (const [key, value] of Object.entries(log)) {
        if (key === messageKey || PRETTY_HIDDEN_FIELDS.has(key) || value === undefined) {
            continue;
        }
        details.push(`${key}=${detailFormat(key, value)}`);
    }

    const body = [moduleLabel, message, ...details].filter((part) => part.length > 0).join(" ");
    return `[${time}] ${body}`;
}

function detailFormat(key: string, value: unknown): string {
    if (value === null) {
        return "null";
    }
    if (typeof value === "number" || typeof value === "boolean") {
        return String(value);
    }
    if (key === "error" && typeof value === "object" && "message" in value && typeof value.message === "string") {
        return detailTextFormat(value.message);
    }
    if (typeof value === "string") {
        return detailTextFormat(value);
    }
    try {
        return detailTextFormat(JSON.stringify(value));
    } catch {
        return detailTextFormat(String(value));
    }
}

function detailTextFormat(value: string): string {
    const truncated = value.length > DETAIL_MAX_LENGTH ? `${value.slice(0, DETAIL_MAX_LENGTH)}...` : value;
    if (truncated.length === 0) {
        return '""';
    }
    return /[=\s]/.test(truncated) ? JSON.stringify(truncated) : truncated;
}

function timeFormat(value: unknown): string {
    const date = typeof value === "number" || typeof value === "string" ? new Date(value) : new Date();
    const safe = Number.isNaN(date.getTime()) ? new Date() : date;
    return [safe.getHours(), safe.getMinutes(), safe.getSeconds()].map((part) => String(part).padStart(2, "0")).join(":");
}

function moduleNormalize(moduleName?: string): string {
    const trimmed = moduleName?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : "unknown";
}

function destinationResolve(destination: LogDestination): DestinationStream | undefined {
    if (destination === "stdout") {
        return undefined;
    }
    if (destination === "stderr") {
        return pino.destination(2);
    }
    return pino.destination({ dest: destination, mkdir: true, sync: false });
}

function prettyFactoryResolve(): ((options: Record<string, unknown>) => DestinationStream) | null {
    try {
        return nodeRequire("pino-pretty");
    } catch {
        return null;
    }
}

function formatParse(value: string | null): LogFormat | null {
    const normalized = value?.trim().toLowerCase();
    if (normalized === "pretty" || normalized === "json") {
        return normalized;
    }
    return null;
}

function booleanFlagParse(value: string | null): boolean | null {
    const normalized = value?.trim().toLowerCase();
    if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on") {
        return true;
    }
    if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off") {
        return false;
    }
    return null;
}

function envValue(key: string): string | null {
    const value = process.env[key]?.trim();
    return value ? value : null;
}

function redactListMerge(base: string[], extra: string | null): string[] {
    if (!extra) {
        return [...base];
    }
    const additions = extra
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean);
    return [...new Set([...base, ...additions])];
}

function unitTestIs(): boolean {
    return process.env.VITEST === "true" || process.env.VITEST === "1";
}

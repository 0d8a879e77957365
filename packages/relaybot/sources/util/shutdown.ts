import { getLogger } from "../log.js";

type ShutdownHandler = () => void | Promise<void>;
export type ShutdownReason = NodeJS.Signals | "fatal";

const FORCE_EXIT_MS = 2_000;
const logger = getLogger("shutdown");

const handlers = new Map<string, ShutdownHandler>();
let requested: Promise<ShutdownReason> | null = null;
let signalled: Promise<ShutdownReason> | null = null;

/**
 * Registers a named cleanup step run once on shutdown. Returns an unregister function.
 */
export function onShutdown(name: string, handler: ShutdownHandler): () => void {
    handlers.set(name, handler);
    return () => {
        if (handlers.get(name) === handler) {
            handlers.delete(name);
        }
    };
}

/**
 * Resolves once SIGINT/SIGTERM (or requestShutdown) has run every handler.
 */
export function awaitShutdown(): Promise<ShutdownReason> {
    if (requested) {
        return requested;
    }
    if (!signalled) {
        signalled = new Promise((resolve) => {
            const listener = (signal: NodeJS.Signals) => {
                resolve(requestShutdown(signal));
            };
            process.once("SIGINT", listener);
            process.once("SIGTERM", listener);
        });
    }
    return signalled;
}

/**
 * Runs every registered handler once, in parallel; later calls return the first run.
 */
export function requestShutdown(reason: ShutdownReason = "SIGTERM"): Promise<ShutdownReason> {
    if (!requested) {
        requested = handlersRun(reason);
    }
    return requested;
}

async function handlersRun(reason: ShutdownReason): Promise<ShutdownReason> {
    const forceExit = setTimeout(() => {
        logger.warn({ reason, timeoutMs: FORCE_EXIT_MS }, "event: Shutdown handlers timed out, forcing exit");
        process.exit(1);
    }, FORCE_EXIT_MS);
    forceExit.unref();

    const snapshot = [...handlers.entries()];
    handlers.clear();
    logger.info({ reason, handlers: snapshot.length }, "event: Shutdown started");
    await Promise.all(
        snapshot.map(async ([name, handler]) => {
            try {
                await handler();
            } catch (error) {
                logger.warn({ error, name }, "event: Shutdown handler failed");
            }
        })
    );
    clearTimeout(forceExit);
    logger.info({ reason }, "event: Shutdown complete");
    return reason;
}

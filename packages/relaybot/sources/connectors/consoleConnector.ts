import { createInterface, type Interface } from "node:readline";

import { createId } from "@paralleldrive/cuid2";

import { getLogger } from "../log.js";
import type { Connector, InboundHandler, InboundMessage, InboundUnsubscribe } from "./connectorTypes.js";

const logger = getLogger("connector.console");

export type ConsoleConnectorOptions = {
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
    userId?: string;
    chatId?: string;
};

/**
 * Local connector: every stdin line is a message from one user, replies go to stdout.
 * Lines are dispatched one at a time in arrival order.
 */
export class ConsoleConnector implements Connector {
    readonly userId: string;
    readonly chatId: string;
    private readonly input: NodeJS.ReadableStream;
    private readonly output: NodeJS.WritableStream;
    private readonly handlers = new Set<InboundHandler>();
    private readline: Interface | null = null;
    private queue: Promise<void> = Promise.resolve();
    private closedPromise: Promise<void> | null = null;

    constructor(options: ConsoleConnectorOptions = {}) {
        this.input = options.input ?? process.stdin;
        this.output = options.output ?? process.stdout;
        this.userId = options.userId ?? "console";
        this.chatId = options.chatId ?? "console";
    }

    onMessage(handler: InboundHandler): InboundUnsubscribe {
        this.handlers.add(handler);
        return () => {
            this.handlers.delete(handler);
        };
    }

    /**
     * Starts reading input. Resolves once input ends and every queued line is handled.
     */
    start(): Promise<void> {
        if (this.closedPromise) {
            return this.closedPromise;
        }
        const readline = createInterface({ input: this.input, terminal: false });
        this.readline = readline;
        this.closedPromise = new Promise((resolve) => {
            readline.on("close", () => {
                this.readline = null;
                this.queue.then(resolve, resolve);
            });
        });
        readline.on("line", (line) => {
            const text = line.trim();
            if (text.length === 0) {
                return;
            }
            const message: InboundMessage = {
                messageId: createId(),
                userId: this.userId,
                chatId: this.chatId,
                text
            };
            this.queue = this.queue.then(() => this.dispatch(message));
        });
        logger.info({ userId: this.userId }, "start: Console connector reading input");
        return this.closedPromise;
    }

    async sendMessage(_chatId: string, text: string): Promise<void> {
        this.output.write(`${text}\n`);
    }

    shutdown(): void {
        this.readline?.close();
    }

    private async dispatch(message: InboundMessage): Promise<void> {
        for (const handler of [...this.handlers]) {
            try {
                await handler(message);
            } catch (error) {
                logger.warn({ error, messageId: message.messageId }, "error: Message handler failed");
            }
        }
    }
}

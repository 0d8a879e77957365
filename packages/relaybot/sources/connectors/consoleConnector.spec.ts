import { PassThrough, Writable } from "node:stream";
import { describe, expect, it } from "vitest";

import { ConsoleConnector } from "./consoleConnector.js";
import type { InboundMessage } from "./connectorTypes.js";

function outputCapture() {
    const chunks: string[] = [];
    const output = new Writable({
        write(chunk: Buffer, _encoding, callback) {
            chunks.push(chunk.toString("utf8"));
            callback();
        }
    });
    return { output, text: () => chunks.join("") };
}

describe("ConsoleConnector", () => {
    it("dispatches non-empty lines in order and resolves when input ends", async () => {
        const input = new PassThrough();
        const connector = new ConsoleConnector({ input, output: new PassThrough(), userId: "local" });
        const received: InboundMessage[] = [];
        connector.onMessage(async (message) => {
            await new Promise((resolve) => setTimeout(resolve, 5));
            received.push(message);
        });

        const done = connector.start();
        input.write("first\n\n   \nsecond\n");
        input.end();
        await done;

        expect(received.map((message) => message.text)).toEqual(["first", "second"]);
        expect(received[0]).toMatchObject({ userId: "local", chatId: "console" });
        expect(received[0]?.messageId).not.toBe(received[1]?.messageId);
    });

    it("keeps dispatching after a handler throws", async () => {
        const input = new PassThrough();
        const connector = new ConsoleConnector({ input, output: new PassThrough() });
        const received: string[] = [];
        connector.onMessage((message) => {
            if (message.text === "boom") {
                throw new Error("handler failed");
            }
            received.push(message.text);
        });

        const done = connector.start();
        input.end("boom\nok\n");
        await done;

        expect(received).toEqual(["ok"]);
    });

    it("stops delivering to unsubscribed handlers", async () => {
        const input = new PassThrough();
        const connector = new ConsoleConnector({ input, output: new PassThrough() });
        const received: string[] = [];
        const unsubscribe = connector.onMessage((message) => {
            received.push(message.text);
        });
        unsubscribe();

        const done = connector.start();
        input.end("hello\n");
        await done;

        expect(received).toEqual([]);
    });

    it("writes replies as lines", async () => {
        const capture = outputCapture();
        const connector = new ConsoleConnector({ input: new PassThrough(), output: capture.output });

        await connector.sendMessage("console", "reply one");
        await connector.sendMessage("console", "reply two");

        expect(capture.text()).toBe("reply one\nreply two\n");
    });
});

import { describe, expect, it, vi } from "vitest";

import { onShutdown, requestShutdown } from "./shutdown.js";

describe("shutdown", () => {
    it("runs registered handlers once and skips unregistered ones", async () => {
        const kept = vi.fn();
        const failing = vi.fn(async () => {
            throw new Error("close failed");
        });
        const removed = vi.fn();
        onShutdown("kept", kept);
        onShutdown("failing", failing);
        const unregister = onShutdown("removed", removed);
        unregister();

        await expect(requestShutdown("SIGINT")).resolves.toBe("SIGINT");
        await expect(requestShutdown("SIGTERM")).resolves.toBe("SIGINT");

        expect(kept).toHaveBeenCalledTimes(1);
        expect(failing).toHaveBeenCalledTimes(1);
        expect(removed).not.toHaveBeenCalled();
    });
});

import { describe, expect, it, vi } from "vitest";

import { AvailabilityCache } from "./availabilityCache.js";

describe("AvailabilityCache", () => {
    it("probes each key once until cleared", async () => {
        const cache = new AvailabilityCache();
        const probe = vi.fn(async () => true);

        await expect(cache.resolve("claude_api", probe)).resolves.toBe(true);
        await expect(cache.resolve("claude_api", probe)).resolves.toBe(true);
        expect(probe).toHaveBeenCalledTimes(1);

        cache.clear();
        await cache.resolve("claude_api", probe);
        expect(probe).toHaveBeenCalledTimes(2);
    });

    it("shares one probe between concurrent lookups", async () => {
        const cache = new AvailabilityCache();
        let release: (value: boolean) => void = () => undefined;
        const probe = vi.fn(
            () =>
                new Promise<boolean>((resolve) => {
                    release = resolve;
                })
        );

        const first = cache.resolve("gemini_cli", probe);
        const second = cache.resolve("gemini_cli", probe);
        release(false);

        await expect(Promise.all([first, second])).resolves.toEqual([false, false]);
        expect(probe).toHaveBeenCalledTimes(1);
    });

    it("keeps keys independent", async () => {
        const cache = new AvailabilityCache();

        await cache.resolve("claude_api", async () => true);

        expect(cache.has("claude_api")).toBe(true);
        expect(cache.has("claude_cli")).toBe(false);
    });

    it("treats a throwing probe as unavailable and remembers it", async () => {
        const cache = new AvailabilityCache();
        const probe = vi.fn(async (): Promise<boolean> => {
            throw new Error("probe exploded");
        });

        await expect(cache.resolve("openai_api", probe)).resolves.toBe(false);
        await expect(cache.resolve("openai_api", probe)).resolves.toBe(false);
        expect(probe).toHaveBeenCalledTimes(1);
    });
});

import { getLogger } from "../log.js";

const logger = getLogger("executors.availability");

/**
 * Memoizes availability probes per key until clear() is called.
 * Concurrent lookups for one key share a single probe; a probe that throws counts as unavailable.
 */
export class AvailabilityCache {
    private entries = new Map<string, Promise<boolean>>();

    resolve(key: string, probe: () => Promise<boolean>): Promise<boolean> {
        const cached = this.entries.get(key);
        if (cached) {
            return cached;
        }
        const pending = probeRun(key, probe);
        this.entries.set(key, pending);
        return pending;
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    clear(): void {
        this.entries.clear();
        logger.debug("availability: Cache cleared");
    }
}

async function probeRun(key: string, probe: () => Promise<boolean>): Promise<boolean> {
    try {
        return await probe();
    } catch (error) {
        logger.warn({ key, error }, "availability: Probe failed, treating as unavailable");
        return false;
    }
}

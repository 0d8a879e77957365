import { getLogger } from "../log.js";

const logger = getLogger("dedup.cache");

export const DEFAULT_DEDUP_CAPACITY = 1000;

/**
 * Remembers recently handled message ids in a fixed-capacity FIFO window.
 * The order array and the membership set always hold the same ids.
 */
export class DedupCache {
    readonly capacity: number;
    private order: string[] = [];
    private members = new Set<string>();

    constructor(capacity: number = DEFAULT_DEDUP_CAPACITY) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new Error(`Dedup capacity must be a positive integer: ${capacity}`);
        }
        this.capacity = capacity;
    }

    get size(): number {
        return this.members.size;
    }

    isProcessed(messageId: string): boolean {
        const duplicate = this.members.has(messageId);
        if (duplicate) {
            logger.info({ messageId }, "dedup: Duplicate message skipped");
        }
        return duplicate;
    }

    markProcessed(messageId: string): void {
        if (this.members.has(messageId)) {
            return;
        }
        if (this.order.length >= this.capacity) {
            const oldest = this.order.shift();
            if (oldest !== undefined) {
                this.members.delete(oldest);
                logger.debug({ messageId: oldest }, "dedup: Evicted oldest message");
            }
        }
        this.order.push(messageId);
        this.members.add(messageId);
    }
}

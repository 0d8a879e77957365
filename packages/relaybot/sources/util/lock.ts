/**
 * Serializes async work; callers run one at a time in arrival order.
 */
export class AsyncLock {
    private locked = false;
    private waiters: Array<() => void> = [];

    async inLock<T>(func: () => Promise<T> | T): Promise<T> {
        await this.acquire();
        try {
            return await func();
        } finally {
            this.release();
        }
    }

    private async acquire(): Promise<void> {
        if (!this.locked) {
            this.locked = true;
            return;
        }
        await new Promise<void>((resolve) => {
            this.waiters.push(resolve);
        });
    }

    private release(): void {
        const next = this.waiters.shift();
        if (next) {
            // Ownership passes straight to the next waiter.
            next();
            return;
        }
        this.locked = false;
    }
}

/**
 * Counting semaphore capping simultaneous in-flight calls to one upstream.
 * Waiters are served in FIFO order.
 */
export class Semaphore {
    private available: number;
    private readonly waiters: Array<() => void> = [];

    constructor(readonly limit: number) {
        if (!Number.isInteger(limit) || limit < 1) {
            throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
        }
        this.available = limit;
    }

    get inFlight(): number {
        return this.limit - this.available;
    }

    get pending(): number {
        return this.waiters.length;
    }

    async acquire(): Promise<void> {
        if (this.available > 0) {
            this.available -= 1;
            return;
        }
        await new Promise<void>((resolve) => {
            this.waiters.push(resolve);
        });
    }

    release(): void {
        const next = this.waiters.shift();
        if (next) {
            // Permit passes straight to the next waiter.
            next();
            return;
        }
        this.available = Math.min(this.limit, this.available + 1);
    }

    async run<T>(fn: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await fn();
        } finally {
            this.release();
        }
    }
}

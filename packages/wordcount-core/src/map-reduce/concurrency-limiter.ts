/**
 * ConcurrencyLimiter
 *
 * Caps the number of partitions being mapped at once. Slots are handed out
 * in FIFO order.
 */

import { DEFAULT_MAX_CONCURRENCY } from '../config/defaults';

export class ConcurrencyLimiter {
    private running = 0;
    private waiting: Array<() => void> = [];

    /**
     * @param maxConcurrency Maximum number of concurrent operations
     */
    constructor(private readonly maxConcurrency: number = DEFAULT_MAX_CONCURRENCY) {
        if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
            throw new Error('maxConcurrency must be a positive integer');
        }
    }

    get runningCount(): number {
        return this.running;
    }

    get queuedCount(): number {
        return this.waiting.length;
    }

    get limit(): number {
        return this.maxConcurrency;
    }

    /**
     * Run `fn` once a slot is free. The slot is released whether `fn`
     * resolves or rejects.
     */
    async run<T>(fn: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await fn();
        } finally {
            this.release();
        }
    }

    /**
     * Like Promise.all over task factories, never more than `limit` at once.
     * Results keep input order.
     */
    async all<T>(tasks: Array<() => Promise<T>>): Promise<T[]> {
        return Promise.all(tasks.map(task => this.run(task)));
    }

    private acquire(): Promise<void> {
        if (this.running < this.maxConcurrency) {
            this.running++;
            return Promise.resolve();
        }
        return new Promise<void>(resolve => {
            this.waiting.push(resolve);
        });
    }

    private release(): void {
        this.running--;
        const next = this.waiting.shift();
        if (next) {
            this.running++;
            next();
        }
    }
}

export { DEFAULT_MAX_CONCURRENCY };

/**
 * Tests for ConcurrencyLimiter
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import { describe, it, expect } from 'vitest';
import { ConcurrencyLimiter, DEFAULT_MAX_CONCURRENCY } from '../../src/map-reduce/concurrency-limiter';

function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

describe('ConcurrencyLimiter', () => {
    it('constructor throws for invalid maxConcurrency', () => {
        expect(() => new ConcurrencyLimiter(0)).toThrow(/maxConcurrency must be a positive integer/);
        expect(() => new ConcurrencyLimiter(-1)).toThrow(/maxConcurrency must be a positive integer/);
        expect(() => new ConcurrencyLimiter(1.5)).toThrow(/maxConcurrency must be a positive integer/);
    });

    it('default maxConcurrency is 4', () => {
        expect(DEFAULT_MAX_CONCURRENCY).toBe(4);
        expect(new ConcurrencyLimiter().limit).toBe(4);
    });

    it('runningCount and queuedCount are initially 0', () => {
        const limiter = new ConcurrencyLimiter(3);
        expect(limiter.runningCount).toBe(0);
        expect(limiter.queuedCount).toBe(0);
    });

    it('run() returns the result and propagates errors', async () => {
        const limiter = new ConcurrencyLimiter(2);
        await expect(limiter.run(async () => 42)).resolves.toBe(42);
        await expect(
            limiter.run(async () => { throw new Error('test error'); })
        ).rejects.toThrow(/test error/);
        expect(limiter.runningCount).toBe(0);
    });

    it('all() keeps input order', async () => {
        const limiter = new ConcurrencyLimiter(3);
        const results = await limiter.all([
            async () => { await delay(15); return 'slow'; },
            async () => 'fast',
            async () => { await delay(5); return 'medium'; },
        ]);
        expect(results).toEqual(['slow', 'fast', 'medium']);
    });

    it('all() never exceeds the limit', async () => {
        const limiter = new ConcurrencyLimiter(2);
        let active = 0;
        let peak = 0;

        const tasks = Array.from({ length: 6 }, (_, i) => async () => {
            active++;
            peak = Math.max(peak, active);
            await delay(5);
            active--;
            return i;
        });

        const results = await limiter.all(tasks);
        expect(results).toEqual([0, 1, 2, 3, 4, 5]);
        expect(peak).toBe(2);
    });

    it('queues tasks beyond the limit', async () => {
        const limiter = new ConcurrencyLimiter(1);
        let release: () => void = () => {};
        const blocker = new Promise<void>(resolve => { release = resolve; });

        const first = limiter.run(() => blocker);
        const second = limiter.run(async () => 'second');

        await Promise.resolve();
        expect(limiter.runningCount).toBe(1);
        expect(limiter.queuedCount).toBe(1);

        release();
        await first;
        await expect(second).resolves.toBe('second');
        expect(limiter.queuedCount).toBe(0);
    });

    it('frees the slot after a rejection', async () => {
        const limiter = new ConcurrencyLimiter(1);
        const failing = limiter.run(async () => { throw new Error('boom'); });
        const next = limiter.run(async () => 'next');
        await expect(failing).rejects.toThrow('boom');
        await expect(next).resolves.toBe('next');
    });
});

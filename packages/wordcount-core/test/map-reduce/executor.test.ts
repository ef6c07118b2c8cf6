/**
 * Tests for MapReduceExecutor
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MapReduceExecutor, createExecutor } from '../../src/map-reduce/executor';
import { SumReducer } from '../../src/map-reduce/reducers';
import type {
    JobProgress,
    MapContext,
    MapOutput,
    MapReduceJob,
    Mapper,
    Reducer,
    Splitter,
    WorkItem,
} from '../../src/map-reduce/types';
import { nullLogger, resetLogger, setLogger } from '../../src/logger';

// ============================================================================
// Test job: count whitespace-separated words, one work item per sentence
// ============================================================================

const sentenceSplitter: Splitter<string[], string> = {
    split(input: string[]): WorkItem<string>[] {
        return input.map((sentence, index) => ({ id: `item-${index}`, data: sentence }));
    },
};

class WordMapper implements Mapper<string, number> {
    readonly contexts: MapContext[] = [];

    async map(item: WorkItem<string>, context: MapContext): Promise<MapOutput<number>> {
        this.contexts.push(context);
        const words = item.data.split(' ').filter(word => word.length > 0);
        return {
            pairs: words.map(word => ({ key: word, value: 1 })),
            counters: { sentences: 1, words: words.length },
        };
    }
}

function createJob(mapper: Mapper<string, number> = new WordMapper()): MapReduceJob<string[], string, number, number> {
    const reducer = new SumReducer();
    return {
        id: 'test-words',
        name: 'Test words',
        splitter: sentenceSplitter,
        mapper,
        combiner: reducer,
        reducer,
    };
}

describe('MapReduceExecutor', () => {
    beforeEach(() => {
        setLogger(nullLogger);
    });

    afterEach(() => {
        resetLogger();
    });

    it('maps, groups and reduces into sorted output', async () => {
        const result = await createExecutor().execute(createJob(), ['b a', 'a c a', 'b']);

        expect(result.success).toBe(true);
        expect(result.output).toEqual([
            { key: 'a', value: 3 },
            { key: 'b', value: 2 },
            { key: 'c', value: 1 },
        ]);
        expect(result.counters).toEqual({ sentences: 3, words: 6 });
        expect(result.failedPhase).toBeUndefined();
    });

    it('reports execution statistics', async () => {
        const result = await new MapReduceExecutor({ maxConcurrency: 2 }).execute(createJob(), ['a a', 'b']);

        expect(result.executionStats).toMatchObject({
            totalItems: 2,
            successfulMaps: 2,
            failedMaps: 0,
            retriedMaps: 0,
            maxConcurrency: 2,
            combined: true,
        });
        // Combined map output: {a:2} and {b:1}
        expect(result.reduceStats).toMatchObject({ inputCount: 2, outputCount: 2, mergedCount: 0 });
    });

    it('gives the same output with and without the combiner', async () => {
        const input = ['x y x', 'y y', 'z x'];
        const combined = await createExecutor({ combine: true }).execute(createJob(), input);
        const plain = await createExecutor({ combine: false }).execute(createJob(), input);

        expect(plain.executionStats.combined).toBe(false);
        expect(plain.reduceStats?.inputCount).toBe(7);
        expect(combined.reduceStats?.inputCount).toBe(5);
        expect(plain.output).toEqual(combined.output);
    });

    it('skips combining when the job has no combiner', async () => {
        const job = createJob();
        delete job.combiner;
        const result = await createExecutor({ combine: true }).execute(job, ['a a']);
        expect(result.executionStats.combined).toBe(false);
        expect(result.reduceStats?.inputCount).toBe(2);
    });

    it('returns an empty successful result for no work items', async () => {
        const result = await createExecutor().execute(createJob(), []);
        expect(result.success).toBe(true);
        expect(result.output).toEqual([]);
        expect(result.executionStats.totalItems).toBe(0);
    });

    it('fails in the split phase when the splitter throws', async () => {
        const job = createJob();
        job.splitter = {
            split(): WorkItem<string>[] {
                throw new Error('bad input');
            },
        };
        const result = await createExecutor().execute(job, ['a']);
        expect(result.success).toBe(false);
        expect(result.failedPhase).toBe('split');
        expect(result.error).toBe('Split phase failed: bad input');
        expect(result.output).toBeUndefined();
    });

    it('fails the whole run when a partition fails', async () => {
        const mapper: Mapper<string, number> = {
            async map(item) {
                if (item.data === 'bad') {
                    throw new Error('cannot map');
                }
                return { pairs: [{ key: item.data, value: 1 }] };
            },
        };
        const result = await createExecutor().execute(createJob(mapper), ['ok', 'bad', 'fine']);

        expect(result.success).toBe(false);
        expect(result.failedPhase).toBe('map');
        expect(result.output).toBeUndefined();
        expect(result.error).toBe('1 partition failed: cannot map');
        expect(result.executionStats.failedMaps).toBe(1);
        expect(result.executionStats.successfulMaps).toBe(2);
    });

    it('summarizes several failures with different errors', async () => {
        const mapper: Mapper<string, number> = {
            async map(item) {
                throw new Error(`fail ${item.id}`);
            },
        };
        const result = await createExecutor().execute(createJob(mapper), ['a', 'b']);
        expect(result.error).toBe('2 partitions failed with 2 different errors');
    });

    it('re-runs a failed partition from its original data', async () => {
        const seen: string[] = [];
        let calls = 0;
        const mapper: Mapper<string, number> = {
            async map(item, context) {
                calls++;
                seen.push(`${item.data}@${context.attempt}`);
                if (context.attempt === 0) {
                    throw new Error('transient');
                }
                return { pairs: [{ key: item.data, value: 1 }], counters: { mapped: 1 } };
            },
        };

        const result = await createExecutor({
            retryOnFailure: true,
            retryAttempts: 2,
            retryDelayMs: 0,
        }).execute(createJob(mapper), ['only']);

        expect(result.success).toBe(true);
        expect(calls).toBe(2);
        expect(seen).toEqual(['only@0', 'only@1']);
        expect(result.output).toEqual([{ key: 'only', value: 1 }]);
        expect(result.counters).toEqual({ mapped: 1 });
        expect(result.mapResults[0].attempts).toBe(2);
        expect(result.executionStats.retriedMaps).toBe(1);
    });

    it('gives up after the configured attempts', async () => {
        let calls = 0;
        const mapper: Mapper<string, number> = {
            async map() {
                calls++;
                throw new Error('permanent');
            },
        };

        const result = await createExecutor({
            retryOnFailure: true,
            retryAttempts: 2,
            retryDelayMs: 0,
        }).execute(createJob(mapper), ['x']);

        expect(calls).toBe(3);
        expect(result.success).toBe(false);
        expect(result.mapResults[0]).toMatchObject({ success: false, error: 'permanent', attempts: 3 });
    });

    it('does not re-run without retryOnFailure', async () => {
        let calls = 0;
        const mapper: Mapper<string, number> = {
            async map() {
                calls++;
                throw new Error('once');
            },
        };
        await createExecutor().execute(createJob(mapper), ['x']);
        expect(calls).toBe(1);
    });

    it('fails in the reduce phase when the reducer throws', async () => {
        const job = createJob();
        const failingReducer: Reducer<number, number> = {
            reduce(key) {
                throw new Error(`cannot reduce ${key}`);
            },
        };
        job.reducer = failingReducer;

        const result = await createExecutor().execute(job, ['a']);
        expect(result.success).toBe(false);
        expect(result.failedPhase).toBe('reduce');
        expect(result.error).toBe('Reduce phase failed: cannot reduce a');
    });

    it('prefers executor options over job options', async () => {
        const job = createJob();
        job.options = { maxConcurrency: 7, combine: false };
        const result = await createExecutor({ maxConcurrency: 3 }).execute(job, ['a']);
        expect(result.executionStats.maxConcurrency).toBe(3);
        expect(result.executionStats.combined).toBe(false);
    });

    it('hands each mapper call its position in the run', async () => {
        const mapper = new WordMapper();
        await createExecutor({ maxConcurrency: 1 }).execute(createJob(mapper), ['a', 'b']);
        expect(mapper.contexts.map(c => [c.itemIndex, c.attempt])).toEqual([[0, 0], [1, 0]]);
    });

    it('reports progress through every phase', async () => {
        const phases: JobProgress['phase'][] = [];
        await createExecutor({ onProgress: progress => phases.push(progress.phase) })
            .execute(createJob(), ['a', 'b']);

        expect(phases[0]).toBe('splitting');
        expect(phases).toContain('mapping');
        expect(phases.slice(-3)).toEqual(['shuffling', 'reducing', 'complete']);
    });

    it('calls onItemComplete per item and survives callback errors', async () => {
        const onItemComplete = vi.fn(() => {
            throw new Error('callback broke');
        });
        const result = await createExecutor({ onItemComplete }).execute(createJob(), ['a', 'b']);
        expect(onItemComplete).toHaveBeenCalledTimes(2);
        expect(result.success).toBe(true);
    });

    // ========================================================================
    // Streamed work items
    // ========================================================================

    describe('with an async splitter', () => {
        function streamingJob(
            produce: (input: string[]) => AsyncGenerator<WorkItem<string>>,
            mapper: Mapper<string, number> = new WordMapper()
        ): MapReduceJob<string[], string, number, number> {
            const job = createJob(mapper);
            job.splitter = { split: produce };
            return job;
        }

        it('maps streamed items like an array of items', async () => {
            const job = streamingJob(async function* (input) {
                for (const [index, sentence] of input.entries()) {
                    yield { id: `item-${index}`, data: sentence };
                }
            });
            const result = await createExecutor({ maxConcurrency: 2 }).execute(job, ['b a', 'a c a', 'b']);

            expect(result.success).toBe(true);
            expect(result.output).toEqual([
                { key: 'a', value: 3 },
                { key: 'b', value: 2 },
                { key: 'c', value: 1 },
            ]);
            expect(result.executionStats.totalItems).toBe(3);
            expect(result.mapResults.map(r => r.workItemId)).toEqual(['item-0', 'item-1', 'item-2']);
        });

        it('pulls items only while a slot is free', async () => {
            let produced = 0;
            let finished = 0;
            let mostUnfinishedAtPull = 0;
            const mapper: Mapper<string, number> = {
                async map(item) {
                    await new Promise(resolve => setTimeout(resolve, 5));
                    finished++;
                    return { pairs: [{ key: item.data, value: 1 }] };
                },
            };
            const job = streamingJob(async function* () {
                for (let i = 0; i < 6; i++) {
                    mostUnfinishedAtPull = Math.max(mostUnfinishedAtPull, produced - finished);
                    produced++;
                    yield { id: `item-${i}`, data: `w${i}` };
                }
            }, mapper);

            const result = await createExecutor({ maxConcurrency: 2 }).execute(job, []);

            expect(result.success).toBe(true);
            expect(result.output).toHaveLength(6);
            expect(mostUnfinishedAtPull).toBe(1);
        });

        it('fails in the split phase when the stream throws, after started items settle', async () => {
            const cause = new Error('disk vanished');
            const mapped: string[] = [];
            const mapper: Mapper<string, number> = {
                async map(item) {
                    await new Promise(resolve => setTimeout(resolve, 5));
                    mapped.push(item.id);
                    return { pairs: [] };
                },
            };
            const job = streamingJob(async function* () {
                yield { id: 'item-0', data: 'a' };
                throw cause;
            }, mapper);

            const result = await createExecutor().execute(job, []);

            expect(result.success).toBe(false);
            expect(result.failedPhase).toBe('split');
            expect(result.error).toBe('Split phase failed: disk vanished');
            expect(result.cause).toBe(cause);
            expect(mapped).toEqual(['item-0']);
        });

        it('reports the final item count once the input is exhausted', async () => {
            const progress: JobProgress[] = [];
            const job = streamingJob(async function* () {
                yield { id: 'item-0', data: 'a' };
                yield { id: 'item-1', data: 'b' };
            });

            await createExecutor({ maxConcurrency: 1, onProgress: p => progress.push(p) }).execute(job, []);

            const mapping = progress.filter(p => p.phase === 'mapping');
            expect(mapping[0]).toMatchObject({ totalItems: 0, inputComplete: false });
            const firstComplete = mapping.find(p => p.inputComplete);
            expect(firstComplete?.totalItems).toBe(2);
            expect(mapping.filter(p => !p.inputComplete).every(p => p.percentage === 0)).toBe(true);
            expect(mapping[mapping.length - 1]).toMatchObject({
                totalItems: 2,
                inputComplete: true,
                completedItems: 2,
                percentage: 85,
            });
        });
    });
});

/**
 * Map-Reduce Executor
 *
 * Runs a keyed map-reduce job in process: split, map with bounded
 * concurrency and re-runs of failed items, optional per-item combine,
 * group by key once every item has settled, then reduce each key.
 */

import { ConcurrencyLimiter } from './concurrency-limiter';
import { combineLocally, compareKeys, groupByKey, mergeCounters } from './shuffle';
import {
    DEFAULT_MAP_REDUCE_OPTIONS,
    Counters,
    ExecutionStats,
    ExecutorOptions,
    JobProgress,
    KeyValue,
    MapContext,
    MapOutput,
    MapReduceJob,
    MapReduceOptions,
    MapReduceResult,
    MapResult,
    ReduceStats,
    WorkItem
} from './types';
import { getLogger, LogCategory } from '../logger';
import { getErrorCauseMessage } from '../errors';

/**
 * Generates a unique execution ID
 */
function generateExecutionId(): string {
    return `mr-${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

export class MapReduceExecutor {
    private readonly options: ExecutorOptions;

    constructor(options: ExecutorOptions = {}) {
        this.options = options;
    }

    /**
     * Execute a map-reduce job
     */
    async execute<TInput, TData, V, TOut>(
        job: MapReduceJob<TInput, TData, V, TOut>,
        input: TInput
    ): Promise<MapReduceResult<V, TOut>> {
        const executionId = generateExecutionId();
        const startTime = Date.now();
        const logger = getLogger();

        // Executor options win over job options, which win over defaults
        const options: MapReduceOptions = {
            ...DEFAULT_MAP_REDUCE_OPTIONS,
            ...job.options,
            ...definedOptions(this.options)
        };
        const jobName = options.jobName ?? job.name;
        const combine = options.combine && job.combiner !== undefined;

        this.reportProgress({
            phase: 'splitting',
            totalItems: 0,
            inputComplete: false,
            completedItems: 0,
            failedItems: 0,
            percentage: 0,
            message: 'Splitting input into partitions...'
        });

        // 1. Split Phase, 2. Map Phase (with local combine): an async splitter
        // keeps yielding while earlier partitions are mapped
        let workItems: WorkItem<TData>[] | AsyncIterable<WorkItem<TData>>;
        try {
            workItems = job.splitter.split(input);
        } catch (error) {
            return this.createFailedResult(startTime, options, error);
        }

        const mapStartTime = Date.now();
        const { mapResults, splitFailure } = await this.executeMapPhase(job, workItems, executionId, options, combine);
        const mapPhaseTimeMs = Date.now() - mapStartTime;

        if (splitFailure) {
            return this.createFailedResult(startTime, options, splitFailure.cause);
        }

        logger.debug(LogCategory.MAP_REDUCE, `${jobName} [${executionId}]: ${mapResults.length} partitions`);

        if (mapResults.length === 0) {
            return this.createEmptyResult(startTime, options, combine);
        }

        const successfulMaps = mapResults.filter(r => r.success).length;
        const failedMaps = mapResults.length - successfulMaps;
        const retriedMaps = mapResults.reduce((sum, r) => sum + r.attempts - 1, 0);

        const counters: Counters = {};
        for (const result of mapResults) {
            mergeCounters(counters, result.output?.counters);
        }

        const baseStats = {
            totalItems: mapResults.length,
            successfulMaps,
            failedMaps,
            retriedMaps,
            mapPhaseTimeMs,
            maxConcurrency: options.maxConcurrency,
            combined: combine
        };

        // A missing partition would silently undercount every key it touches
        if (failedMaps > 0) {
            const error = describeMapFailures(mapResults);
            logger.error(LogCategory.MAP_REDUCE, `${jobName}: ${error}`);
            return {
                success: false,
                counters,
                mapResults,
                totalTimeMs: Date.now() - startTime,
                executionStats: { ...baseStats, shufflePhaseTimeMs: 0, reducePhaseTimeMs: 0 },
                error,
                failedPhase: 'map'
            };
        }

        // 3. Shuffle Phase: every item has settled, so each key's group is complete
        this.reportProgress({
            phase: 'shuffling',
            totalItems: mapResults.length,
            inputComplete: true,
            completedItems: successfulMaps,
            failedItems: 0,
            percentage: 88,
            message: 'Grouping values by key...'
        });

        const shuffleStartTime = Date.now();
        const groups = new Map<string, V[]>();
        let inputCount = 0;
        for (const result of mapResults) {
            const pairs = result.output?.pairs ?? [];
            inputCount += pairs.length;
            groupByKey(pairs, groups);
        }
        const keys = [...groups.keys()].sort(compareKeys);
        const shufflePhaseTimeMs = Date.now() - shuffleStartTime;

        // 4. Reduce Phase
        this.reportProgress({
            phase: 'reducing',
            totalItems: mapResults.length,
            inputComplete: true,
            completedItems: successfulMaps,
            failedItems: 0,
            percentage: 90,
            message: `Reducing ${keys.length} keys...`
        });

        const reduceStartTime = Date.now();
        const output: KeyValue<TOut>[] = [];
        try {
            for (const key of keys) {
                const values = groups.get(key) ?? [];
                output.push({ key, value: job.reducer.reduce(key, values, { executionId, phase: 'reduce' }) });
            }
        } catch (error) {
            const errorMsg = getErrorCauseMessage(error);
            logger.error(LogCategory.MAP_REDUCE, `${jobName}: reduce phase failed: ${errorMsg}`);
            return {
                success: false,
                counters,
                mapResults,
                totalTimeMs: Date.now() - startTime,
                executionStats: {
                    ...baseStats,
                    shufflePhaseTimeMs,
                    reducePhaseTimeMs: Date.now() - reduceStartTime
                },
                error: `Reduce phase failed: ${errorMsg}`,
                failedPhase: 'reduce'
            };
        }
        const reducePhaseTimeMs = Date.now() - reduceStartTime;

        const reduceStats: ReduceStats = {
            inputCount,
            outputCount: output.length,
            mergedCount: inputCount - output.length,
            reduceTimeMs: reducePhaseTimeMs
        };

        const executionStats: ExecutionStats = {
            ...baseStats,
            shufflePhaseTimeMs,
            reducePhaseTimeMs
        };

        this.reportProgress({
            phase: 'complete',
            totalItems: mapResults.length,
            inputComplete: true,
            completedItems: successfulMaps,
            failedItems: 0,
            percentage: 100,
            message: `Complete: ${mapResults.length} partitions, ${output.length} keys`
        });

        logger.debug(
            LogCategory.MAP_REDUCE,
            `${jobName} [${executionId}]: reduced ${inputCount} values into ${output.length} keys`
        );

        return {
            success: true,
            output,
            counters,
            mapResults,
            reduceStats,
            totalTimeMs: Date.now() - startTime,
            executionStats
        };
    }

    /**
     * Execute the map phase with concurrency limiting. Work items are pulled
     * from the splitter only while fewer than `maxConcurrency` are in flight.
     * If the splitter fails, the items already started still settle.
     */
    private async executeMapPhase<TData, V>(
        job: MapReduceJob<unknown, TData, V, unknown>,
        workItems: WorkItem<TData>[] | AsyncIterable<WorkItem<TData>>,
        executionId: string,
        options: MapReduceOptions,
        combine: boolean
    ): Promise<MapPhaseOutcome<V>> {
        const limiter = new ConcurrencyLimiter(options.maxConcurrency);
        const knownTotal = Array.isArray(workItems) ? workItems.length : undefined;
        const mapResults: MapResult<V>[] = [];
        const inFlight = new Set<Promise<void>>();
        let seenCount = 0;
        let completedCount = 0;
        let failedCount = 0;
        let inputComplete = knownTotal !== undefined;
        let splitFailure: { cause: unknown } | undefined;

        const reportMapping = (): void => {
            const totalItems = knownTotal ?? seenCount;
            const settled = completedCount + failedCount;
            this.reportProgress({
                phase: 'mapping',
                totalItems,
                inputComplete,
                completedItems: completedCount,
                failedItems: failedCount,
                percentage: inputComplete && totalItems > 0 ? Math.round((settled / totalItems) * 85) : 0,
                message: inputComplete
                    ? `Processed ${settled}/${totalItems} partitions...`
                    : `Processed ${settled} of ${totalItems} partitions read so far...`
            });
        };

        const runItem = async (item: WorkItem<TData>, index: number): Promise<void> => {
            const result = await limiter.run(() => this.executeMapItem(job, item, executionId, index, options, combine));
            mapResults[index] = result;

            if (result.success) {
                completedCount++;
            } else {
                failedCount++;
            }
            reportMapping();

            if (this.options.onItemComplete) {
                try {
                    this.options.onItemComplete(item, result);
                } catch (error) {
                    getLogger().warn(
                        LogCategory.MAP_REDUCE,
                        `onItemComplete callback failed for ${item.id}: ${getErrorCauseMessage(error)}`
                    );
                }
            }
        };

        reportMapping();

        const items = iterateItems(workItems);
        for (;;) {
            let next: IteratorResult<WorkItem<TData>>;
            try {
                next = await items.next();
            } catch (error) {
                splitFailure = { cause: error };
                break;
            }
            if (next.done) {
                break;
            }

            const task: Promise<void> = runItem(next.value, seenCount++).finally(() => {
                inFlight.delete(task);
            });
            inFlight.add(task);

            if (inFlight.size >= options.maxConcurrency) {
                await Promise.race(inFlight);
            }
        }

        if (!splitFailure && !inputComplete) {
            inputComplete = true;
            reportMapping();
        }

        await Promise.all(inFlight);
        return { mapResults, splitFailure };
    }

    /**
     * Execute a single map item, re-running it from its original data on failure
     */
    private async executeMapItem<TData, V>(
        job: MapReduceJob<unknown, TData, V, unknown>,
        item: WorkItem<TData>,
        executionId: string,
        itemIndex: number,
        options: MapReduceOptions,
        combine: boolean
    ): Promise<MapResult<V>> {
        const startTime = Date.now();
        const maxAttempts = options.retryOnFailure ? (options.retryAttempts ?? 1) + 1 : 1;
        const retryDelayMs = options.retryDelayMs ?? 0;
        let lastError = 'Unknown error';

        for (let attempt = 0; attempt < maxAttempts; attempt++) {
            const context: MapContext = { executionId, itemIndex, attempt };
            try {
                const mapped = await job.mapper.map(item, context);
                const output: MapOutput<V> = combine && job.combiner
                    ? {
                        pairs: combineLocally(mapped.pairs, job.combiner, {
                            executionId,
                            phase: 'combine',
                            workItemId: item.id
                        }),
                        counters: mapped.counters
                    }
                    : mapped;

                return {
                    workItemId: item.id,
                    success: true,
                    output,
                    attempts: attempt + 1,
                    executionTimeMs: Date.now() - startTime
                };
            } catch (error) {
                lastError = getErrorCauseMessage(error);

                if (attempt < maxAttempts - 1) {
                    getLogger().warn(
                        LogCategory.MAP_REDUCE,
                        `Partition ${item.id} failed (attempt ${attempt + 1}/${maxAttempts}), re-running: ${lastError}`
                    );
                    await this.delay(retryDelayMs * (attempt + 1));
                }
            }
        }

        return {
            workItemId: item.id,
            success: false,
            error: lastError,
            attempts: maxAttempts,
            executionTimeMs: Date.now() - startTime
        };
    }

    private delay(ms: number): Promise<void> {
        if (ms <= 0) {
            return Promise.resolve();
        }
        return new Promise(resolve => setTimeout(resolve, ms));
    }

    private reportProgress(progress: JobProgress): void {
        if (this.options.onProgress) {
            this.options.onProgress(progress);
        }
    }

    private createFailedResult<V, TOut>(
        startTime: number,
        options: MapReduceOptions,
        cause: unknown
    ): MapReduceResult<V, TOut> {
        const error = `Split phase failed: ${getErrorCauseMessage(cause)}`;
        getLogger().error(LogCategory.MAP_REDUCE, error);
        return {
            success: false,
            counters: {},
            mapResults: [],
            totalTimeMs: Date.now() - startTime,
            executionStats: emptyStats(options, false),
            error,
            cause,
            failedPhase: 'split'
        };
    }

    private createEmptyResult<V, TOut>(
        startTime: number,
        options: MapReduceOptions,
        combine: boolean
    ): MapReduceResult<V, TOut> {
        return {
            success: true,
            output: [],
            counters: {},
            mapResults: [],
            reduceStats: {
                inputCount: 0,
                outputCount: 0,
                mergedCount: 0,
                reduceTimeMs: 0
            },
            totalTimeMs: Date.now() - startTime,
            executionStats: emptyStats(options, combine)
        };
    }
}

interface MapPhaseOutcome<V> {
    mapResults: MapResult<V>[];
    /** Set when the splitter threw while yielding */
    splitFailure?: { cause: unknown };
}

async function* iterateItems<TData>(
    workItems: WorkItem<TData>[] | AsyncIterable<WorkItem<TData>>
): AsyncGenerator<WorkItem<TData>> {
    yield* workItems;
}

function emptyStats(options: MapReduceOptions, combined: boolean): ExecutionStats {
    return {
        totalItems: 0,
        successfulMaps: 0,
        failedMaps: 0,
        retriedMaps: 0,
        mapPhaseTimeMs: 0,
        shufflePhaseTimeMs: 0,
        reducePhaseTimeMs: 0,
        maxConcurrency: options.maxConcurrency,
        combined
    };
}

/**
 * Drop undefined entries so they don't shadow job options or defaults
 */
function definedOptions(options: ExecutorOptions): Partial<MapReduceOptions> {
    const result: Partial<MapReduceOptions> = {};
    if (options.maxConcurrency !== undefined) {
        result.maxConcurrency = options.maxConcurrency;
    }
    if (options.combine !== undefined) {
        result.combine = options.combine;
    }
    if (options.retryOnFailure !== undefined) {
        result.retryOnFailure = options.retryOnFailure;
    }
    if (options.retryAttempts !== undefined) {
        result.retryAttempts = options.retryAttempts;
    }
    if (options.retryDelayMs !== undefined) {
        result.retryDelayMs = options.retryDelayMs;
    }
    if (options.jobName !== undefined) {
        result.jobName = options.jobName;
    }
    return result;
}

function describeMapFailures<V>(mapResults: MapResult<V>[]): string {
    const failed = mapResults.filter(r => !r.success);
    if (failed.length === 1) {
        return `1 partition failed: ${failed[0].error ?? 'Unknown error'}`;
    }
    const uniqueErrors = [...new Set(failed.map(r => r.error ?? 'Unknown error'))];
    if (uniqueErrors.length === 1) {
        return `${failed.length} partitions failed: ${uniqueErrors[0]}`;
    }
    return `${failed.length} partitions failed with ${uniqueErrors.length} different errors`;
}

/**
 * Create a new MapReduceExecutor with the given options
 */
export function createExecutor(options?: ExecutorOptions): MapReduceExecutor {
    return new MapReduceExecutor(options);
}

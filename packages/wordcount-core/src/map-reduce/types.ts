/**
 * Map-Reduce Framework Types
 *
 * Core types and interfaces for the keyed map-reduce framework: pluggable
 * splitters, mappers, combiners and reducers, executed locally with bounded
 * concurrency. Keys are strings; values are whatever the job emits.
 */

import {
    DEFAULT_MAX_CONCURRENCY,
    DEFAULT_RETRY_ATTEMPTS,
    DEFAULT_RETRY_DELAY_MS
} from '../config/defaults';

/**
 * A single unit of work (one partition of the input)
 */
export interface WorkItem<TData> {
    /** Unique identifier for this work item */
    id: string;
    /** The input data for this work item */
    data: TData;
    /** Optional metadata about this work item */
    metadata?: Record<string, unknown>;
}

/**
 * A keyed value flowing from the map phase to the reduce phase
 */
export interface KeyValue<V> {
    key: string;
    value: V;
}

/**
 * Named tallies reported by mappers and summed across partitions
 */
export type Counters = Record<string, number>;

/**
 * What a mapper hands back for one work item
 */
export interface MapOutput<V> {
    /** Emitted pairs, in emission order */
    pairs: KeyValue<V>[];
    /** Optional counters for this work item */
    counters?: Counters;
}

/**
 * Context provided to mapper functions during execution
 */
export interface MapContext {
    /** Unique ID for this execution */
    executionId: string;
    /** Index of this item (0-based) */
    itemIndex: number;
    /** Attempt number for this item (0 for the first run) */
    attempt: number;
}

/**
 * Result from a single map operation
 */
export interface MapResult<V> {
    /** Work item ID this result corresponds to */
    workItemId: string;
    /** Whether the map operation succeeded */
    success: boolean;
    /** Mapper output, combined when the combine step ran (if successful) */
    output?: MapOutput<V>;
    /** Error message (if failed) */
    error?: string;
    /** Number of times the item was run */
    attempts: number;
    /** Time taken for this map operation in ms */
    executionTimeMs: number;
}

/**
 * Context provided to combiners and reducers
 */
export interface ReduceContext {
    /** Unique ID for this execution */
    executionId: string;
    /** Whether this is a local combine pass or the final reduce */
    phase: 'combine' | 'reduce';
    /** Work item being combined (combine phase only) */
    workItemId?: string;
}

/**
 * Statistics about the reduce phase
 */
export interface ReduceStats {
    /** Number of values fed to the reducer */
    inputCount: number;
    /** Number of keys produced */
    outputCount: number;
    /** inputCount - outputCount */
    mergedCount: number;
    /** Time taken for reduce phase in ms */
    reduceTimeMs: number;
}

/**
 * Options for map-reduce job execution
 */
export interface MapReduceOptions {
    /** Maximum number of concurrent map operations */
    maxConcurrency: number;
    /** Run the job's combiner over each work item's output (default: true) */
    combine: boolean;
    /** Whether to re-run failed map operations (default: false) */
    retryOnFailure: boolean;
    /** Number of re-runs for a failed operation (default: 1) */
    retryAttempts?: number;
    /** Base delay before a re-run, multiplied by the attempt number */
    retryDelayMs?: number;
    /** Optional job name for display/logging */
    jobName?: string;
}

/**
 * Default options for map-reduce execution
 */
export const DEFAULT_MAP_REDUCE_OPTIONS: MapReduceOptions = {
    maxConcurrency: DEFAULT_MAX_CONCURRENCY,
    combine: true,
    retryOnFailure: false,
    retryAttempts: DEFAULT_RETRY_ATTEMPTS,
    retryDelayMs: DEFAULT_RETRY_DELAY_MS
};

/**
 * Interface for a splitter that divides input into work items.
 *
 * An async iterable is consumed as it yields: items are mapped while later
 * ones are still being produced, and at most `maxConcurrency` of them are
 * held at once.
 */
export interface Splitter<TInput, TData> {
    split(input: TInput): WorkItem<TData>[] | AsyncIterable<WorkItem<TData>>;
}

/**
 * Interface for a mapper that processes individual work items.
 * Must be free of side effects outside its own output so that a work item
 * can be re-run from scratch.
 */
export interface Mapper<TData, V> {
    map(item: WorkItem<TData>, context: MapContext): Promise<MapOutput<V>>;
}

/**
 * Per-key reduction. Used for the final reduce and, with TOut = V, as a
 * combiner. A combiner must be associative and commutative so that running
 * it zero, one or many times does not change the final result.
 */
export interface Reducer<V, TOut> {
    reduce(key: string, values: V[], context: ReduceContext): TOut;
}

/**
 * Interface for a complete map-reduce job
 */
export interface MapReduceJob<TInput, TData, V, TOut> {
    /** Unique identifier for this job type */
    id: string;
    /** Display name for the job */
    name: string;
    /** Splitter that divides input into work items */
    splitter: Splitter<TInput, TData>;
    /** Mapper that processes individual work items */
    mapper: Mapper<TData, V>;
    /** Optional local pre-reduction applied per work item */
    combiner?: Reducer<V, V>;
    /** Final per-key reduction */
    reducer: Reducer<V, TOut>;
    /** Job-specific options (merged with defaults) */
    options?: Partial<MapReduceOptions>;
}

/**
 * Progress callback for tracking job execution
 */
export type ProgressCallback = (progress: JobProgress) => void;

/**
 * Callback fired as each work item settles
 */
export type ItemCompleteCallback = (item: WorkItem<unknown>, result: MapResult<unknown>) => void;

/**
 * Progress information during job execution
 */
export interface JobProgress {
    /** Current phase of execution */
    phase: 'splitting' | 'mapping' | 'shuffling' | 'reducing' | 'complete';
    /** Work items seen so far; the final count once `inputComplete` is set */
    totalItems: number;
    /** Whether the splitter has produced its last work item */
    inputComplete: boolean;
    /** Number of completed items */
    completedItems: number;
    /** Number of failed items */
    failedItems: number;
    /** Progress percentage (0-100) */
    percentage: number;
    /** Optional message for display */
    message?: string;
}

/**
 * Result of a map-reduce job execution
 */
export interface MapReduceResult<V, TOut> {
    /** Whether the overall job succeeded */
    success: boolean;
    /** Reduced output, one entry per key, sorted by key (only on success) */
    output?: KeyValue<TOut>[];
    /** Counters summed over successful work items */
    counters: Counters;
    /** Results from individual map operations */
    mapResults: MapResult<V>[];
    /** Statistics about the reduce phase */
    reduceStats?: ReduceStats;
    /** Total execution time in ms */
    totalTimeMs: number;
    /** Execution statistics */
    executionStats: ExecutionStats;
    /** Error message if job failed */
    error?: string;
    /** What the splitter threw, when the split phase failed */
    cause?: unknown;
    /** Phase that failed, if any */
    failedPhase?: 'split' | 'map' | 'reduce';
}

/**
 * Execution statistics for the job
 */
export interface ExecutionStats {
    /** Total number of work items */
    totalItems: number;
    /** Number of successful map operations */
    successfulMaps: number;
    /** Number of failed map operations */
    failedMaps: number;
    /** Number of map re-runs across all items */
    retriedMaps: number;
    /** Time spent in map phase (including combine) */
    mapPhaseTimeMs: number;
    /** Time spent grouping values by key */
    shufflePhaseTimeMs: number;
    /** Time spent in reduce phase */
    reducePhaseTimeMs: number;
    /** Max concurrency used */
    maxConcurrency: number;
    /** Whether the combiner ran */
    combined: boolean;
}

/**
 * Executor options that combine job options with runtime options
 */
export interface ExecutorOptions extends Partial<MapReduceOptions> {
    /** Optional progress callback */
    onProgress?: ProgressCallback;
    /** Optional per-item completion callback */
    onItemComplete?: ItemCompleteCallback;
}

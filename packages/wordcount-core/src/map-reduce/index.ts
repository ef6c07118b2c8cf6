/**
 * Map-Reduce Framework
 *
 * A keyed, in-process map-reduce runner with pluggable splitters, mappers,
 * combiners and reducers.
 */

// Core types
export type {
    WorkItem,
    KeyValue,
    Counters,
    MapOutput,
    MapContext,
    MapResult,
    ReduceContext,
    ReduceStats,
    MapReduceOptions,
    Splitter,
    Mapper,
    Reducer,
    MapReduceJob,
    ProgressCallback,
    ItemCompleteCallback,
    JobProgress,
    MapReduceResult,
    ExecutionStats,
    ExecutorOptions
} from './types';
export { DEFAULT_MAP_REDUCE_OPTIONS } from './types';

// Executor
export { MapReduceExecutor, createExecutor } from './executor';

// Concurrency limiter
export { ConcurrencyLimiter, DEFAULT_MAX_CONCURRENCY } from './concurrency-limiter';

// Shuffle helpers
export { groupByKey, combineLocally, mergeCounters, compareKeys } from './shuffle';

// Reducers
export { SumReducer, createSumReducer } from './reducers';

// Splitters
export { LineSplitter, createLineSplitter, FileSplitter, createFileSplitter } from './splitters';
export type { LineSource, LinePartition, LineSplitterOptions } from './splitters';

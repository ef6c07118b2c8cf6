/**
 * wordcount-core
 *
 * Word-frequency aggregation over a tab-delimited corpus of dated posts and
 * comments, counting only records dated before 18 October 2019.
 *
 * Layers, leaves first:
 * - records: parsing, header/date filtering, tokenizing, emitting
 * - map-reduce: a keyed in-process map-reduce runner
 * - word-count: the job, the aggregators and the end-to-end driver
 * - io: reading input locations and writing the result
 */

// ============================================================================
// Logger
// ============================================================================

export {
    LogCategory,
    consoleLogger,
    nullLogger,
    setLogger,
    getLogger,
    resetLogger
} from './logger';
export type { Logger } from './logger';

// ============================================================================
// Errors
// ============================================================================

export {
    ErrorCode,
    phaseErrorCode,
    WordCountError,
    MalformedRecordError,
    isWordCountError,
    wrapError,
    getErrorCauseMessage,
    describeError
} from './errors';
export type {
    ErrorCodeType,
    FailedPhase,
    ErrorMetadata,
    MalformedReason,
    WordCountErrorOptions
} from './errors';

// ============================================================================
// Defaults
// ============================================================================

export {
    DEFAULT_MAX_CONCURRENCY,
    DEFAULT_PARTITION_SIZE,
    DEFAULT_RETRY_ATTEMPTS,
    DEFAULT_RETRY_DELAY_MS
} from './config/defaults';

// ============================================================================
// Records
// ============================================================================

export {
    RECORD_COUNTER_NAMES,
    createRecordCounters,
    FIELD_SEPARATOR,
    MIN_FIELD_COUNT,
    DATE_FORMAT,
    HEADER_MARKERS,
    CUTOFF_DATE_RAW,
    CUTOFF_DATE,
    parseRecordDate,
    isBeforeCutoff,
    isHeaderLine,
    parseRecord,
    splitFields,
    SPLIT_PATTERN,
    tokenize,
    includesTitle,
    emitContributions,
    processLine
} from './records';
export type {
    CorpusRecord,
    RecordParseOutcome,
    WordContribution,
    RecordCounters
} from './records';

// ============================================================================
// Map-Reduce
// ============================================================================

export {
    DEFAULT_MAP_REDUCE_OPTIONS,
    MapReduceExecutor,
    createExecutor,
    ConcurrencyLimiter,
    groupByKey,
    combineLocally,
    mergeCounters,
    compareKeys,
    SumReducer,
    createSumReducer,
    LineSplitter,
    createLineSplitter,
    FileSplitter,
    createFileSplitter
} from './map-reduce';
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
    ExecutorOptions,
    LineSource,
    LinePartition,
    LineSplitterOptions
} from './map-reduce';

// ============================================================================
// Word Count
// ============================================================================

export {
    combineContributions,
    reduceWord,
    aggregateContributions,
    toWordCountMap,
    WORD_COUNT_JOB_ID,
    WordCountMapper,
    createWordCountJob,
    createFileWordCountJob,
    toRecordCounters,
    runWordCount,
    countWords,
    countWordsInLocation,
    validateWordCountOptions
} from './word-count';
export type {
    WordCountEntry,
    WordCountJobOptions,
    WordCountOptions,
    WordCountResult
} from './word-count';

// ============================================================================
// I/O
// ============================================================================

export {
    isHiddenInput,
    listInputFiles,
    readLines,
    writeOutputFile,
    assertOutputWritable
} from './io';
export type { WriteOutputOptions } from './io';

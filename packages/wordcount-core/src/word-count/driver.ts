/**
 * Word Count Driver
 *
 * End-to-end runs: line sources (or an input location) in, sorted word
 * counts plus counters and execution stats out. Per-record problems are
 * counted; a failed partition, split or reduce fails the whole run.
 */

import { ErrorCode, WordCountError, isWordCountError, phaseErrorCode } from '../errors';
import { listInputFiles } from '../io/input-reader';
import { getLogger, LogCategory } from '../logger';
import { MapReduceExecutor } from '../map-reduce/executor';
import type { LinePartition, LineSource } from '../map-reduce/splitters';
import type { ExecutionStats, MapReduceJob, MapReduceResult, ProgressCallback } from '../map-reduce/types';
import type { RecordCounters } from '../records/types';
import type { WordCountEntry } from './aggregation';
import { createFileWordCountJob, createWordCountJob, toRecordCounters } from './job';

/**
 * Options for a word count run
 */
export interface WordCountOptions {
    /** Maximum partitions mapped at once */
    maxConcurrency?: number;
    /** Lines per partition */
    partitionSize?: number;
    /** Run the combiner on each partition (default: true) */
    combine?: boolean;
    /** Re-run failed partitions */
    retryOnFailure?: boolean;
    /** Re-runs per failed partition */
    retryAttempts?: number;
    /** Base delay between re-runs */
    retryDelayMs?: number;
    /** Progress callback */
    onProgress?: ProgressCallback;
}

/**
 * Outcome of a successful run
 */
export interface WordCountResult {
    /** One entry per distinct word, sorted by word */
    entries: WordCountEntry[];
    /** Record-level tallies across all partitions */
    counters: RecordCounters;
    /** Execution statistics */
    stats: ExecutionStats;
    /** Total execution time in ms */
    totalTimeMs: number;
}

function requirePositiveInteger(name: string, value: number | undefined): void {
    if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
        throw new WordCountError(`${name} must be a positive integer, got ${value}`, {
            code: ErrorCode.CONFIG_INVALID,
            meta: { option: name, value }
        });
    }
}

/**
 * Reject option values the splitter or limiter would refuse, before any work starts
 */
export function validateWordCountOptions(options: WordCountOptions): void {
    requirePositiveInteger('maxConcurrency', options.maxConcurrency);
    requirePositiveInteger('partitionSize', options.partitionSize);
    if (options.retryAttempts !== undefined && (!Number.isInteger(options.retryAttempts) || options.retryAttempts < 0)) {
        throw new WordCountError(`retryAttempts must be a non-negative integer, got ${options.retryAttempts}`, {
            code: ErrorCode.CONFIG_INVALID,
            meta: { retryAttempts: options.retryAttempts }
        });
    }
}

function toWordCountResult(result: MapReduceResult<number, number>): WordCountResult {
    // An unreadable input file keeps its own code
    if (result.failedPhase === 'split' && isWordCountError(result.cause)) {
        throw result.cause;
    }
    if (!result.success || !result.output) {
        throw new WordCountError(result.error ?? 'Word count failed', {
            code: phaseErrorCode(result.failedPhase),
            meta: {
                phase: result.failedPhase,
                failedPartitions: result.mapResults.filter(r => !r.success).map(r => r.workItemId)
            }
        });
    }

    return {
        entries: result.output.map(({ key, value }) => ({ word: key, count: value })),
        counters: toRecordCounters(result.counters),
        stats: result.executionStats,
        totalTimeMs: result.totalTimeMs
    };
}

async function executeJob<TInput>(
    job: MapReduceJob<TInput, LinePartition, number, number>,
    input: TInput,
    options: WordCountOptions
): Promise<WordCountResult> {
    const executor = new MapReduceExecutor({
        maxConcurrency: options.maxConcurrency,
        combine: options.combine,
        retryOnFailure: options.retryOnFailure,
        retryAttempts: options.retryAttempts,
        retryDelayMs: options.retryDelayMs,
        onProgress: options.onProgress
    });

    const result = toWordCountResult(await executor.execute(job, input));

    getLogger().info(
        LogCategory.WORD_COUNT,
        `Counted ${result.counters.wordsEmitted} words (${result.entries.length} distinct) ` +
        `from ${result.counters.acceptedRecords} of ${result.counters.linesRead} lines`
    );

    return result;
}

/**
 * Count words across in-memory line sources
 */
export async function runWordCount(
    sources: LineSource[],
    options: WordCountOptions = {}
): Promise<WordCountResult> {
    validateWordCountOptions(options);
    return executeJob(createWordCountJob({ partitionSize: options.partitionSize }), sources, options);
}

/**
 * Count words over in-memory lines
 */
export async function countWords(lines: string[], options: WordCountOptions = {}): Promise<WordCountResult> {
    return runWordCount([{ name: 'memory', lines }], options);
}

/**
 * Count the words of an input location (file or directory). Files are
 * streamed into partitions while earlier partitions are mapped.
 */
export async function countWordsInLocation(
    location: string,
    options: WordCountOptions = {}
): Promise<WordCountResult> {
    validateWordCountOptions(options);
    const files = await listInputFiles(location);
    if (files.length === 0) {
        getLogger().warn(LogCategory.IO, `No input files found in ${location}`);
    }
    return executeJob(createFileWordCountJob({ partitionSize: options.partitionSize }), files, options);
}

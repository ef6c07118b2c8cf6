/**
 * Word Count Job
 *
 * Wires the record parser, tokenizer and emitter into a map-reduce job over
 * line partitions, with SumReducer as both combiner and reducer.
 */

import { getLogger, LogCategory } from '../logger';
import { createFileSplitter, createLineSplitter } from '../map-reduce/splitters';
import type { LinePartition, LineSource } from '../map-reduce/splitters';
import { SumReducer } from '../map-reduce/reducers';
import type {
    Counters,
    KeyValue,
    MapContext,
    MapOutput,
    MapReduceJob,
    Mapper,
    Splitter,
    WorkItem
} from '../map-reduce/types';
import { emitContributions } from '../records/emitter';
import { parseRecord } from '../records/record-parser';
import { RECORD_COUNTER_NAMES, createRecordCounters } from '../records/types';
import type { RecordCounters } from '../records/types';

export const WORD_COUNT_JOB_ID = 'word-count';

/**
 * Maps one partition of raw lines to (word, 1) pairs. Every counter and
 * pair lives in locals of a single call.
 */
export class WordCountMapper implements Mapper<LinePartition, number> {
    async map(item: WorkItem<LinePartition>, _context: MapContext): Promise<MapOutput<number>> {
        const { source, firstLineNumber, lines } = item.data;
        const logger = getLogger();
        const counters = createRecordCounters();
        const pairs: KeyValue<number>[] = [];

        lines.forEach((line, offset) => {
            counters.linesRead++;
            const outcome = parseRecord(line);

            switch (outcome.kind) {
                case 'header':
                    counters.headerLines++;
                    return;
                case 'malformed':
                    counters.malformedRecords++;
                    if (outcome.error.reason === 'missing-fields') {
                        counters.missingFields++;
                    } else {
                        counters.invalidDates++;
                    }
                    logger.debug(
                        LogCategory.RECORDS,
                        `Skipping ${source}:${firstLineNumber + offset}: ${outcome.error.message}`
                    );
                    return;
                case 'record':
                    if (!outcome.included) {
                        counters.afterCutoff++;
                        return;
                    }
                    counters.acceptedRecords++;
                    for (const { word, count } of emitContributions(outcome.record)) {
                        pairs.push({ key: word, value: count });
                    }
            }
        });

        counters.wordsEmitted = pairs.length;
        return { pairs, counters };
    }
}

/**
 * Read word-count counters back out of merged job counters
 */
export function toRecordCounters(counters: Counters): RecordCounters {
    const result = createRecordCounters();
    for (const name of RECORD_COUNTER_NAMES) {
        result[name] = counters[name] ?? 0;
    }
    return result;
}

/**
 * Options for building the job
 */
export interface WordCountJobOptions {
    /** Lines per partition */
    partitionSize?: number;
}

function buildJob<TInput>(
    splitter: Splitter<TInput, LinePartition>
): MapReduceJob<TInput, LinePartition, number, number> {
    const reducer = new SumReducer();
    return {
        id: WORD_COUNT_JOB_ID,
        name: 'Word count before cutoff',
        splitter,
        mapper: new WordCountMapper(),
        combiner: reducer,
        reducer
    };
}

/**
 * Create the word count job over in-memory line sources
 */
export function createWordCountJob(
    options: WordCountJobOptions = {}
): MapReduceJob<LineSource[], LinePartition, number, number> {
    return buildJob(createLineSplitter(options.partitionSize));
}

/**
 * Create the word count job over input files, streamed line by line
 */
export function createFileWordCountJob(
    options: WordCountJobOptions = {}
): MapReduceJob<string[], LinePartition, number, number> {
    return buildJob(createFileSplitter(options.partitionSize));
}

/**
 * Record Types
 *
 * Value types for one row of the posts/comments corpus and the
 * contributions it produces.
 */

import type { MalformedRecordError } from '../errors';

/**
 * One parsed input row. Fields are positional and tab separated:
 * title, reply flag, date, comment.
 */
export interface CorpusRecord {
    /** Post title (meaningless on replies) */
    title: string;
    /** Empty for replies, non-empty for top-level posts */
    replyFlag: string;
    /** Date as written in the row, `dd-MM-yyyy` */
    dateRaw: string;
    /** Free-text body */
    comment: string;
}

/**
 * Outcome of parsing one raw line
 */
export type RecordParseOutcome =
    | { kind: 'header' }
    | { kind: 'malformed'; error: MalformedRecordError }
    | {
        kind: 'record';
        record: CorpusRecord;
        /** Parsed `dateRaw` */
        date: Date;
        /** Whether the record is dated strictly before the cutoff */
        included: boolean;
    };

/**
 * A (word, count) pair. The emitter always produces count 1;
 * the combiner produces partial sums.
 */
export interface WordContribution {
    word: string;
    count: number;
}

/**
 * Per-partition tallies of what happened to each line
 */
export type RecordCounters = {
    /** Lines handed to the parser */
    linesRead: number;
    /** Lines dropped by the header heuristic */
    headerLines: number;
    /** Lines rejected as malformed (sum of the two below) */
    malformedRecords: number;
    /** Malformed because fewer than four fields */
    missingFields: number;
    /** Malformed because the date did not parse */
    invalidDates: number;
    /** Well-formed records dated on or after the cutoff */
    afterCutoff: number;
    /** Records that contributed tokens */
    acceptedRecords: number;
    /** Total (word, 1) contributions emitted */
    wordsEmitted: number;
};

/** Names of the fields of RecordCounters */
export const RECORD_COUNTER_NAMES = [
    'linesRead',
    'headerLines',
    'malformedRecords',
    'missingFields',
    'invalidDates',
    'afterCutoff',
    'acceptedRecords',
    'wordsEmitted'
] as const;

/**
 * Create a zeroed counter set
 */
export function createRecordCounters(): RecordCounters {
    return {
        linesRead: 0,
        headerLines: 0,
        malformedRecords: 0,
        missingFields: 0,
        invalidDates: 0,
        afterCutoff: 0,
        acceptedRecords: 0,
        wordsEmitted: 0
    };
}

/**
 * Records Module - Public API
 */

export type {
    CorpusRecord,
    RecordParseOutcome,
    WordContribution,
    RecordCounters
} from './types';
export { RECORD_COUNTER_NAMES, createRecordCounters } from './types';

export {
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
    splitFields
} from './record-parser';

export { SPLIT_PATTERN, tokenize } from './tokenizer';

export { includesTitle, emitContributions, processLine } from './emitter';

/**
 * Word Count - Public API
 */

export {
    combineContributions,
    reduceWord,
    aggregateContributions,
    toWordCountMap
} from './aggregation';
export type { WordCountEntry } from './aggregation';

export {
    WORD_COUNT_JOB_ID,
    WordCountMapper,
    createWordCountJob,
    createFileWordCountJob,
    toRecordCounters
} from './job';
export type { WordCountJobOptions } from './job';

export { runWordCount, countWords, countWordsInLocation, validateWordCountOptions } from './driver';
export type { WordCountOptions, WordCountResult } from './driver';

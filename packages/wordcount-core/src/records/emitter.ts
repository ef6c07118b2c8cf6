/**
 * Emitter
 *
 * Produces the (word, 1) contributions of one included record, and the
 * line-level `processLine` entry point the map phase is built on.
 */

import { parseRecord } from './record-parser';
import { tokenize } from './tokenizer';
import type { CorpusRecord, WordContribution } from './types';

/**
 * Whether the title's tokens are counted. An empty reply flag marks a reply,
 * whose title field is not meaningful.
 */
export function includesTitle(record: CorpusRecord): boolean {
    return record.replyFlag !== '';
}

/**
 * Emit one contribution per token: comment tokens first, then title tokens
 * when the record is a top-level post.
 */
export function emitContributions(record: CorpusRecord): WordContribution[] {
    const words = tokenize(record.comment);
    if (includesTitle(record)) {
        words.push(...tokenize(record.title));
    }
    return words.map(word => ({ word, count: 1 }));
}

/**
 * Filter, parse and emit for a single raw line. Header lines, malformed
 * records and records on or after the cutoff contribute nothing.
 */
export function processLine(line: string): WordContribution[] {
    const outcome = parseRecord(line);
    if (outcome.kind !== 'record' || !outcome.included) {
        return [];
    }
    return emitContributions(outcome.record);
}

/**
 * Word Count Aggregation
 *
 * The partial aggregator (combiner) and final aggregator (reducer) as pure
 * functions over word contributions. Both delegate to SumReducer, the same
 * reducer the map-reduce job plugs in.
 */

import { SumReducer } from '../map-reduce/reducers';
import { combineLocally, compareKeys, groupByKey } from '../map-reduce/shuffle';
import type { KeyValue, ReduceContext } from '../map-reduce/types';
import type { WordContribution } from '../records/types';

/**
 * Final (word, total) pair
 */
export interface WordCountEntry {
    word: string;
    count: number;
}

const sumReducer = new SumReducer();

const LOCAL_COMBINE: ReduceContext = { executionId: 'local', phase: 'combine' };
const LOCAL_REDUCE: ReduceContext = { executionId: 'local', phase: 'reduce' };

function toPairs(contributions: Iterable<WordContribution>): KeyValue<number>[] {
    const pairs: KeyValue<number>[] = [];
    for (const { word, count } of contributions) {
        pairs.push({ key: word, value: count });
    }
    return pairs;
}

/**
 * Partial aggregation: one contribution per distinct word carrying the sum
 * of that word's counts within the batch. Safe to apply any number of times.
 */
export function combineContributions(contributions: Iterable<WordContribution>): WordContribution[] {
    return combineLocally(toPairs(contributions), sumReducer, LOCAL_COMBINE)
        .map(({ key, value }) => ({ word: key, count: value }));
}

/**
 * Final aggregation for one word over every unit or partial count it received.
 */
export function reduceWord(word: string, counts: number[]): WordCountEntry {
    return { word, count: sumReducer.reduce(word, counts, LOCAL_REDUCE) };
}

/**
 * Group then reduce a whole multiset of contributions, sorted by word.
 */
export function aggregateContributions(contributions: Iterable<WordContribution>): WordCountEntry[] {
    const groups = groupByKey(toPairs(contributions));
    return [...groups.keys()]
        .sort(compareKeys)
        .map(word => reduceWord(word, groups.get(word) ?? []));
}

/**
 * Entries as a Map keyed by word
 */
export function toWordCountMap(entries: WordCountEntry[]): Map<string, number> {
    return new Map(entries.map(({ word, count }) => [word, count]));
}

/**
 * Shuffle Helpers
 *
 * Grouping of keyed values, local combining, counter merging and the key
 * ordering used for deterministic output.
 */

import type { Counters, KeyValue, ReduceContext, Reducer } from './types';

/**
 * Group values by key, appending to `groups` when given. Value order within
 * a key follows input order.
 */
export function groupByKey<V>(
    pairs: Iterable<KeyValue<V>>,
    groups: Map<string, V[]> = new Map()
): Map<string, V[]> {
    for (const { key, value } of pairs) {
        const values = groups.get(key);
        if (values) {
            values.push(value);
        } else {
            groups.set(key, [value]);
        }
    }
    return groups;
}

/**
 * Apply a combiner to one work item's pairs: one pair per distinct key,
 * in first-seen key order.
 */
export function combineLocally<V>(
    pairs: KeyValue<V>[],
    combiner: Reducer<V, V>,
    context: ReduceContext
): KeyValue<V>[] {
    const combined: KeyValue<V>[] = [];
    for (const [key, values] of groupByKey(pairs)) {
        combined.push({ key, value: combiner.reduce(key, values, context) });
    }
    return combined;
}

/**
 * Add every counter of `source` into `target`.
 */
export function mergeCounters(target: Counters, source: Counters | undefined): Counters {
    if (!source) {
        return target;
    }
    for (const [name, value] of Object.entries(source)) {
        target[name] = (target[name] ?? 0) + value;
    }
    return target;
}

/**
 * Locale-independent key order (UTF-16 code units).
 */
export function compareKeys(a: string, b: string): number {
    if (a < b) {
        return -1;
    }
    return a > b ? 1 : 0;
}

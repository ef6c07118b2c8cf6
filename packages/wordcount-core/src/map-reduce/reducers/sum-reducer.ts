/**
 * Sum Reducer
 *
 * Adds up numeric values per key. Addition is associative and commutative,
 * so the same instance serves as the combiner and as the final reducer.
 */

import type { ReduceContext, Reducer } from '../types';

export class SumReducer implements Reducer<number, number> {
    reduce(key: string, values: number[], _context: ReduceContext): number {
        let sum = 0;
        for (const value of values) {
            if (!Number.isSafeInteger(value) || value < 0) {
                throw new RangeError(`Invalid count ${value} for key "${key}"`);
            }
            sum += value;
        }
        return sum;
    }
}

/**
 * Create a new SumReducer
 */
export function createSumReducer(): SumReducer {
    return new SumReducer();
}

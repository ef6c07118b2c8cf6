/**
 * Tests for SumReducer
 */

import { describe, it, expect } from 'vitest';
import { SumReducer, createSumReducer } from '../../src/map-reduce/reducers';
import type { ReduceContext } from '../../src/map-reduce/types';

const context: ReduceContext = { executionId: 'test', phase: 'reduce' };

describe('SumReducer', () => {
    it('sums unit counts', () => {
        expect(new SumReducer().reduce('foo', [1, 1, 1], context)).toBe(3);
    });

    it('sums partial counts', () => {
        expect(createSumReducer().reduce('foo', [4, 0, 7], context)).toBe(11);
    });

    it('returns 0 for no values', () => {
        expect(new SumReducer().reduce('foo', [], context)).toBe(0);
    });

    it('gives the same total however values are grouped', () => {
        const reducer = new SumReducer();
        const values = [1, 1, 1, 1, 1, 1, 1];
        const direct = reducer.reduce('w', values, context);
        const partials = [
            reducer.reduce('w', values.slice(0, 2), context),
            reducer.reduce('w', values.slice(2, 3), context),
            reducer.reduce('w', values.slice(3), context),
        ];
        expect(reducer.reduce('w', partials, context)).toBe(direct);
        expect(direct).toBe(7);
    });

    it('rejects negative and fractional counts', () => {
        const reducer = new SumReducer();
        expect(() => reducer.reduce('foo', [1, -1], context)).toThrow(RangeError);
        expect(() => reducer.reduce('foo', [0.5], context)).toThrow('Invalid count 0.5 for key "foo"');
    });
});

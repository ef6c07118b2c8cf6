/**
 * Tests for the emitter and processLine
 */

import { describe, it, expect } from 'vitest';
import { emitContributions, includesTitle, processLine } from '../../src/records/emitter';
import type { CorpusRecord } from '../../src/records/types';

function record(overrides: Partial<CorpusRecord> = {}): CorpusRecord {
    return {
        title: 'My Title',
        replyFlag: 'x',
        dateRaw: '01-01-2019',
        comment: 'Some text',
        ...overrides,
    };
}

describe('includesTitle', () => {
    it('is true only for a non-empty reply flag', () => {
        expect(includesTitle(record())).toBe(true);
        expect(includesTitle(record({ replyFlag: ' ' }))).toBe(true);
        expect(includesTitle(record({ replyFlag: '' }))).toBe(false);
    });
});

describe('emitContributions', () => {
    it('emits comment tokens, then title tokens', () => {
        expect(emitContributions(record())).toEqual([
            { word: 'some', count: 1 },
            { word: 'text', count: 1 },
            { word: 'my', count: 1 },
            { word: 'title', count: 1 },
        ]);
    });

    it('skips the title when the reply flag is empty', () => {
        expect(emitContributions(record({ replyFlag: '' }))).toEqual([
            { word: 'some', count: 1 },
            { word: 'text', count: 1 },
        ]);
    });

    it('emits one contribution per occurrence', () => {
        expect(emitContributions(record({ title: 'echo', comment: 'echo Echo' }))).toEqual([
            { word: 'echo', count: 1 },
            { word: 'echo', count: 1 },
            { word: 'echo', count: 1 },
        ]);
    });

    it('emits nothing for empty text fields', () => {
        expect(emitContributions(record({ title: '', comment: '' }))).toEqual([]);
    });
});

describe('processLine', () => {
    it('emits for an included post', () => {
        expect(processLine('Hello World\tx\t01-01-2019\tfoo bar').map(c => c.word))
            .toEqual(['foo', 'bar', 'hello', 'world']);
    });

    it('emits only the comment of a reply', () => {
        expect(processLine('Ignored Title\t\t01-01-2019\treply text').map(c => c.word))
            .toEqual(['reply', 'text']);
    });

    it('emits nothing for late, header or malformed lines', () => {
        expect(processLine('Late Post\tx\t01-01-2020\tfoo')).toEqual([]);
        expect(processLine('Cutoff Day\tx\t18-10-2019\tfoo')).toEqual([]);
        expect(processLine('post_theme header date line\tx\t01-01-2019\tfoo')).toEqual([]);
        expect(processLine('too\tfew')).toEqual([]);
        expect(processLine('Bad Date\tx\t2019-01-01\tfoo')).toEqual([]);
    });

    it('emits for a day clamped to the end of its month', () => {
        expect(processLine('T\tx\t31-02-2019\tfoo')).toEqual([
            { word: 'foo', count: 1 },
            { word: 't', count: 1 },
        ]);
        expect(processLine('T\t\t29-02-2019\tbar')).toEqual([{ word: 'bar', count: 1 }]);
    });

    it('emits nothing when the comment field is empty and last', () => {
        expect(processLine('Title\tx\t01-01-2019\t')).toEqual([]);
    });

    it('emits for the last day before the cutoff', () => {
        expect(processLine('Eve\tx\t17-10-2019\tfoo').map(c => c.word)).toEqual(['foo', 'eve']);
    });
});

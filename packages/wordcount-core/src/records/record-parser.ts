/**
 * Record Parser
 *
 * Turns one raw corpus line into a validated record plus its parsed date,
 * or says why the line is skipped. Dates are parsed with date-fns into a
 * plain Date value; nothing here keeps state between calls.
 */

import { getDaysInMonth, isBefore, isValid, parse, setDate } from 'date-fns';
import { MalformedRecordError } from '../errors';
import type { CorpusRecord, RecordParseOutcome } from './types';

/** Field separator within a line */
export const FIELD_SEPARATOR = '\t';

/** Minimum number of tab-separated fields in a well-formed record */
export const MIN_FIELD_COUNT = 4;

/** Date pattern for the date field and the cutoff */
export const DATE_FORMAT = 'dd-MM-yyyy';

/** Both substrings must appear for a line to count as a header */
export const HEADER_MARKERS = ['post_theme', 'date'] as const;

// date-fns accepts one-digit days and short years for these tokens
const DATE_SHAPE = /^([0-9]{2})-([0-9]{2})-([0-9]{4})$/;

const REFERENCE_DATE = new Date(2000, 0, 1);

/** Largest day-of-month the date field may carry, in any month */
const MAX_DAY_OF_MONTH = 31;

/**
 * Parse a `dd-MM-yyyy` string into a local calendar day.
 *
 * Returns undefined when the text does not have exactly that shape, the
 * month is outside 01-12 or the day outside 01-31. A day past the end of
 * its month is clamped to the month's last day, so `31-04-2019` is
 * 30 April and `29-02-2019` is 28 February.
 */
export function parseRecordDate(raw: string): Date | undefined {
    const match = DATE_SHAPE.exec(raw);
    if (!match) {
        return undefined;
    }
    const [, dayText, monthText, yearText] = match;
    const day = Number(dayText);
    if (day < 1 || day > MAX_DAY_OF_MONTH) {
        return undefined;
    }

    const monthStart = parse(`${yearText}-${monthText}`, 'yyyy-MM', REFERENCE_DATE);
    if (!isValid(monthStart)) {
        return undefined;
    }
    return setDate(monthStart, Math.min(day, getDaysInMonth(monthStart)));
}

function requireDate(raw: string): Date {
    const date = parseRecordDate(raw);
    if (!date) {
        throw new Error(`Invalid constant date: ${raw}`);
    }
    return date;
}

/** Records must be dated strictly before this day: 18 October 2019 */
export const CUTOFF_DATE_RAW = '18-10-2019';
export const CUTOFF_DATE: Date = requireDate(CUTOFF_DATE_RAW);

/**
 * Strict comparison against the cutoff; the cutoff day itself is excluded.
 */
export function isBeforeCutoff(date: Date, cutoff: Date = CUTOFF_DATE): boolean {
    return isBefore(date, cutoff);
}

/**
 * Header/metadata heuristic: the raw line mentions both `post_theme` and `date`.
 */
export function isHeaderLine(line: string): boolean {
    return HEADER_MARKERS.every(marker => line.includes(marker));
}

/**
 * Split a line on tabs. Trailing empty fields are dropped, so a line whose
 * comment is empty (`title\tx\t01-01-2019\t`) has three fields.
 */
export function splitFields(line: string): string[] {
    const fields = line.split(FIELD_SEPARATOR);
    while (fields.length > 0 && fields[fields.length - 1] === '') {
        fields.pop();
    }
    return fields;
}

/**
 * Parse one raw line.
 *
 * The header check runs on the raw line before any splitting, so a header
 * is dropped even when it would parse as a record.
 */
export function parseRecord(line: string): RecordParseOutcome {
    if (isHeaderLine(line)) {
        return { kind: 'header' };
    }

    const fields = splitFields(line);
    if (fields.length < MIN_FIELD_COUNT) {
        return {
            kind: 'malformed',
            error: new MalformedRecordError(
                'missing-fields',
                `Expected at least ${MIN_FIELD_COUNT} fields, found ${fields.length}`,
                { fieldCount: fields.length }
            )
        };
    }

    const [title, replyFlag, dateRaw, comment] = fields;
    const date = parseRecordDate(dateRaw);
    if (!date) {
        return {
            kind: 'malformed',
            error: new MalformedRecordError(
                'invalid-date',
                `Date "${dateRaw}" does not match ${DATE_FORMAT}`,
                { dateRaw }
            )
        };
    }

    const record: CorpusRecord = { title, replyFlag, dateRaw, comment };
    return {
        kind: 'record',
        record,
        date,
        included: isBeforeCutoff(date)
    };
}

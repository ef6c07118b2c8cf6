/**
 * Word count errors.
 *
 * Every failure the library raises on purpose is a WordCountError carrying an
 * ErrorCode and, where there is one, the error it wraps. Skipped lines are
 * reported as MalformedRecordError values inside a parse outcome, never thrown.
 */

import { ErrorCode } from './error-codes';
import type { ErrorCodeType } from './error-codes';

/**
 * Context attached to an error, printed by describeError in verbose mode
 */
export interface ErrorMetadata {
    /** Input, output or config file involved */
    filePath?: string;
    /** Phase that failed the run */
    phase?: string;
    /** Ids of the partitions that failed */
    failedPartitions?: string[];
    /** Offending run option and its value */
    option?: string;
    value?: unknown;
    /** Raw date field of a malformed record */
    dateRaw?: string;
    /** Field count of a malformed record */
    fieldCount?: number;
    [key: string]: unknown;
}

export interface WordCountErrorOptions {
    code?: ErrorCodeType;
    cause?: unknown;
    meta?: ErrorMetadata;
}

export class WordCountError extends Error {
    readonly code: ErrorCodeType;
    readonly cause?: unknown;
    readonly meta?: ErrorMetadata;

    constructor(message: string, options: WordCountErrorOptions = {}) {
        super(message);
        this.name = 'WordCountError';
        this.code = options.code ?? ErrorCode.UNKNOWN;
        this.cause = options.cause;
        this.meta = options.meta;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export type MalformedReason = 'missing-fields' | 'invalid-date';

/**
 * Why one line was skipped. The partition carries on and the reason is counted.
 */
export class MalformedRecordError extends WordCountError {
    readonly reason: MalformedReason;

    constructor(reason: MalformedReason, message: string, meta?: ErrorMetadata) {
        super(message, { code: ErrorCode.MALFORMED_RECORD, meta });
        this.name = 'MalformedRecordError';
        this.reason = reason;
    }
}

export function isWordCountError(error: unknown): error is WordCountError {
    return error instanceof WordCountError;
}

/**
 * Wrap a lower-level failure (an fs error, a YAML parse error) under a
 * message that names the file or stage. Without an explicit code the
 * cause's code is kept.
 */
export function wrapError(
    message: string,
    cause: unknown,
    code?: ErrorCodeType,
    meta?: ErrorMetadata
): WordCountError {
    const inner = isWordCountError(cause) ? cause : undefined;
    return new WordCountError(message, {
        code: code ?? inner?.code ?? ErrorCode.UNKNOWN,
        cause,
        meta: meta ?? inner?.meta,
    });
}

/**
 * Messages along the cause chain, outermost first, joined with ` -> `.
 * Only WordCountError causes are followed.
 */
export function getErrorCauseMessage(error: unknown, maxDepth = 5): string {
    const messages: string[] = [];
    let current: unknown = error;

    while (current !== undefined && current !== null && messages.length < maxDepth) {
        if (!(current instanceof Error)) {
            messages.push(String(current));
            break;
        }
        messages.push(current.message);
        current = isWordCountError(current) ? current.cause : undefined;
    }

    return messages.join(' -> ');
}

function formatMetaValue(value: unknown): string {
    if (Array.isArray(value)) {
        return value.map(String).join(', ');
    }
    if (typeof value === 'object' && value !== null) {
        return JSON.stringify(value);
    }
    return String(value);
}

/**
 * One-line report of an error: `[CODE] outer -> inner` for a WordCountError,
 * the cause chain otherwise. Verbose mode adds one indented `key: value`
 * line per metadata entry.
 */
export function describeError(error: unknown, options: { verbose?: boolean } = {}): string {
    const message = getErrorCauseMessage(error);
    if (!isWordCountError(error)) {
        return message;
    }

    const lines = [`[${error.code}] ${message}`];
    if (options.verbose && error.meta) {
        for (const [key, value] of Object.entries(error.meta)) {
            if (value !== undefined) {
                lines.push(`  ${key}: ${formatMetaValue(value)}`);
            }
        }
    }
    return lines.join('\n');
}

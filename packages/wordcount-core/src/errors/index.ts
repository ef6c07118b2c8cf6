/**
 * Errors Module - Public API
 */

export { ErrorCode, phaseErrorCode } from './error-codes';
export type { ErrorCodeType, FailedPhase } from './error-codes';

export {
    WordCountError,
    MalformedRecordError,
    isWordCountError,
    wrapError,
    getErrorCauseMessage,
    describeError,
} from './word-count-error';
export type { ErrorMetadata, MalformedReason, WordCountErrorOptions } from './word-count-error';

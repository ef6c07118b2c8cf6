/**
 * Error codes for word count runs. Each code names the stage that gave up,
 * so callers can branch on it without parsing messages.
 */

export const ErrorCode = {
    /** Line skipped: fewer than four fields, or a date that is not dd-MM-yyyy */
    MALFORMED_RECORD: 'MALFORMED_RECORD',

    /** The input could not be cut into partitions */
    MAP_REDUCE_SPLIT_FAILED: 'MAP_REDUCE_SPLIT_FAILED',
    /** A partition still failed after its re-runs */
    MAP_REDUCE_MAP_FAILED: 'MAP_REDUCE_MAP_FAILED',
    MAP_REDUCE_REDUCE_FAILED: 'MAP_REDUCE_REDUCE_FAILED',

    INPUT_READ_FAILED: 'INPUT_READ_FAILED',
    OUTPUT_WRITE_FAILED: 'OUTPUT_WRITE_FAILED',
    /** Output location is taken and overwriting was not asked for */
    OUTPUT_EXISTS: 'OUTPUT_EXISTS',

    /** Run options or a config file value out of range */
    CONFIG_INVALID: 'CONFIG_INVALID',

    UNKNOWN: 'UNKNOWN',
} as const;

export type ErrorCodeType = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Job phases that can fail a whole run
 */
export type FailedPhase = 'split' | 'map' | 'reduce';

const PHASE_ERROR_CODES: Record<FailedPhase, ErrorCodeType> = {
    split: ErrorCode.MAP_REDUCE_SPLIT_FAILED,
    map: ErrorCode.MAP_REDUCE_MAP_FAILED,
    reduce: ErrorCode.MAP_REDUCE_REDUCE_FAILED,
};

/**
 * Code for a run that failed in the given phase; UNKNOWN when no phase was recorded
 */
export function phaseErrorCode(phase: FailedPhase | undefined): ErrorCodeType {
    return phase ? PHASE_ERROR_CODES[phase] : ErrorCode.UNKNOWN;
}

/**
 * Logging for word count runs.
 *
 * Library code logs through `getLogger()`. The CLI swaps in a logger that
 * honours --quiet and --verbose; tests install `nullLogger` or a recorder.
 * Until `setLogger` is called, messages go to the console.
 */

/**
 * Where a message comes from. The CLI prints it as a prefix.
 */
export enum LogCategory {
    /** Skipped and malformed lines */
    RECORDS = 'Records',
    /** Partition scheduling, re-runs and phase timings */
    MAP_REDUCE = 'Map-Reduce',
    /** Run start and run options */
    WORD_COUNT = 'Word Count',
    /** Input listing, line reading and output writing */
    IO = 'I/O'
}

export interface Logger {
    /** Per-partition and per-file detail, shown only with --verbose */
    debug(category: string, message: string): void;
    info(category: string, message: string): void;
    /** Something was skipped but the run goes on */
    warn(category: string, message: string): void;
    error(category: string, message: string, error?: Error): void;
}

export const consoleLogger: Logger = {
    debug: (cat, msg) => console.debug(`[DEBUG] [${cat}] ${msg}`),
    info: (cat, msg) => console.log(`[INFO] [${cat}] ${msg}`),
    warn: (cat, msg) => console.warn(`[WARN] [${cat}] ${msg}`),
    error: (cat, msg, err) => console.error(`[ERROR] [${cat}] ${msg}`, err ?? ''),
};

/**
 * Drops everything. Useful for embedding a run with no output.
 */
export const nullLogger: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
};

let globalLogger: Logger = consoleLogger;

/**
 * Route all library logging through `logger` until the next call.
 *
 * @example
 * setLogger({
 *     ...nullLogger,
 *     warn: (cat, msg) => process.stderr.write(`${cat}: ${msg}\n`),
 * });
 */
export function setLogger(logger: Logger): void {
    globalLogger = logger;
}

export function getLogger(): Logger {
    return globalLogger;
}

/**
 * Go back to the console logger
 */
export function resetLogger(): void {
    globalLogger = consoleLogger;
}

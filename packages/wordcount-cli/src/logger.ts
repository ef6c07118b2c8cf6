/**
 * CLI Logger
 *
 * Colored stderr output, a spinner and a progress bar for the wordcount CLI.
 * Also provides a wordcount-core Logger that honors the CLI verbosity.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import type { Logger } from 'wordcount-core';

// ============================================================================
// ANSI Color Codes
// ============================================================================

const COLORS = {
    reset: '\x1b[0m',
    bold: '\x1b[1m',
    dim: '\x1b[2m',

    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    cyan: '\x1b[36m',
    gray: '\x1b[90m',
} as const;

// ============================================================================
// Color Helpers
// ============================================================================

let colorEnabled = true;

/**
 * Enable or disable colored output
 */
export function setColorEnabled(enabled: boolean): void {
    colorEnabled = enabled;
}

export function isColorEnabled(): boolean {
    return colorEnabled;
}

function colorize(color: string, text: string): string {
    if (!colorEnabled) { return text; }
    return `${color}${text}${COLORS.reset}`;
}

export function red(text: string): string { return colorize(COLORS.red, text); }
export function green(text: string): string { return colorize(COLORS.green, text); }
export function yellow(text: string): string { return colorize(COLORS.yellow, text); }
export function blue(text: string): string { return colorize(COLORS.blue, text); }
export function cyan(text: string): string { return colorize(COLORS.cyan, text); }
export function gray(text: string): string { return colorize(COLORS.gray, text); }
export function bold(text: string): string { return colorize(COLORS.bold, text); }
export function dim(text: string): string { return colorize(COLORS.dim, text); }

// ============================================================================
// Symbols (cross-platform)
// ============================================================================

const isWindows = process.platform === 'win32';

export const SYMBOLS = {
    success: isWindows ? '√' : '✓',
    error: isWindows ? '×' : '✗',
    warning: isWindows ? '‼' : '⚠',
    info: isWindows ? 'i' : 'ℹ',
    spinner: isWindows
        ? ['|', '/', '-', '\\']
        : ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'],
} as const;

// ============================================================================
// Verbosity
// ============================================================================

export type VerbosityLevel = 'quiet' | 'normal' | 'verbose';

let verbosity: VerbosityLevel = 'normal';

export function setVerbosity(level: VerbosityLevel): void {
    verbosity = level;
}

export function getVerbosity(): VerbosityLevel {
    return verbosity;
}

// ============================================================================
// Spinner
// ============================================================================

/**
 * Spinner shown while input is read and partitions are mapped.
 * Silent in quiet mode.
 */
export class Spinner {
    private frameIndex = 0;
    private timer: ReturnType<typeof setInterval> | null = null;
    private _message: string;
    private _isRunning = false;

    constructor(message: string = '') {
        this._message = message;
    }

    get isRunning(): boolean {
        return this._isRunning;
    }

    get message(): string {
        return this._message;
    }

    start(message?: string): void {
        if (this._isRunning) { this.stop(); }
        if (message !== undefined) { this._message = message; }
        this._isRunning = true;
        if (verbosity === 'quiet') { return; }

        if (process.stderr.isTTY) {
            this.timer = setInterval(() => {
                const frame = SYMBOLS.spinner[this.frameIndex % SYMBOLS.spinner.length];
                process.stderr.write(`\r${cyan(frame)} ${this._message}`);
                this.frameIndex++;
            }, 80);
        } else {
            process.stderr.write(`${this._message}\n`);
        }
    }

    update(message: string): void {
        this._message = message;
        if (!process.stderr.isTTY && this._isRunning && verbosity !== 'quiet') {
            process.stderr.write(`${message}\n`);
        }
    }

    stop(finalMessage?: string): void {
        this._isRunning = false;
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
            process.stderr.write('\r\x1b[K');
        }
        if (finalMessage && verbosity !== 'quiet') {
            process.stderr.write(`${finalMessage}\n`);
        }
    }

    succeed(message?: string): void {
        this.stop(`${green(SYMBOLS.success)} ${message || this._message}`);
    }

    fail(message?: string): void {
        this.stop(`${red(SYMBOLS.error)} ${message || this._message}`);
    }
}

// ============================================================================
// Progress Display
// ============================================================================

export interface ProgressDisplayOptions {
    /** Number of units of work */
    total: number;
    /** Label printed before the bar */
    label?: string;
    /** Bar width in characters (default: 30) */
    width?: number;
    showPercentage?: boolean;
    showCount?: boolean;
}

/**
 * Progress bar for the map phase, redrawn in place on a TTY
 */
export class ProgressDisplay {
    private readonly total: number;
    private readonly label: string;
    private readonly width: number;
    private readonly showPercentage: boolean;
    private readonly showCount: boolean;
    private lastLine = '';

    constructor(options: ProgressDisplayOptions) {
        this.total = options.total;
        this.label = options.label ?? 'Progress';
        this.width = options.width ?? 30;
        this.showPercentage = options.showPercentage ?? true;
        this.showCount = options.showCount ?? true;
    }

    /**
     * Render the bar for `current` completed units
     */
    render(current: number, message?: string): string {
        const ratio = this.total > 0 ? Math.min(current / this.total, 1) : 1;
        const filled = Math.round(ratio * this.width);
        const parts = [
            this.label,
            `[${'#'.repeat(filled)}${'-'.repeat(this.width - filled)}]`
        ];
        if (this.showPercentage) {
            parts.push(`${Math.round(ratio * 100)}%`);
        }
        if (this.showCount) {
            parts.push(`(${current}/${this.total})`);
        }
        if (message) {
            parts.push(dim(message));
        }
        return parts.join(' ');
    }

    update(current: number, message?: string): void {
        if (verbosity === 'quiet') { return; }
        const line = this.render(current, message);
        if (process.stderr.isTTY) {
            process.stderr.write(`\r\x1b[K${line}`);
        } else if (line !== this.lastLine) {
            process.stderr.write(`${line}\n`);
        }
        this.lastLine = line;
    }

    complete(message?: string): void {
        if (verbosity === 'quiet') { return; }
        if (process.stderr.isTTY) {
            process.stderr.write('\r\x1b[K');
        }
        process.stderr.write(`${green(SYMBOLS.success)} ${message || `${this.label} complete`}\n`);
    }
}

// ============================================================================
// CLI Logger (implements wordcount-core Logger interface)
// ============================================================================

/**
 * Create a wordcount-core Logger that writes to stderr
 */
export function createCLILogger(): Logger {
    return {
        debug(category: string, message: string): void {
            if (verbosity === 'verbose') {
                process.stderr.write(`${gray(`[DEBUG] [${category}]`)} ${message}\n`);
            }
        },
        info(category: string, message: string): void {
            if (verbosity !== 'quiet') {
                process.stderr.write(`${blue(`[${category}]`)} ${message}\n`);
            }
        },
        warn(category: string, message: string): void {
            process.stderr.write(`${yellow(`[WARN] [${category}]`)} ${message}\n`);
        },
        error(category: string, message: string, error?: Error): void {
            process.stderr.write(`${red(`[ERROR] [${category}]`)} ${message}\n`);
            if (error && verbosity === 'verbose') {
                process.stderr.write(`${gray(error.stack || error.message)}\n`);
            }
        },
    };
}

// ============================================================================
// Print Helpers (user-facing output)
// ============================================================================

export function printSuccess(message: string): void {
    if (verbosity === 'quiet') { return; }
    process.stderr.write(`${green(SYMBOLS.success)} ${message}\n`);
}

/**
 * Errors are printed at every verbosity
 */
export function printError(message: string): void {
    process.stderr.write(`${red(SYMBOLS.error)} ${message}\n`);
}

export function printWarning(message: string): void {
    process.stderr.write(`${yellow(SYMBOLS.warning)} ${message}\n`);
}

export function printInfo(message: string): void {
    if (verbosity === 'quiet') { return; }
    process.stderr.write(`${blue(SYMBOLS.info)} ${message}\n`);
}

export function printHeader(title: string): void {
    if (verbosity === 'quiet') { return; }
    process.stderr.write(`\n${bold(title)}\n`);
}

export function printKeyValue(key: string, value: string): void {
    if (verbosity === 'quiet') { return; }
    process.stderr.write(`  ${gray(key + ':')} ${value}\n`);
}

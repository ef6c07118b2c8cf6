/**
 * CLI Argument Parser
 *
 * Defines the wordcount command line using Commander and routes the parsed
 * arguments to the run command. Commander never exits the process here;
 * every outcome is returned as an exit code.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { describeError } from 'wordcount-core';
import { executeRun } from './commands/run';
import type { RunCommandOptions } from './commands/run';
import { OUTPUT_FORMATS, isOutputFormat, resolveConfig } from './config';
import type { ResolvedCLIConfig } from './config';
import { printError, setColorEnabled, setVerbosity } from './logger';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
    SUCCESS: 0,
    EXECUTION_ERROR: 1,
    USAGE_ERROR: 2,
} as const;

export const USAGE = 'Usage: wordcount <input> <output> [options]';

/**
 * Options as Commander hands them over
 */
export interface ParsedOptions {
    parallel?: number;
    partitionSize?: number;
    combine: boolean;
    format?: string;
    force: boolean;
    verbose: boolean;
    quiet: boolean;
    color: boolean;
    config?: string;
}

// ============================================================================
// CLI Setup
// ============================================================================

/**
 * Create and configure the CLI program.
 *
 * `onRun` receives the two positionals and the resolved run options; its
 * result becomes the exit code.
 */
export function createProgram(
    onRun: (input: string, output: string, options: RunCommandOptions) => Promise<number> = executeRun
): { program: Command; exitCode: () => number } {
    let exitCode: number = EXIT_CODES.SUCCESS;
    const program = new Command();

    program
        .name('wordcount')
        .description('Count words in dated posts and comments written before 18-10-2019')
        .version('1.0.0')
        .usage('<input> <output> [options]')
        .argument('<input>', 'Input file, or a directory whose files are all read')
        .argument('<output>', 'Output file (must not exist unless --force)')
        .option('-p, --parallel <number>', 'Partitions mapped at once', parsePositiveInt)
        .option('--partition-size <lines>', 'Lines per partition', parsePositiveInt)
        .option('--no-combine', 'Skip the per-partition combine step')
        .addOption(new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS))
        .option('--force', 'Replace an existing output file', false)
        .option('-v, --verbose', 'Verbose logging, stack traces on failure', false)
        .addOption(new Option('-q, --quiet', 'Only print warnings and errors').default(false).conflicts('verbose'))
        .option('--no-color', 'Disable colored output')
        .option('--config <path>', 'Config file (default: ~/.wordcount.yaml)')
        .allowExcessArguments(false)
        .exitOverride()
        .configureOutput({
            writeOut: (text) => process.stdout.write(text),
            writeErr: (text) => process.stderr.write(text),
            outputError: (text) => printError(text.replace(/^error: /, '').trimEnd()),
        })
        .action(async (input: string, output: string) => {
            const opts = program.opts<ParsedOptions>();
            applyGlobalOptions(opts);

            let config: ResolvedCLIConfig;
            try {
                config = resolveConfig(opts.config);
            } catch (error) {
                printError(describeError(error, { verbose: opts.verbose }));
                exitCode = EXIT_CODES.USAGE_ERROR;
                return;
            }

            exitCode = await onRun(input, output, toRunOptions(opts, config));
        });

    return { program, exitCode: () => exitCode };
}

/**
 * Parse user arguments (without the node and script entries) and run.
 * Resolves to the process exit code.
 */
export async function runCli(
    args: string[],
    onRun?: (input: string, output: string, options: RunCommandOptions) => Promise<number>
): Promise<number> {
    const { program, exitCode } = createProgram(onRun);

    try {
        await program.parseAsync(args, { from: 'user' });
    } catch (error) {
        if (error instanceof CommanderError) {
            if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
                return EXIT_CODES.SUCCESS;
            }
            process.stderr.write(`${USAGE}\n`);
            return EXIT_CODES.USAGE_ERROR;
        }
        throw error;
    }

    return exitCode();
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Commander argument parser for positive integers
 */
export function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

/**
 * Command-line options win over the config file, which wins over defaults
 */
export function toRunOptions(opts: ParsedOptions, config: ResolvedCLIConfig): RunCommandOptions {
    return {
        parallel: opts.parallel ?? config.parallel,
        partitionSize: opts.partitionSize ?? config.partitionSize,
        combine: opts.combine === false ? false : config.combine,
        format: isOutputFormat(opts.format) ? opts.format : config.format,
        force: opts.force,
        verbose: opts.verbose,
    };
}

/**
 * Apply global options (colors, verbosity) from CLI flags and environment
 */
function applyGlobalOptions(opts: ParsedOptions): void {
    // Commander sets color: false when --no-color is used
    if (opts.color === false || process.env.NO_COLOR !== undefined) {
        setColorEnabled(false);
    }

    if (opts.verbose) {
        setVerbosity('verbose');
    } else if (opts.quiet) {
        setVerbosity('quiet');
    }
}

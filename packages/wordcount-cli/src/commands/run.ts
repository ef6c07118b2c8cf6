/**
 * Run Command
 *
 * Counts words in the input location and writes the result to the output
 * location. Handles progress display, the run summary and error reporting.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import * as path from 'path';
import {
    assertOutputWritable,
    countWordsInLocation,
    describeError,
    setLogger,
    writeOutputFile,
} from 'wordcount-core';
import type { JobProgress, WordCountResult } from 'wordcount-core';
import {
    ProgressDisplay,
    Spinner,
    bold,
    createCLILogger,
    getVerbosity,
    green,
    printError,
    printHeader,
    printKeyValue,
    printSuccess,
} from '../logger';
import { formatDuration, formatSummary, formatWordCounts } from '../output-formatter';
import type { OutputFormat } from '../output-formatter';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the run command
 */
export interface RunCommandOptions {
    /** Partitions mapped at once */
    parallel: number;
    /** Lines per partition */
    partitionSize: number;
    /** Combine each partition before the shuffle */
    combine: boolean;
    /** Output format */
    format: OutputFormat;
    /** Replace an existing output file */
    force: boolean;
    /** Verbose output (stack traces on failure) */
    verbose: boolean;
}

// ============================================================================
// Run Command
// ============================================================================

/**
 * Execute the run command
 *
 * @returns exit code: 0 on success, 1 on any failure
 */
export async function executeRun(
    inputPath: string,
    outputPath: string,
    options: RunCommandOptions
): Promise<number> {
    const overwrite = options.force;

    printHeader('Word count');
    printKeyValue('Input', path.resolve(inputPath));
    printKeyValue('Output', path.resolve(outputPath));
    printKeyValue('Parallel', String(options.parallel));
    printKeyValue('Partition size', `${options.partitionSize} lines`);

    setLogger(createCLILogger());

    const spinner = new Spinner();
    let progressDisplay: ProgressDisplay | null = null;
    const startTime = Date.now();

    try {
        await assertOutputWritable(outputPath, { overwrite });

        spinner.start('Reading input...');

        const result = await countWordsInLocation(inputPath, {
            maxConcurrency: options.parallel,
            partitionSize: options.partitionSize,
            combine: options.combine,
            onProgress: (progress: JobProgress) => {
                // Spinner while the input is still being read, bar once the partition count is final
                if (progress.phase === 'mapping' && progress.inputComplete && progress.totalItems > 0 && !progressDisplay) {
                    spinner.stop();
                    progressDisplay = new ProgressDisplay({ total: progress.totalItems, label: 'Mapping' });
                }
                handleProgress(progress, spinner, progressDisplay);
            },
        });

        spinner.stop();

        await writeOutputFile(outputPath, formatWordCounts(result.entries, options.format), { overwrite });

        return handleResults(result, outputPath, Date.now() - startTime);
    } catch (error) {
        spinner.fail('Word count failed');
        printError(describeError(error, { verbose: options.verbose }));

        if (options.verbose && error instanceof Error && error.stack) {
            process.stderr.write(`\n${error.stack}\n`);
        }

        return 1;
    }
}

// ============================================================================
// Progress Handling
// ============================================================================

function handleProgress(
    progress: JobProgress,
    spinner: Spinner,
    progressDisplay: ProgressDisplay | null
): void {
    if (progressDisplay && progress.phase === 'mapping') {
        progressDisplay.update(progress.completedItems + progress.failedItems);
    } else if (progressDisplay && progress.phase === 'shuffling') {
        progressDisplay.complete(`Mapped ${progress.completedItems} partitions`);
    } else if (spinner.isRunning) {
        spinner.update(progress.message ?? progress.phase);
    }
}

// ============================================================================
// Result Handling
// ============================================================================

function handleResults(result: WordCountResult, outputPath: string, elapsed: number): number {
    if (getVerbosity() !== 'quiet') {
        process.stderr.write(formatSummary(result) + '\n');
    }
    printSuccess(`Results written to ${path.resolve(outputPath)}`);
    if (getVerbosity() !== 'quiet') {
        process.stderr.write(`\n  ${green(bold('Done'))} in ${formatDuration(elapsed)}\n`);
    }
    return 0;
}

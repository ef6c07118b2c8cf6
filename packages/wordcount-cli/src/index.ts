#!/usr/bin/env node

/**
 * Wordcount CLI Entry Point
 *
 * Counts words in a tab-delimited corpus of dated posts and comments,
 * keeping only records dated before 18-10-2019.
 * Uses wordcount-core for parsing and the map-reduce run.
 *
 * Usage:
 *   wordcount <input> <output> [options]
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import { EXIT_CODES, runCli } from './cli';
import { printError } from './logger';

async function main(): Promise<void> {
    try {
        process.exit(await runCli(process.argv.slice(2)));
    } catch (error) {
        printError(error instanceof Error ? error.message : String(error));
        process.exit(EXIT_CODES.EXECUTION_ERROR);
    }
}

void main();

/**
 * Input Reader
 *
 * Resolves the input location to files and streams their lines. A file is
 * one source; a directory contributes each of its regular files, in name
 * order, skipping names that start with `.` or `_`.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline';
import { ErrorCode, wrapError } from '../errors';

/**
 * Whether a directory entry is skipped as hidden or bookkeeping
 */
export function isHiddenInput(name: string): boolean {
    return name.startsWith('.') || name.startsWith('_');
}

/**
 * List the files an input location resolves to
 */
export async function listInputFiles(location: string): Promise<string[]> {
    let stat: fs.Stats;
    try {
        stat = await fs.promises.stat(location);
    } catch (error) {
        throw wrapError(`Cannot access input: ${location}`, error, ErrorCode.INPUT_READ_FAILED, {
            filePath: location
        });
    }

    if (stat.isFile()) {
        return [location];
    }
    if (!stat.isDirectory()) {
        throw wrapError(`Input is neither a file nor a directory: ${location}`, undefined, ErrorCode.INPUT_READ_FAILED, {
            filePath: location
        });
    }

    let entries: fs.Dirent[];
    try {
        entries = await fs.promises.readdir(location, { withFileTypes: true });
    } catch (error) {
        throw wrapError(`Cannot list input directory: ${location}`, error, ErrorCode.INPUT_READ_FAILED, {
            filePath: location
        });
    }

    return entries
        .filter(entry => entry.isFile() && !isHiddenInput(entry.name))
        .map(entry => entry.name)
        .sort()
        .map(name => path.join(location, name));
}

/**
 * Stream the lines of one UTF-8 file without their terminators.
 * `\n`, `\r\n` and a lone `\r` all end a line; a trailing terminator does
 * not produce a final empty line.
 */
export async function* readLines(filePath: string): AsyncGenerator<string> {
    const input = fs.createReadStream(filePath, { encoding: 'utf-8' });
    const lines = readline.createInterface({ input, crlfDelay: Infinity });
    let streamError: unknown;
    input.on('error', (error) => {
        streamError = error;
        lines.close();
    });

    try {
        for await (const line of lines) {
            yield line;
        }
    } catch (error) {
        streamError = error;
    } finally {
        lines.close();
        input.destroy();
    }

    if (streamError !== undefined) {
        throw wrapError(`Cannot read input file: ${filePath}`, streamError, ErrorCode.INPUT_READ_FAILED, {
            filePath
        });
    }
}

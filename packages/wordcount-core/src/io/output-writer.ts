/**
 * Output Writer
 *
 * Writes the serialized result to the output location. An existing file is
 * never replaced unless `overwrite` is set.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ErrorCode, WordCountError, wrapError } from '../errors';
import { getLogger, LogCategory } from '../logger';

export interface WriteOutputOptions {
    /** Replace an existing file (default: false) */
    overwrite?: boolean;
}

function isAlreadyExists(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Write `content` to `location`, creating parent directories as needed
 */
export async function writeOutputFile(
    location: string,
    content: string,
    options: WriteOutputOptions = {}
): Promise<void> {
    const overwrite = options.overwrite ?? false;

    try {
        await fs.promises.mkdir(path.dirname(path.resolve(location)), { recursive: true });
        await fs.promises.writeFile(location, content, {
            encoding: 'utf-8',
            flag: overwrite ? 'w' : 'wx'
        });
    } catch (error) {
        if (isAlreadyExists(error)) {
            throw new WordCountError(`Output already exists: ${location}`, {
                code: ErrorCode.OUTPUT_EXISTS,
                cause: error,
                meta: { filePath: location }
            });
        }
        throw wrapError(`Cannot write output: ${location}`, error, ErrorCode.OUTPUT_WRITE_FAILED, {
            filePath: location
        });
    }

    getLogger().debug(LogCategory.IO, `Wrote ${Buffer.byteLength(content, 'utf-8')} bytes to ${location}`);
}

/**
 * Fail early, before any processing, when the output would be refused
 */
export async function assertOutputWritable(location: string, options: WriteOutputOptions = {}): Promise<void> {
    if (options.overwrite) {
        return;
    }
    try {
        await fs.promises.access(location);
    } catch {
        // Nothing there yet
        return;
    }
    throw new WordCountError(`Output already exists: ${location}`, {
        code: ErrorCode.OUTPUT_EXISTS,
        meta: { filePath: location }
    });
}

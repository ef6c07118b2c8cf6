/**
 * File Splitter
 *
 * Streams input files into partitions of at most `partitionSize` lines.
 * Partitions are yielded as soon as they fill up, so only the partitions
 * being mapped are held in memory. A partition never spans two files.
 */

import { readLines } from '../../io/input-reader';
import { getLogger, LogCategory } from '../../logger';
import type { Splitter, WorkItem } from '../types';
import { createPartitionItem, resolvePartitionSize } from './line-splitter';
import type { LinePartition, LineSplitterOptions } from './line-splitter';

export class FileSplitter implements Splitter<string[], LinePartition> {
    private readonly partitionSize: number;

    constructor(options: Partial<LineSplitterOptions> = {}) {
        this.partitionSize = resolvePartitionSize(options.partitionSize);
    }

    async *split(files: string[]): AsyncGenerator<WorkItem<LinePartition>> {
        let index = 0;

        for (const file of files) {
            let lines: string[] = [];
            let firstLineNumber = 1;
            let lineCount = 0;

            for await (const line of readLines(file)) {
                lines.push(line);
                lineCount++;
                if (lines.length === this.partitionSize) {
                    yield createPartitionItem(index++, file, firstLineNumber, lines);
                    firstLineNumber += lines.length;
                    lines = [];
                }
            }

            if (lines.length > 0) {
                yield createPartitionItem(index++, file, firstLineNumber, lines);
            }
            getLogger().debug(LogCategory.IO, `Read ${lineCount} lines from ${file}`);
        }
    }
}

/**
 * Create a file splitter
 */
export function createFileSplitter(partitionSize?: number): FileSplitter {
    return new FileSplitter({ partitionSize });
}

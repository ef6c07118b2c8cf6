/**
 * Line Splitter
 *
 * Partitions line-oriented sources into work items of at most
 * `partitionSize` lines. A partition never spans two sources, and each
 * keeps the 1-based number of its first line for diagnostics.
 */

import { DEFAULT_PARTITION_SIZE } from '../../config/defaults';
import type { Splitter, WorkItem } from '../types';

/**
 * One named source of lines held in memory
 */
export interface LineSource {
    /** Source identifier, e.g. a file path */
    name: string;
    /** Lines without their terminators */
    lines: string[];
}

/**
 * Work item data for one partition
 */
export interface LinePartition {
    /** Source identifier */
    source: string;
    /** 1-based line number of `lines[0]` within the source */
    firstLineNumber: number;
    /** The lines of this partition */
    lines: string[];
}

/**
 * Options for the line splitter
 */
export interface LineSplitterOptions {
    /** Maximum lines per partition */
    partitionSize: number;
}

/**
 * Build the work item for one partition
 */
export function createPartitionItem(
    index: number,
    source: string,
    firstLineNumber: number,
    lines: string[]
): WorkItem<LinePartition> {
    return {
        id: `partition-${index}`,
        data: { source, firstLineNumber, lines },
        metadata: { source, lineCount: lines.length }
    };
}

/**
 * Validate a partition size, falling back to the default
 */
export function resolvePartitionSize(partitionSize: number | undefined): number {
    const size = partitionSize ?? DEFAULT_PARTITION_SIZE;
    if (!Number.isInteger(size) || size < 1) {
        throw new Error('partitionSize must be a positive integer');
    }
    return size;
}

export class LineSplitter implements Splitter<LineSource[], LinePartition> {
    private readonly partitionSize: number;

    constructor(options: Partial<LineSplitterOptions> = {}) {
        this.partitionSize = resolvePartitionSize(options.partitionSize);
    }

    split(sources: LineSource[]): WorkItem<LinePartition>[] {
        const items: WorkItem<LinePartition>[] = [];

        for (const source of sources) {
            for (let start = 0; start < source.lines.length; start += this.partitionSize) {
                const lines = source.lines.slice(start, start + this.partitionSize);
                items.push(createPartitionItem(items.length, source.name, start + 1, lines));
            }
        }

        return items;
    }
}

/**
 * Create a line splitter
 */
export function createLineSplitter(partitionSize?: number): LineSplitter {
    return new LineSplitter({ partitionSize });
}

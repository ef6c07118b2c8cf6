/**
 * Splitters
 */

export { LineSplitter, createLineSplitter } from './line-splitter';
export { FileSplitter, createFileSplitter } from './file-splitter';
export type { LineSource, LinePartition, LineSplitterOptions } from './line-splitter';

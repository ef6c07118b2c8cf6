/**
 * Input/Output
 */

export { isHiddenInput, listInputFiles, readLines } from './input-reader';
export { writeOutputFile, assertOutputWritable } from './output-writer';
export type { WriteOutputOptions } from './output-writer';

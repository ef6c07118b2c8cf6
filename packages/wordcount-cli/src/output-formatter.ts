/**
 * Output Formatter
 *
 * Serializes word counts for the output file (tsv, json) and renders the
 * run summary printed to stderr.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import type { WordCountEntry, WordCountResult } from 'wordcount-core';
import { bold, green, red, yellow } from './logger';
import type { OutputFormat } from './config';

export type { OutputFormat } from './config';

// ============================================================================
// Main Formatter
// ============================================================================

/**
 * Format word counts according to the specified format. Entry order is kept.
 */
export function formatWordCounts(entries: WordCountEntry[], format: OutputFormat): string {
    switch (format) {
        case 'json':
            return formatJSON(entries);
        case 'tsv':
        default:
            return formatTSV(entries);
    }
}

// ============================================================================
// TSV Format
// ============================================================================

function formatTSV(entries: WordCountEntry[]): string {
    return entries.map(({ word, count }) => `${word}\t${count}\n`).join('');
}

// ============================================================================
// JSON Format
// ============================================================================

// Written by hand: a plain object would move integer-like words ("2019") to the front
function formatJSON(entries: WordCountEntry[]): string {
    if (entries.length === 0) {
        return '{}\n';
    }
    const lines = entries.map(({ word, count }) => `  ${JSON.stringify(word)}: ${count}`);
    return `{\n${lines.join(',\n')}\n}\n`;
}

// ============================================================================
// Summary
// ============================================================================

/**
 * Format the run summary: record counters, then execution stats
 */
export function formatSummary(result: WordCountResult): string {
    const { counters, stats } = result;
    const lines: string[] = [];

    lines.push('');
    lines.push(bold('Summary'));

    lines.push(`  Lines read:        ${counters.linesRead}`);
    lines.push(`  Header lines:      ${counters.headerLines}`);
    lines.push(`  Accepted records:  ${green(String(counters.acceptedRecords))}`);
    lines.push(`  After cutoff:      ${counters.afterCutoff}`);

    if (counters.malformedRecords > 0) {
        lines.push(
            `  Malformed records: ${yellow(String(counters.malformedRecords))}` +
            ` (${counters.missingFields} missing fields, ${counters.invalidDates} invalid dates)`
        );
    }

    lines.push(`  Words emitted:     ${counters.wordsEmitted}`);
    lines.push(`  Distinct words:    ${result.entries.length}`);

    lines.push('');
    lines.push(`  Partitions:  ${stats.totalItems} (max ${stats.maxConcurrency} concurrent${stats.combined ? ', combined' : ''})`);
    if (stats.retriedMaps > 0) {
        lines.push(`  Re-runs:     ${red(String(stats.retriedMaps))}`);
    }
    lines.push(`  Duration:    ${formatDuration(result.totalTimeMs)}`);

    return lines.join('\n');
}

/**
 * Format a duration in milliseconds to a human-readable string
 */
export function formatDuration(ms: number): string {
    if (ms < 1000) {
        return `${ms}ms`;
    }
    if (ms < 60000) {
        return `${(ms / 1000).toFixed(1)}s`;
    }
    const minutes = Math.floor(ms / 60000);
    const seconds = Math.round((ms % 60000) / 1000);
    return `${minutes}m ${seconds}s`;
}

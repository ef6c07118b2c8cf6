/**
 * Run Command Tests
 *
 * Runs the whole word count against temporary files.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { resetLogger } from 'wordcount-core';
import { executeRun } from '../../src/commands/run';
import type { RunCommandOptions } from '../../src/commands/run';
import { setColorEnabled, setVerbosity } from '../../src/logger';

const POSTS = [
    'Hello World\tx\t01-01-2019\tfoo bar',
    'Ignored Title\t\t01-01-2019\treply text',
    'Late Post\tx\t01-01-2020\tfoo',
    'post_theme header date line\tx\t01-01-2019\tfoo',
].join('\n') + '\n';

const OPTIONS: RunCommandOptions = {
    parallel: 2,
    partitionSize: 1,
    combine: true,
    format: 'tsv',
    force: false,
    verbose: false,
};

describe('executeRun', () => {
    let tmpDir: string;
    let inputPath: string;
    let outputPath: string;
    let stderrSpy: MockInstance;

    const stderr = (): string => stderrSpy.mock.calls.map(call => String(call[0])).join('');

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'wordcount-run-'));
        inputPath = path.join(tmpDir, 'posts.tsv');
        outputPath = path.join(tmpDir, 'out', 'counts.tsv');
        fs.writeFileSync(inputPath, POSTS);
        setColorEnabled(false);
        setVerbosity('quiet');
        stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    });

    afterEach(() => {
        stderrSpy.mockRestore();
        fs.rmSync(tmpDir, { recursive: true, force: true });
        setVerbosity('normal');
        setColorEnabled(true);
        resetLogger();
    });

    it('should write sorted tab-separated counts', async () => {
        expect(await executeRun(inputPath, outputPath, OPTIONS)).toBe(0);
        expect(fs.readFileSync(outputPath, 'utf-8')).toBe(
            'bar\t1\nfoo\t1\nhello\t1\nreply\t1\ntext\t1\nworld\t1\n'
        );
        expect(stderr()).toBe('');
    });

    it('should write JSON when asked', async () => {
        expect(await executeRun(inputPath, outputPath, { ...OPTIONS, format: 'json', combine: false })).toBe(0);
        expect(JSON.parse(fs.readFileSync(outputPath, 'utf-8'))).toEqual({
            bar: 1, foo: 1, hello: 1, reply: 1, text: 1, world: 1,
        });
    });

    it('should refuse to replace an existing output', async () => {
        fs.mkdirSync(path.dirname(outputPath));
        fs.writeFileSync(outputPath, 'previous');

        expect(await executeRun(inputPath, outputPath, OPTIONS)).toBe(1);
        expect(fs.readFileSync(outputPath, 'utf-8')).toBe('previous');
        expect(stderr()).toContain('[OUTPUT_EXISTS]');
    });

    it('should replace an existing output with force', async () => {
        fs.mkdirSync(path.dirname(outputPath));
        fs.writeFileSync(outputPath, 'previous');

        expect(await executeRun(inputPath, outputPath, { ...OPTIONS, force: true })).toBe(0);
        expect(fs.readFileSync(outputPath, 'utf-8')).toBe(
            'bar\t1\nfoo\t1\nhello\t1\nreply\t1\ntext\t1\nworld\t1\n'
        );
    });

    it('should fail for a missing input', async () => {
        expect(await executeRun(path.join(tmpDir, 'missing.tsv'), outputPath, OPTIONS)).toBe(1);
        expect(stderr()).toContain('[INPUT_READ_FAILED]');
        expect(fs.existsSync(outputPath)).toBe(false);
    });

    it('should print error metadata when verbose', async () => {
        const missing = path.join(tmpDir, 'missing.tsv');
        expect(await executeRun(missing, outputPath, { ...OPTIONS, verbose: true })).toBe(1);

        const output = stderr();
        expect(output).toContain(`[INPUT_READ_FAILED] Cannot access input: ${missing} -> ENOENT`);
        expect(output).toContain(`\n  filePath: ${missing}\n`);
    });

    it('should print the summary at normal verbosity', async () => {
        setVerbosity('normal');
        expect(await executeRun(inputPath, outputPath, OPTIONS)).toBe(0);

        const output = stderr();
        expect(output).toContain('\nSummary\n');
        expect(output).toContain('  Accepted records:  2\n');
        expect(output).toContain('  Partitions:  4 (max 2 concurrent, combined)\n');
        expect(output).toContain(`Results written to ${path.resolve(outputPath)}\n`);
    });
});

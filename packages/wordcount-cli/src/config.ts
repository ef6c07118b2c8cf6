/**
 * CLI Configuration
 *
 * Resolves CLI configuration from the config file and defaults.
 * Configuration file: ~/.wordcount.yaml (or --config <path>)
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import * as yaml from 'js-yaml';
import {
    DEFAULT_MAX_CONCURRENCY,
    DEFAULT_PARTITION_SIZE,
    ErrorCode,
    WordCountError,
    wrapError,
} from 'wordcount-core';

// ============================================================================
// Types
// ============================================================================

export type OutputFormat = 'tsv' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['tsv', 'json'];

/**
 * CLI configuration as stored in the config file
 */
export interface CLIConfig {
    /** Partitions mapped at once */
    parallel?: number;
    /** Lines per partition */
    partitionSize?: number;
    /** Combine each partition before the shuffle */
    combine?: boolean;
    /** Output format */
    format?: OutputFormat;
}

/**
 * Resolved CLI configuration with all defaults applied
 */
export interface ResolvedCLIConfig {
    parallel: number;
    partitionSize: number;
    combine: boolean;
    format: OutputFormat;
}

// ============================================================================
// Constants
// ============================================================================

export const CONFIG_FILE_NAME = '.wordcount.yaml';

export const DEFAULT_CONFIG: ResolvedCLIConfig = {
    parallel: DEFAULT_MAX_CONCURRENCY,
    partitionSize: DEFAULT_PARTITION_SIZE,
    combine: true,
    format: 'tsv',
};

// ============================================================================
// Config Resolution
// ============================================================================

export function getConfigFilePath(): string {
    return path.join(os.homedir(), CONFIG_FILE_NAME);
}

export function isOutputFormat(value: unknown): value is OutputFormat {
    return value === 'tsv' || value === 'json';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Floor a YAML number to a positive safe integer. `.inf`, `.nan` and values
 * past 2^53 - 1 give undefined.
 */
function toPositiveInt(value: unknown): number | undefined {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        return undefined;
    }
    const floored = Math.floor(value);
    return Number.isSafeInteger(floored) && floored >= 1 ? floored : undefined;
}

/**
 * Load CLI configuration from a config file.
 *
 * Without an explicit path, a missing or unreadable ~/.wordcount.yaml yields
 * undefined. An explicit path must exist and parse, otherwise CONFIG_INVALID.
 */
export function loadConfigFile(configPath?: string): CLIConfig | undefined {
    const explicit = configPath !== undefined;
    const filePath = configPath ?? getConfigFilePath();

    if (!fs.existsSync(filePath)) {
        if (explicit) {
            throw new WordCountError(`Config file not found: ${filePath}`, {
                code: ErrorCode.CONFIG_INVALID,
                meta: { filePath },
            });
        }
        return undefined;
    }

    let parsed: unknown;
    try {
        parsed = yaml.load(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
        if (explicit) {
            throw wrapError(`Cannot parse config file: ${filePath}`, error, ErrorCode.CONFIG_INVALID, { filePath });
        }
        return undefined;
    }

    return validateConfig(parsed);
}

/**
 * Keep only well-typed fields; anything else is dropped
 */
export function validateConfig(config: unknown): CLIConfig | undefined {
    if (!isPlainObject(config)) {
        return undefined;
    }

    const result: CLIConfig = {};

    const parallel = toPositiveInt(config.parallel);
    if (parallel !== undefined) {
        result.parallel = parallel;
    }

    const partitionSize = toPositiveInt(config.partitionSize);
    if (partitionSize !== undefined) {
        result.partitionSize = partitionSize;
    }

    if (typeof config.combine === 'boolean') {
        result.combine = config.combine;
    }

    if (isOutputFormat(config.format)) {
        result.format = config.format;
    }

    return result;
}

/**
 * Resolve CLI configuration by merging the config file over defaults.
 * Command-line options are applied on top of the result.
 */
export function resolveConfig(configPath?: string): ResolvedCLIConfig {
    return mergeConfig(DEFAULT_CONFIG, loadConfigFile(configPath));
}

/**
 * Merge a partial config on top of a base config
 */
export function mergeConfig(base: ResolvedCLIConfig, override?: CLIConfig): ResolvedCLIConfig {
    if (!override) {
        return { ...base };
    }

    return {
        parallel: override.parallel ?? base.parallel,
        partitionSize: override.partitionSize ?? base.partitionSize,
        combine: override.combine ?? base.combine,
        format: override.format ?? base.format,
    };
}

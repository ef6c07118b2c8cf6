/**
 * Centralized Defaults
 *
 * Single source of truth for the DEFAULT_* constants used across the wordcount-core package.
 */

// ============================================================================
// Concurrency & Partitioning
// ============================================================================

/**
 * Default maximum number of partitions mapped at the same time.
 */
export const DEFAULT_MAX_CONCURRENCY = 4;

/**
 * Default number of input lines per partition.
 */
export const DEFAULT_PARTITION_SIZE = 10000;

// ============================================================================
// Retries
// ============================================================================

/**
 * Default number of re-executions for a failed partition.
 */
export const DEFAULT_RETRY_ATTEMPTS = 1;

/**
 * Base delay before re-running a failed partition (grows linearly per attempt).
 */
export const DEFAULT_RETRY_DELAY_MS = 1000;

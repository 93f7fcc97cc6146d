/**
 * Orchestrator constants
 */

/**
 * Default identifiers per batch (unit of commit)
 */
export const DEFAULT_BATCH_SIZE = 500;

/**
 * Default polite delay between batches (seconds)
 */
export const DEFAULT_INTER_BATCH_DELAY_SECONDS = 0.5;

/**
 * Default target site
 */
export const DEFAULT_BASE_URL = "https://instaud.io";

/**
 * Run lock constants
 *
 * Configuration for the store run lock (one writer per store).
 */

/**
 * Suffix appended to the store path to form the lock file path
 */
export const RUN_LOCK_FILE_SUFFIX = ".lock";

/**
 * Lock TTL in seconds
 * After this time, a stale lock can be taken over by another process.
 * Default: 1 hour (3600 seconds)
 */
export const RUN_LOCK_TTL_SECONDS = 3600;

/**
 * Record store constants
 */

/**
 * Stored column order of the record table (CSV header and SQLite columns)
 */
export const RECORD_COLUMNS = [
  "url",
  "code",
  "title",
  "duration",
  "duration_seconds",
  "listens",
  "downloads",
  "status",
  "error",
] as const;

/**
 * Record status values that are not HTTP status codes
 */
export const RECORD_STATUS_ERROR = "ERROR";
export const RECORD_STATUS_EXTRACTION_ERROR = "EXTRACTION_ERROR";

/**
 * Default store locations per backend
 */
export const DEFAULT_CSV_STORE_PATH = "data/results.csv";
export const DEFAULT_SQLITE_STORE_PATH = "data/results.db";

/**
 * How far back from the end of a CSV file to look for the last line break
 * when repairing a torn tail
 */
export const TORN_TAIL_SCAN_BYTES = 64 * 1024;

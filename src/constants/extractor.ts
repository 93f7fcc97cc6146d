/**
 * Audio page extraction constants
 */

/**
 * Suffix the site appends to every page title
 */
export const DEFAULT_TITLE_SUFFIX = " - Instaudio";

/**
 * Display value when the duration is unknown
 */
export const UNKNOWN_DURATION_DISPLAY = "?:??";

/**
 * Page-text patterns for the stats counters ("1,234 listens", "5 downloads")
 */
export const LISTENS_PATTERN = /(\d+(?:,\d+)*)\s*listen/i;
export const DOWNLOADS_PATTERN = /(\d+(?:,\d+)*)\s*download/i;

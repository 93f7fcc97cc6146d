/**
 * Code space constants
 */

/**
 * Base36 alphabet (digits then lowercase letters)
 */
export const BASE36_ALPHABET = "0123456789abcdefghijklmnopqrstuvwxyz";

/**
 * Short (3-character) code class
 * "000" is a placeholder on the target site and is never probed
 */
export const SHORT_CODE_LENGTH = 3;
export const SHORT_CODE_EXCLUDE = ["000"] as const;

/**
 * Long (4-character) code class bounds
 * Codes above 3zzz have not been issued yet
 */
export const LONG_CODE_LENGTH = 4;
export const DEFAULT_LONG_CODE_START = "1000";
export const DEFAULT_LONG_CODE_END = "3zzz";

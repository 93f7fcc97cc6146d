/**
 * Probe executor constants
 */

/**
 * Default worker pool size (concurrent probes per batch)
 */
export const DEFAULT_THREAD_COUNT = 15;

/**
 * Default per-request timeout (15 seconds)
 */
export const DEFAULT_PROBE_TIMEOUT_MS = 15_000;

/**
 * Default User-Agent sent with every probe
 */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) codespace-crawler/0.1";

/**
 * HTTP statuses meaning "this code does not exist"
 * A 3xx that leaves the code's page is also not-found (the site bounces unknown codes)
 */
export const NOT_FOUND_STATUS_CODES = [404, 410];

/**
 * Redirect hops followed while they stay on the same code (scheme, host alias, trailing slash)
 */
export const MAX_SAME_CODE_REDIRECTS = 3;

/**
 * Retry policy defaults
 *
 * 3 attempts total: first retry after ~1s, second after ~2s (with jitter)
 */
export const DEFAULT_PROBE_MAX_ATTEMPTS = 3;
export const DEFAULT_PROBE_BASE_DELAY_MS = 1_000;
export const DEFAULT_PROBE_MAX_DELAY_MS = 10_000;

/**
 * Maximum time in milliseconds to respect a Retry-After header
 */
export const DEFAULT_PROBE_MAX_RETRY_AFTER_MS = 30_000;

/**
 * Statuses whose Retry-After header is honoured
 */
export const RETRY_AFTER_STATUS_CODES = [429, 503];

/**
 * Maximum length of error text kept in a record
 */
export const ERROR_TEXT_MAX_LENGTH = 100;

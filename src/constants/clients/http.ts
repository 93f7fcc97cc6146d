/**
 * HTTP client constants
 *
 * Defaults and configuration
 */

/**
 * Default request timeout in milliseconds (30 seconds)
 */
export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

/**
 * Default headers for HTML/text requests
 */
export const DEFAULT_TEXT_HEADERS: Record<string, string> = {
  Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
};

/**
 * Maximum length of error body snippet to include in error messages
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;

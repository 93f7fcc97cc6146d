/**
 * Error message helpers
 */

/**
 * Extract a short, single-line error message
 *
 * @param error - The error object
 * @param maxLength - Maximum message length (longer messages are cut with "...")
 */
export function getErrorMessage(error: unknown, maxLength = 500): string {
  const raw = error instanceof Error ? error.message : String(error);
  const message = raw.replace(/\s+/g, " ").trim();
  return message.length > maxLength
    ? message.substring(0, maxLength - 3) + "..."
    : message;
}

/**
 * Check if an error is a fetch timeout/abort
 *
 * fetch rejects with a DOMException named "AbortError" (or "TimeoutError"
 * for AbortSignal.timeout), which is not always an Error instance.
 */
export function isAbortError(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("name" in error)) {
    return false;
  }
  return error.name === "AbortError" || error.name === "TimeoutError";
}

/**
 * HttpError class
 *
 * Structured error for non-2xx responses
 */

import type { HttpErrorDetails } from "@/types";

function describeStatus(details: HttpErrorDetails): string {
  return details.statusText ? `${details.status} ${details.statusText}` : String(details.status);
}

/**
 * Structured error class for HTTP failures
 *
 * Carries the status and response headers so callers can classify the
 * response (redirect, not found, rate limited) without re-reading it.
 */
export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  public readonly headers?: Headers;

  constructor(details: HttpErrorDetails) {
    super(`HTTP ${describeStatus(details)} - ${details.url}`);
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;

    // Maintain proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError);
    }
  }

  /**
   * True for 3xx responses (only seen with `redirect: "manual"`)
   */
  get isRedirect(): boolean {
    return this.status >= 300 && this.status < 400;
  }

  /**
   * Redirect target, if the response named one
   */
  get location(): string | null {
    return this.headers?.get("location") ?? null;
  }

  /**
   * Header value, or null when absent
   */
  header(name: string): string | null {
    return this.headers?.get(name) ?? null;
  }
}

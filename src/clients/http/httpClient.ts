/**
 * HTTP client wrapper
 *
 * Single-attempt requests using native fetch
 * Supports timeouts, manual redirects, and structured error handling.
 * Bodies are read as text; retrying is the caller's concern (see the probe retry policy).
 */

import type { HttpRequest, HttpResponse } from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_TEXT_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
} from "@/constants";

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch {
    return undefined;
  }
}

/**
 * Perform a single HTTP request with timeout and error handling
 *
 * Non-2xx responses (including 3xx when `redirect: "manual"`) are thrown as
 * HttpError so callers can classify them by status.
 *
 * @returns Status, final URL and body text of a 2xx response
 * @throws {HttpError} On non-2xx status codes
 * @throws {Error} On network errors or timeouts (AbortError)
 */
export async function httpRequest(req: HttpRequest): Promise<HttpResponse> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;

  // Setup timeout using AbortController
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    // Defaults first, caller headers override
    const headers: Record<string, string> = { ...DEFAULT_TEXT_HEADERS, ...req.headers };

    const response = await fetch(req.url, {
      method: req.method,
      headers,
      redirect: req.redirect ?? "follow",
      signal: controller.signal,
    });

    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url: req.url,
        bodySnippet,
        headers: response.headers,
      });
    }

    const body = response.status === 204 ? "" : await response.text();

    return {
      status: response.status,
      url: response.url || req.url,
      body,
    };
  } finally {
    clearTimeout(timeoutId);
  }
}

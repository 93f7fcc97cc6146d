/**
 * Probe URL building and outcome classification
 */

import type { AttemptClassification } from "@/types";
import { HttpError } from "@/clients/http";
import { NOT_FOUND_STATUS_CODES } from "@/constants";
import { getErrorMessage, isAbortError } from "@/utils";

/**
 * Deterministic probe URL: `${baseUrl}/${code}`
 */
export function buildProbeUrl(baseUrl: string, code: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${encodeURIComponent(code)}`;
}

function stripWww(hostname: string): string {
  return hostname.replace(/^www\./, "");
}

/**
 * Resolve a redirect that still points at the same code's page
 *
 * Canonicalising hops (http to https, www alias, trailing slash) keep the
 * host and end in the code's path segment. Anything else returns null.
 *
 * @param location - Location header of the 3xx response
 * @param fromUrl - URL that answered with the redirect
 * @returns Absolute URL to follow, or null
 */
export function sameCodeRedirectTarget(
  location: string | null,
  fromUrl: string,
  code: string,
): string | null {
  if (!location) {
    return null;
  }

  let from: URL;
  let target: URL;
  try {
    from = new URL(fromUrl);
    target = new URL(location, from);
  } catch {
    return null;
  }

  if (stripWww(target.hostname) !== stripWww(from.hostname)) {
    return null;
  }

  const segments = target.pathname.split("/").filter((segment) => segment.length > 0);
  const last = segments.at(-1);
  if (last === undefined || last !== encodeURIComponent(code)) {
    return null;
  }

  return target.href;
}

/**
 * Check if an HTTP status means the code does not exist
 *
 * Unknown codes are either answered with 404/410 or bounced with a redirect.
 */
export function isNotFoundStatus(status: number): boolean {
  return NOT_FOUND_STATUS_CODES.includes(status) || (status >= 300 && status < 400);
}

/**
 * Classify a failed attempt
 *
 * - not_found: 404, 410, or a 3xx redirect that was not followed
 * - transient_error: timeouts, network failures, and any other status
 */
export function classifyFailure(
  error: unknown,
): Exclude<AttemptClassification, { status: "found" }> {
  if (error instanceof HttpError) {
    if (isNotFoundStatus(error.status)) {
      return { status: "not_found", httpStatus: error.status };
    }
    return {
      status: "transient_error",
      httpStatus: error.status,
      error: `HTTP ${error.status} ${error.statusText}`.trim(),
    };
  }

  if (isAbortError(error)) {
    return { status: "transient_error", error: "Request timed out" };
  }

  // Network failures (TypeError: fetch failed) and anything unexpected
  // are retried; the retry budget bounds the cost
  return { status: "transient_error", error: getErrorMessage(error) };
}

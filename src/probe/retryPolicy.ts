/**
 * Retry policy for transient probe failures
 *
 * Pure decision object (no I/O, no sleeping): how many attempts a probe gets
 * and how long to wait before each retry.
 */

import type { RetryPolicyConfig } from "@/types";
import {
  DEFAULT_PROBE_MAX_ATTEMPTS,
  DEFAULT_PROBE_BASE_DELAY_MS,
  DEFAULT_PROBE_MAX_DELAY_MS,
  DEFAULT_PROBE_MAX_RETRY_AFTER_MS,
} from "@/constants";

/**
 * Parse Retry-After header value
 * Supports both delay-seconds (number) and HTTP-date formats
 * Returns delay in milliseconds, or null if invalid/missing
 */
export function parseRetryAfter(
  retryAfterHeader: string | null | undefined,
  now: number = Date.now(),
): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  // Try parsing as seconds (numeric)
  if (/^\d+$/.test(retryAfterHeader.trim())) {
    const seconds = parseInt(retryAfterHeader, 10);
    return seconds > 0 ? seconds * 1000 : null;
  }

  // Try parsing as HTTP date
  const date = new Date(retryAfterHeader);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - now;
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly maxRetryAfterMs: number;
  private readonly random: () => number;

  /**
   * @param config - Policy settings (defaults from constants)
   * @param random - Source of jitter in [0, 1); injectable for tests
   */
  constructor(config: Partial<RetryPolicyConfig> = {}, random: () => number = Math.random) {
    this.maxAttempts = config.maxAttempts ?? DEFAULT_PROBE_MAX_ATTEMPTS;
    this.baseDelayMs = config.baseDelayMs ?? DEFAULT_PROBE_BASE_DELAY_MS;
    this.maxDelayMs = config.maxDelayMs ?? DEFAULT_PROBE_MAX_DELAY_MS;
    this.maxRetryAfterMs = config.maxRetryAfterMs ?? DEFAULT_PROBE_MAX_RETRY_AFTER_MS;
    this.random = random;

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
    }
  }

  /**
   * Whether another attempt is allowed after `attempt` failed transiently
   *
   * @param attempt - 1-based number of the attempt that just failed
   */
  shouldRetry(attempt: number): boolean {
    return attempt < this.maxAttempts;
  }

  /**
   * Compute exponential backoff delay with jitter
   * Formula: min(maxDelay, baseDelay * 2^(attempt-1)) * (0.5 + random(0.5))
   */
  backoffDelay(attempt: number): number {
    const exponentialDelay = this.baseDelayMs * Math.pow(2, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.maxDelayMs);
    const jitter = 0.5 + this.random() * 0.5;
    return Math.floor(cappedDelay * jitter);
  }

  /**
   * Delay before the next attempt, considering a Retry-After header
   *
   * @param attempt - 1-based number of the attempt that just failed
   * @param retryAfterHeader - Retry-After value from a 429/503 response
   */
  delayForAttempt(attempt: number, retryAfterHeader?: string | null): number {
    const retryAfterMs = parseRetryAfter(retryAfterHeader);
    if (retryAfterMs !== null) {
      // Respect Retry-After but clamp to max
      return Math.min(retryAfterMs, this.maxRetryAfterMs);
    }

    return this.backoffDelay(attempt);
  }
}

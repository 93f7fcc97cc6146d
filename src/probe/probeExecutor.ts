/**
 * Probe executor
 *
 * Resolves a batch of codes to terminal outcomes
 *
 * Runs one GET per attempt against the code's URL through a bounded worker
 * pool, following redirects only while they stay on the same code. Every started probe yields exactly one outcome; transient failures
 * are retried per the RetryPolicy and downgraded to fatal_error when the
 * budget runs out.
 */

import pLimit from "p-limit";
import type {
  HttpRequestFn,
  HttpResponse,
  ProbeBatchOptions,
  ProbeOutcome,
} from "@/types";
import { httpRequest, HttpError } from "@/clients/http";
import {
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_THREAD_COUNT,
  DEFAULT_USER_AGENT,
  MAX_SAME_CODE_REDIRECTS,
  RETRY_AFTER_STATUS_CODES,
} from "@/constants";
import { sleep } from "@/utils";
import * as logger from "@/logger";
import { RetryPolicy } from "./retryPolicy";
import { buildProbeUrl, classifyFailure, sameCodeRedirectTarget } from "./classify";

export type ProbeExecutorOptions = {
  baseUrl: string;
  userAgent?: string;
  /** Worker pool size */
  threadCount?: number;
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  /** Request function (injectable for tests) */
  request?: HttpRequestFn;
  /** Delay function used between retries (injectable for tests) */
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Extract Retry-After header if the status carries one (429 or 503)
 */
function getRetryAfterHeader(error: unknown): string | null {
  if (error instanceof HttpError && RETRY_AFTER_STATUS_CODES.includes(error.status)) {
    return error.header("retry-after");
  }
  return null;
}

export class ProbeExecutor {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly threadCount: number;
  private readonly timeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly request: HttpRequestFn;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: ProbeExecutorOptions) {
    this.baseUrl = options.baseUrl;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.threadCount = options.threadCount ?? DEFAULT_THREAD_COUNT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy();
    this.request = options.request ?? httpRequest;
    this.sleep = options.sleep ?? sleep;

    if (!Number.isInteger(this.threadCount) || this.threadCount < 1) {
      throw new RangeError(`threadCount must be a positive integer, got ${this.threadCount}`);
    }
  }

  /**
   * One attempt: GET the code's URL, following same-code redirects
   *
   * A redirect elsewhere (or past the hop limit) is rethrown as HttpError.
   */
  private async fetchPage(code: string, url: string): Promise<HttpResponse> {
    let target = url;

    for (let hop = 0; ; hop++) {
      try {
        return await this.request({
          method: "GET",
          url: target,
          headers: { "User-Agent": this.userAgent },
          timeoutMs: this.timeoutMs,
          redirect: "manual",
        });
      } catch (error) {
        const next =
          error instanceof HttpError && error.isRedirect && hop < MAX_SAME_CODE_REDIRECTS
            ? sameCodeRedirectTarget(error.location, target, code)
            : null;
        if (next === null) {
          throw error;
        }
        logger.debug("Following redirect on the same code", { code, from: target, to: next });
        target = next;
      }
    }
  }

  /**
   * Probe one code until it reaches a terminal outcome
   *
   * Never throws: every failure becomes an outcome value.
   */
  async probe(code: string): Promise<ProbeOutcome> {
    const url = buildProbeUrl(this.baseUrl, code);
    let attempt = 0;

    for (;;) {
      attempt++;

      try {
        const response = await this.fetchPage(code, url);

        return {
          status: "found",
          code,
          url,
          httpStatus: response.status,
          body: response.body,
          attempts: attempt,
        };
      } catch (error) {
        const classification = classifyFailure(error);

        if (classification.status === "not_found") {
          if (error instanceof HttpError && error.isRedirect) {
            logger.debug("Probe redirected, treating as not found", {
              code,
              status: error.status,
              location: error.location,
            });
          }
          return {
            status: "not_found",
            code,
            url,
            httpStatus: classification.httpStatus,
            attempts: attempt,
          };
        }

        if (!this.retryPolicy.shouldRetry(attempt)) {
          return {
            status: "fatal_error",
            code,
            url,
            httpStatus: classification.httpStatus,
            error: `${classification.error} (after ${attempt} attempts)`,
            attempts: attempt,
            exhausted: true,
          };
        }

        const delayMs = this.retryPolicy.delayForAttempt(
          attempt,
          getRetryAfterHeader(error),
        );

        logger.debug("Retrying probe", {
          code,
          attempt,
          maxAttempts: this.retryPolicy.maxAttempts,
          delayMs,
          reason: classification.error,
        });

        await this.sleep(delayMs);
      }
    }
  }

  /**
   * Probe a batch of codes with bounded concurrency
   *
   * Resolves once every started probe has settled. After the signal aborts,
   * codes not yet started are skipped (they get no outcome and stay
   * unsettled). Outcomes are returned in the batch's code order.
   */
  async probeBatch(
    codes: readonly string[],
    options: ProbeBatchOptions = {},
  ): Promise<ProbeOutcome[]> {
    const { signal } = options;
    const limit = pLimit(this.threadCount);
    const slots: Array<ProbeOutcome | undefined> = new Array(codes.length);

    await Promise.all(
      codes.map((code, index) =>
        limit(async () => {
          if (signal?.aborted) {
            return;
          }
          const outcome = await this.probe(code);
          slots[index] = outcome;

          logger.debug("Probe settled", {
            code,
            status: outcome.status,
            attempts: outcome.attempts,
          });
        }),
      ),
    );

    return slots.filter((outcome): outcome is ProbeOutcome => outcome !== undefined);
  }
}

/**
 * Probe type definitions
 *
 * Shapes produced by the probe executor for each identifier in a batch.
 */

/**
 * Classification of a single probe
 *
 * transient_error only exists between attempts; the executor downgrades it
 * to fatal_error once the retry budget is spent.
 */
export type ProbeStatus =
  | "found"
  | "not_found"
  | "transient_error"
  | "fatal_error";

export type FoundOutcome = {
  status: "found";
  code: string;
  url: string;
  httpStatus: number;
  /** Raw page body, consumed by the extractor then discarded */
  body: string;
  attempts: number;
};

export type NotFoundOutcome = {
  status: "not_found";
  code: string;
  url: string;
  httpStatus: number;
  attempts: number;
};

export type FatalErrorOutcome = {
  status: "fatal_error";
  code: string;
  url: string;
  httpStatus?: number;
  error: string;
  attempts: number;
  /** True when the failure was transient and the retry budget ran out */
  exhausted: boolean;
};

/**
 * Terminal outcome of probing one identifier
 */
export type ProbeOutcome = FoundOutcome | NotFoundOutcome | FatalErrorOutcome;

/**
 * Classification of a single attempt (before retry decisions)
 */
export type AttemptClassification =
  | { status: "found"; httpStatus: number }
  | { status: "not_found"; httpStatus: number }
  | { status: "transient_error"; httpStatus?: number; error: string };

/**
 * Options for one batch run of the probe executor
 */
export type ProbeBatchOptions = {
  /** Once aborted, no new probe is started; in-flight probes finish */
  signal?: AbortSignal;
};

/**
 * Retry policy settings for transient probe failures
 */
export interface RetryPolicyConfig {
  /** Maximum number of attempts (including the first request) */
  maxAttempts: number;
  /** Base delay in ms for exponential backoff */
  baseDelayMs: number;
  /** Maximum delay in ms between attempts */
  maxDelayMs: number;
  /** Maximum time in ms to honour a Retry-After header */
  maxRetryAfterMs: number;
}

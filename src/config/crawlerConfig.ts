/**
 * Crawler configuration
 *
 * Reads settings from environment variables (loaded from .env by the entry
 * point) and validates them before any probe runs.
 */

import type { CrawlerConfig, StoreBackend } from "@/types";
import {
  DEFAULT_BASE_URL,
  DEFAULT_BATCH_SIZE,
  DEFAULT_INTER_BATCH_DELAY_SECONDS,
  DEFAULT_THREAD_COUNT,
  DEFAULT_USER_AGENT,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_PROBE_MAX_ATTEMPTS,
  DEFAULT_PROBE_BASE_DELAY_MS,
  DEFAULT_PROBE_MAX_DELAY_MS,
  DEFAULT_PROBE_MAX_RETRY_AFTER_MS,
  DEFAULT_LONG_CODE_START,
  DEFAULT_LONG_CODE_END,
  DEFAULT_TITLE_SUFFIX,
  DEFAULT_CSV_STORE_PATH,
  DEFAULT_SQLITE_STORE_PATH,
} from "@/constants";

/**
 * Invalid or missing configuration value
 */
export class ConfigError extends Error {
  public readonly variable: string;

  constructor(variable: string, message: string) {
    super(`Invalid config ${variable}: ${message}`);
    this.name = "ConfigError";
    this.variable = variable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}

type Env = Record<string, string | undefined>;

function readRaw(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = readRaw(env, name);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(name, `expected a positive integer, got "${raw}"`);
  }
  return value;
}

function readNonNegativeNumber(env: Env, name: string, fallback: number): number {
  const raw = readRaw(env, name);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(name, `expected a non-negative number, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = readRaw(env, name)?.toLowerCase();
  if (raw === undefined) {
    return fallback;
  }
  if (["true", "1", "yes", "on"].includes(raw)) {
    return true;
  }
  if (["false", "0", "no", "off"].includes(raw)) {
    return false;
  }
  throw new ConfigError(name, `expected true/false, got "${raw}"`);
}

function readBaseUrl(env: Env, name: string): string {
  const raw = readRaw(env, name) ?? DEFAULT_BASE_URL;
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError(name, `"${raw}" is not a valid URL`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(name, `unsupported protocol "${url.protocol}"`);
  }
  return raw.replace(/\/+$/, "");
}

function readStoreBackend(env: Env, name: string): StoreBackend {
  const raw = readRaw(env, name)?.toLowerCase() ?? "csv";
  if (raw === "csv" || raw === "sqlite") {
    return raw;
  }
  throw new ConfigError(name, `expected "csv" or "sqlite", got "${raw}"`);
}

/**
 * Load crawler configuration from environment variables
 *
 * @param env - Environment (defaults to process.env)
 * @throws {ConfigError} On any invalid value
 */
export function loadCrawlerConfig(env: Env = process.env): CrawlerConfig {
  const backend = readStoreBackend(env, "STORE_BACKEND");

  return {
    baseUrl: readBaseUrl(env, "CRAWL_BASE_URL"),
    userAgent: readRaw(env, "CRAWL_USER_AGENT") ?? DEFAULT_USER_AGENT,
    threadCount: readPositiveInt(env, "CRAWL_THREADS", DEFAULT_THREAD_COUNT),
    batchSize: readPositiveInt(env, "CRAWL_BATCH_SIZE", DEFAULT_BATCH_SIZE),
    interBatchDelaySeconds: readNonNegativeNumber(
      env,
      "CRAWL_BATCH_DELAY_SECONDS",
      DEFAULT_INTER_BATCH_DELAY_SECONDS,
    ),
    includeShortCodes: readBoolean(env, "CRAWL_INCLUDE_SHORT_CODES", true),
    longCodeStart: readRaw(env, "CRAWL_LONG_CODE_START")?.toLowerCase() ?? DEFAULT_LONG_CODE_START,
    longCodeEnd: readRaw(env, "CRAWL_LONG_CODE_END")?.toLowerCase() ?? DEFAULT_LONG_CODE_END,
    requestTimeoutMs: readPositiveInt(env, "CRAWL_TIMEOUT_MS", DEFAULT_PROBE_TIMEOUT_MS),
    retry: {
      maxAttempts: readPositiveInt(env, "CRAWL_MAX_ATTEMPTS", DEFAULT_PROBE_MAX_ATTEMPTS),
      baseDelayMs: readNonNegativeNumber(env, "CRAWL_RETRY_BASE_DELAY_MS", DEFAULT_PROBE_BASE_DELAY_MS),
      maxDelayMs: DEFAULT_PROBE_MAX_DELAY_MS,
      maxRetryAfterMs: DEFAULT_PROBE_MAX_RETRY_AFTER_MS,
    },
    titleSuffix: env.CRAWL_TITLE_SUFFIX ?? DEFAULT_TITLE_SUFFIX,
    store: {
      backend,
      path:
        readRaw(env, "STORE_PATH") ??
        (backend === "sqlite" ? DEFAULT_SQLITE_STORE_PATH : DEFAULT_CSV_STORE_PATH),
    },
  };
}

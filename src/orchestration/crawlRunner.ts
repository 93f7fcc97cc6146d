/**
 * Crawl runner
 *
 * One complete crawl against the configured store
 *
 * Acquires the store's run lock, opens the store, builds the code space and
 * probe executor from configuration, runs the orchestrator, and always
 * releases the lock and closes the store.
 */

import { randomUUID } from "crypto";
import { mkdirSync } from "fs";
import { dirname } from "path";
import type { CrawlerConfig, HttpRequestFn, RunState } from "@/types";
import { RUN_LOCK_TTL_SECONDS } from "@/constants";
import { buildCodeSpaceFromConfig, countCodes, generateCodes } from "@/codeSpace";
import { ProbeExecutor, RetryPolicy } from "@/probe";
import { AudioPageExtractor } from "@/extractor";
import {
  acquireRunLock,
  createRecordStore,
  lockPathFor,
  refreshRunLock,
  releaseRunLock,
} from "@/store";
import * as logger from "@/logger";
import { runCrawl } from "./crawlOrchestrator";

export type CrawlRunResult =
  | { status: "locked" }
  | { status: "completed" | "interrupted"; state: RunState };

export type CrawlRunOptions = {
  signal?: AbortSignal;
  /** Request function for the probe executor (tests inject the mock) */
  request?: HttpRequestFn;
  /** Retry delay function (tests inject a no-op) */
  retrySleep?: (ms: number) => Promise<void>;
  ownerId?: string;
};

/**
 * Run one crawl to completion or shutdown
 *
 * @returns "locked" if another process holds the store, otherwise the final state
 * @throws {CodeSpaceError} On an invalid code space
 * @throws {CrawlHaltedError} When a batch cannot be committed
 * @throws {StoreSchemaError} When the existing store has a foreign layout
 */
export async function runConfiguredCrawl(
  config: CrawlerConfig,
  options: CrawlRunOptions = {},
): Promise<CrawlRunResult> {
  // Validate the code space before touching the store
  const space = buildCodeSpaceFromConfig(config);

  const lockPath = lockPathFor(config.store.path);
  const ownerId = options.ownerId ?? randomUUID();
  const log = logger.withContext({ store: config.store.path });

  mkdirSync(dirname(lockPath), { recursive: true });
  const lockResult = acquireRunLock(lockPath, ownerId);
  if (!lockResult.ok) {
    log.warn("Failed to acquire run lock - another crawl may be writing this store", {
      reason: lockResult.reason,
      holderPid: lockResult.holder?.pid,
      expiresAt: lockResult.holder?.expires_at,
    });
    return { status: "locked" };
  }
  log.debug("Run lock acquired", { ownerId });

  const store = createRecordStore(config.store);

  try {
    const opened = await store.open();
    log.info("Store opened", {
      backend: config.store.backend,
      created: opened.created,
      repairedBytes: opened.repairedBytes,
    });

    log.info("Starting crawl", {
      baseUrl: config.baseUrl,
      totalCodes: countCodes(space),
      batchSize: config.batchSize,
      threadCount: config.threadCount,
    });

    const executor = new ProbeExecutor({
      baseUrl: config.baseUrl,
      userAgent: config.userAgent,
      threadCount: config.threadCount,
      timeoutMs: config.requestTimeoutMs,
      retryPolicy: new RetryPolicy(config.retry),
      request: options.request,
      sleep: options.retrySleep,
    });

    const state = await runCrawl(
      {
        codes: generateCodes(space),
        store,
        executor,
        extractor: new AudioPageExtractor({ titleSuffix: config.titleSuffix }),
        lock: {
          refresh: () => refreshRunLock(lockPath, ownerId, RUN_LOCK_TTL_SECONDS),
        },
      },
      {
        batchSize: config.batchSize,
        interBatchDelaySeconds: config.interBatchDelaySeconds,
        signal: options.signal,
      },
    );

    return { status: state.interrupted ? "interrupted" : "completed", state };
  } finally {
    await store.close();
    if (releaseRunLock(lockPath, ownerId)) {
      log.debug("Run lock released");
    } else {
      log.warn("Failed to release run lock (may not be owned)", { lockPath });
    }
  }
}

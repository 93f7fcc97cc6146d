/**
 * Crawler entrypoint
 *
 * Probes every code in the configured space once
 *
 * Usage:
 *   npm start
 *   STORE_BACKEND=sqlite CRAWL_THREADS=20 npm start
 *
 * Environment variables (all optional, see .env.example):
 *   - CRAWL_BASE_URL, CRAWL_THREADS, CRAWL_BATCH_SIZE, CRAWL_BATCH_DELAY_SECONDS
 *   - CRAWL_INCLUDE_SHORT_CODES, CRAWL_LONG_CODE_START, CRAWL_LONG_CODE_END
 *   - CRAWL_USER_AGENT, CRAWL_TIMEOUT_MS, CRAWL_MAX_ATTEMPTS, CRAWL_RETRY_BASE_DELAY_MS
 *   - CRAWL_TITLE_SUFFIX
 *   - STORE_BACKEND: csv (default) or sqlite
 *   - STORE_PATH: record store location
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 *
 * First SIGINT/SIGTERM stops after the current batch is committed; a second
 * one exits immediately.
 */

import "dotenv/config";
import { loadCrawlerConfig } from "./config";
import { runConfiguredCrawl, CrawlHaltedError } from "./orchestration";
import * as logger from "./logger";

async function main() {
  const controller = new AbortController();

  const handleShutdown = (signal: string) => {
    if (controller.signal.aborted) {
      logger.warn("Forced shutdown - exiting immediately");
      process.exit(1);
    }
    logger.info("Shutdown signal received, will stop after current batch", {
      signal,
    });
    controller.abort();
  };

  process.on("SIGINT", () => handleShutdown("SIGINT"));
  process.on("SIGTERM", () => handleShutdown("SIGTERM"));

  try {
    const config = loadCrawlerConfig();
    const result = await runConfiguredCrawl(config, { signal: controller.signal });

    if (result.status === "locked") {
      process.exitCode = 1;
      return;
    }
    process.exitCode = result.status === "interrupted" ? 130 : 0;
  } catch (error) {
    logger.error("Crawler failed with fatal error", {
      error: error instanceof Error ? error.message : String(error),
      lastCommittedBatch:
        error instanceof CrawlHaltedError ? error.lastCommittedBatch : undefined,
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exitCode = 1;
  }
}

main().catch((error) => {
  logger.error("Fatal error", { error: String(error) });
  process.exit(1);
});

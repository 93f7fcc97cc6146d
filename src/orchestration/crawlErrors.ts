/**
 * Orchestrator errors
 */

import { getErrorMessage } from "@/utils";

/**
 * The run stopped because continuing would desynchronise the store
 *
 * lastCommittedBatch tells the operator how far this run got; the next run
 * resumes from the store regardless.
 */
export class CrawlHaltedError extends Error {
  public readonly lastCommittedBatch: number;

  constructor(lastCommittedBatch: number, cause: unknown) {
    super(
      `Crawl halted after batch ${lastCommittedBatch}: ${getErrorMessage(cause)}`,
      { cause },
    );
    this.name = "CrawlHaltedError";
    this.lastCommittedBatch = lastCommittedBatch;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CrawlHaltedError);
    }
  }
}

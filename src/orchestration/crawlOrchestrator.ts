/**
 * Crawl orchestrator
 *
 * Drives batches from the code space to the store
 *
 * State machine: RUNNING -> (batch committed) -> PAUSED -> (polite delay)
 * -> RUNNING ... -> TERMINATED.
 *
 * Key responsibilities:
 * - Load the settled set once and skip settled codes
 * - Probe one batch at a time; batches never overlap
 * - Extract metadata for found pages and commit the batch as one unit
 * - Halt on a failed commit (never move past an uncommitted batch)
 * - Honour shutdown between batches; an interrupted batch commits the
 *   outcomes it already has
 */

import type {
  BatchResult,
  CrawlRecord,
  ProbeBatchOptions,
  ProbeOutcome,
  RunLockHeartbeat,
  RunState,
} from "@/types";
import type { MetadataExtractor, RecordStore } from "@/interfaces";
import { filterUnsettled, takeBatches } from "@/resume";
import { getErrorMessage, interruptibleSleep } from "@/utils";
import * as logger from "@/logger";
import { outcomeToRecord } from "./outcomeToRecord";
import { createRunState, applyBatchToState, withPhase } from "./runState";
import { CrawlHaltedError } from "./crawlErrors";

export type CrawlDependencies = {
  /** Full code sequence (restartable, deterministic) */
  codes: Iterable<string>;
  /** Opened record store (single writer) */
  store: RecordStore;
  executor: {
    probeBatch(codes: readonly string[], options?: ProbeBatchOptions): Promise<ProbeOutcome[]>;
  };
  extractor: MetadataExtractor;
  /** Refreshed after every committed batch; losing the lock halts the run */
  lock?: RunLockHeartbeat;
  /** Delay used for the polite pause (injectable for tests) */
  delay?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
};

export type CrawlOptions = {
  batchSize: number;
  interBatchDelaySeconds: number;
  /** Shutdown request */
  signal?: AbortSignal;
};

/**
 * Run the extractor without letting it crash the batch
 */
function extractRecord(extractor: MetadataExtractor, outcome: ProbeOutcome): CrawlRecord {
  if (outcome.status !== "found") {
    return outcomeToRecord(outcome);
  }

  try {
    return outcomeToRecord(outcome, extractor.extract(outcome.body));
  } catch (error) {
    return outcomeToRecord(outcome, {
      ok: false,
      error: `Extractor failed: ${getErrorMessage(error)}`,
    });
  }
}

function logSummary(state: RunState): void {
  logger.info(state.interrupted ? "Crawl interrupted" : "Crawl finished", {
    batchesCommitted: state.batchesCommitted,
    lastCommittedBatch: state.lastCommittedBatch,
    probed: state.probed,
    found: state.found,
    notFound: state.notFound,
    errors: state.errors,
    extractionErrors: state.extractionErrors,
  });
}

/**
 * Crawl every unsettled code in the space
 *
 * @returns Final run state (phase TERMINATED)
 * @throws {CrawlHaltedError} If a batch could not be committed or the run lock was lost
 */
export async function runCrawl(
  deps: CrawlDependencies,
  options: CrawlOptions,
): Promise<RunState> {
  const { store, executor, extractor, lock } = deps;
  const { batchSize, interBatchDelaySeconds, signal } = options;
  const delay = deps.delay ?? interruptibleSleep;

  const settled = await store.loadSettled();
  logger.info("Loaded settled codes", {
    store: store.location,
    settled: settled.size,
  });

  let state = createRunState();
  const batches = takeBatches(filterUnsettled(deps.codes, settled), batchSize);

  try {
    for (;;) {
      if (signal?.aborted) {
        state = { ...state, interrupted: true };
        break;
      }

      const next = batches.next();
      if (next.done) {
        break;
      }
      const codes = next.value;

      if (state.phase === "PAUSED") {
        const completed = await delay(interBatchDelaySeconds * 1000, signal);
        if (!completed) {
          state = { ...state, interrupted: true };
          break;
        }
        state = withPhase(state, "RUNNING");
      }

      const index = state.lastCommittedBatch + 1;
      logger.debug("Probing batch", { batch: index, size: codes.length });

      const outcomes = await executor.probeBatch(codes, { signal });
      const batch: BatchResult = {
        index,
        records: outcomes.map((outcome) => extractRecord(extractor, outcome)),
      };

      try {
        await store.commit(batch);
      } catch (error) {
        logger.error("Batch commit failed, halting", {
          batch: index,
          lastCommittedBatch: state.lastCommittedBatch,
          error: getErrorMessage(error),
        });
        throw new CrawlHaltedError(state.lastCommittedBatch, error);
      }

      state = applyBatchToState(state, batch);

      logger.info("Batch committed", {
        batch: index,
        size: batch.records.length,
        found: state.found,
        notFound: state.notFound,
        errors: state.errors + state.extractionErrors,
        probed: state.probed,
      });

      if (lock && !lock.refresh()) {
        logger.error("Run lock lost, halting", {
          lastCommittedBatch: state.lastCommittedBatch,
        });
        throw new CrawlHaltedError(
          state.lastCommittedBatch,
          new Error("run lock is no longer held by this process"),
        );
      }

      if (batch.records.length < codes.length || signal?.aborted) {
        logger.warn("Shutdown requested, committed partial batch", {
          batch: index,
          committed: batch.records.length,
          skipped: codes.length - batch.records.length,
        });
        state = { ...state, interrupted: true };
        break;
      }

      state = withPhase(state, "PAUSED");
    }
  } finally {
    batches.return(undefined);
  }

  state = withPhase(state, "TERMINATED");
  logSummary(state);
  return state;
}

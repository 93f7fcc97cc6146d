/**
 * Run state transitions
 *
 * RunState is a plain value: every transition returns a new state.
 */

import type { BatchResult, RunPhase, RunState } from "@/types";
import { classifyRecordStatus } from "./outcomeToRecord";

export function createRunState(): RunState {
  return {
    phase: "RUNNING",
    batchesCommitted: 0,
    lastCommittedBatch: 0,
    probed: 0,
    found: 0,
    notFound: 0,
    errors: 0,
    extractionErrors: 0,
    interrupted: false,
  };
}

export function withPhase(state: RunState, phase: RunPhase): RunState {
  return { ...state, phase };
}

/**
 * Fold a committed batch into the run counters
 */
export function applyBatchToState(state: RunState, batch: BatchResult): RunState {
  const next: RunState = {
    ...state,
    batchesCommitted: state.batchesCommitted + 1,
    lastCommittedBatch: batch.index,
    probed: state.probed + batch.records.length,
  };

  for (const record of batch.records) {
    switch (classifyRecordStatus(record.status)) {
      case "found":
        next.found++;
        break;
      case "not_found":
        next.notFound++;
        break;
      case "extraction_error":
        next.extractionErrors++;
        break;
      case "error":
        next.errors++;
        break;
    }
  }

  return next;
}

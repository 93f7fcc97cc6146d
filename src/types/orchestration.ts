/**
 * Orchestration type definitions
 */

export type RunPhase = "RUNNING" | "PAUSED" | "TERMINATED";

/**
 * Progress of one crawl run
 *
 * Ephemeral: never persisted, rebuilt from the store on every start.
 */
export type RunState = {
  phase: RunPhase;
  batchesCommitted: number;
  /** Index of the last batch committed in this run (0 = none) */
  lastCommittedBatch: number;
  probed: number;
  found: number;
  notFound: number;
  errors: number;
  extractionErrors: number;
  /** True when the run stopped on a shutdown signal */
  interrupted: boolean;
};

/**
 * Hook used to keep the run lock fresh while batches are committed
 */
export type RunLockHeartbeat = {
  refresh(): boolean;
};

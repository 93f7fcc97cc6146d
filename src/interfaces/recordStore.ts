/**
 * RecordStore interface
 *
 * Durable, append-only store of crawl records. The orchestrator is the only
 * writer; a committed batch is either fully visible or not at all.
 */

import type { BatchResult, CrawlRecord, StoreOpenResult } from "@/types";

export interface RecordStore {
  /** Human-readable location, for logs */
  readonly location: string;

  /**
   * Create the store if missing, validate its schema, and recover from an
   * interrupted write. Must be called before any other method.
   */
  open(): Promise<StoreOpenResult>;

  /**
   * Codes with a committed record (single pass over the store)
   */
  loadSettled(): Promise<Set<string>>;

  /**
   * Stream every committed record in commit order
   */
  iterateRecords(): AsyncIterable<CrawlRecord>;

  /**
   * Durably append one batch as a single unit
   *
   * @throws {StoreWriteError} If the batch could not be written; nothing
   *   from the batch is considered committed
   */
  commit(batch: BatchResult): Promise<void>;

  close(): Promise<void>;
}

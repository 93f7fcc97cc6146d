/**
 * Record type definitions
 *
 * A Record is the durable unit of output: one per settled identifier.
 */

import type { RECORD_COLUMNS } from "@/constants";

/**
 * Column names of the record table, in stored order
 */
export type RecordColumn = (typeof RECORD_COLUMNS)[number];

export type CrawlRecord = {
  url: string;
  code: string;
  title: string;
  /** Display duration, empty unless found */
  duration: string;
  /** Canonical duration; null unless found */
  durationSeconds: number | null;
  listens: number | null;
  downloads: number | null;
  /** HTTP status for found/not-found, "ERROR" or "EXTRACTION_ERROR" otherwise */
  status: string;
  /** Empty on success and on not-found */
  error: string;
};

/**
 * Records produced by one orchestration cycle (unit of commit)
 */
export type BatchResult = {
  /** 1-based batch index within the current run */
  index: number;
  records: CrawlRecord[];
};

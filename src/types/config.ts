/**
 * Crawler configuration type definitions
 */

import type { RetryPolicyConfig } from "./probe";
import type { StoreConfig } from "./store";

export type CrawlerConfig = {
  /** Base URL; each probe requests `${baseUrl}/${code}` */
  baseUrl: string;
  /** Identifying User-Agent header sent with every probe */
  userAgent: string;
  /** Worker pool size inside a batch */
  threadCount: number;
  /** Identifiers per batch (unit of commit) */
  batchSize: number;
  /** Polite delay between batches */
  interBatchDelaySeconds: number;
  /** Include the 3-character code class before the 4-character one */
  includeShortCodes: boolean;
  /** Inclusive bounds of the 4-character class */
  longCodeStart: string;
  longCodeEnd: string;
  /** Per-request timeout */
  requestTimeoutMs: number;
  retry: RetryPolicyConfig;
  /** Suffix stripped from page titles */
  titleSuffix: string;
  store: StoreConfig;
};

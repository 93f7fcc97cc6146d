/**
 * Probe outcome -> durable record mapping
 */

import type { CrawlRecord, ExtractionResult, ProbeOutcome } from "@/types";
import {
  ERROR_TEXT_MAX_LENGTH,
  RECORD_STATUS_ERROR,
  RECORD_STATUS_EXTRACTION_ERROR,
} from "@/constants";
import { collapseWhitespace, getErrorMessage } from "@/utils";

function emptyRecord(outcome: ProbeOutcome, status: string, error: string): CrawlRecord {
  return {
    url: outcome.url,
    code: outcome.code,
    title: "",
    duration: "",
    durationSeconds: null,
    listens: null,
    downloads: null,
    status,
    error,
  };
}

function truncateError(text: string): string {
  return getErrorMessage(text, ERROR_TEXT_MAX_LENGTH) || "Unknown error";
}

/**
 * Build the record for one terminal outcome
 *
 * @param outcome - Terminal probe outcome
 * @param extraction - Extractor result, required for found outcomes
 */
export function outcomeToRecord(
  outcome: ProbeOutcome,
  extraction?: ExtractionResult,
): CrawlRecord {
  switch (outcome.status) {
    case "found": {
      if (!extraction || !extraction.ok) {
        return emptyRecord(
          outcome,
          RECORD_STATUS_EXTRACTION_ERROR,
          truncateError(extraction ? extraction.error : "Page was not extracted"),
        );
      }
      const { metadata } = extraction;
      return {
        url: outcome.url,
        code: outcome.code,
        title: collapseWhitespace(metadata.title),
        duration: metadata.durationDisplay,
        durationSeconds: metadata.durationSeconds,
        listens: metadata.listens,
        downloads: metadata.downloads,
        status: String(outcome.httpStatus),
        error: "",
      };
    }
    case "not_found":
      return emptyRecord(outcome, String(outcome.httpStatus), "");
    case "fatal_error":
      return emptyRecord(outcome, RECORD_STATUS_ERROR, truncateError(outcome.error));
  }
}

/**
 * Kind of outcome a stored status stands for
 */
export function classifyRecordStatus(
  status: string,
): "found" | "not_found" | "error" | "extraction_error" {
  if (status === RECORD_STATUS_EXTRACTION_ERROR) {
    return "extraction_error";
  }
  if (/^2\d\d$/.test(status)) {
    return "found";
  }
  if (/^\d{3}$/.test(status)) {
    return "not_found";
  }
  return "error";
}

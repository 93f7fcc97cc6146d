/**
 * Record <-> stored row mapping
 *
 * Rows are keyed by RECORD_COLUMNS; empty strings stand for absent values.
 */

import type { CrawlRecord, RecordColumn } from "@/types";
import { RECORD_COLUMNS } from "@/constants";

export type RecordRow = Record<RecordColumn, string>;

function formatCount(value: number | null): string {
  return value === null ? "" : String(value);
}

function parseCount(value: string): number | null {
  if (value.trim() === "") {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Convert a record into a row keyed by column name
 */
export function recordToRow(record: CrawlRecord): RecordRow {
  return {
    url: record.url,
    code: record.code,
    title: record.title,
    duration: record.duration,
    duration_seconds: formatCount(record.durationSeconds),
    listens: formatCount(record.listens),
    downloads: formatCount(record.downloads),
    status: record.status,
    error: record.error,
  };
}

/**
 * Convert a record into its values in stored column order
 */
export function recordToValues(record: CrawlRecord): string[] {
  const row = recordToRow(record);
  return RECORD_COLUMNS.map((column) => row[column]);
}

/**
 * Convert a parsed row (unknown shape) back into a record
 *
 * Missing or non-string fields read as empty.
 */
export function rowToRecord(row: unknown): CrawlRecord {
  const source: Record<string, unknown> =
    typeof row === "object" && row !== null ? { ...row } : {};
  const field = (column: RecordColumn): string => {
    const value = source[column];
    if (typeof value === "string") {
      return value;
    }
    if (typeof value === "number") {
      return String(value);
    }
    return "";
  };

  return {
    url: field("url"),
    code: field("code"),
    title: field("title"),
    duration: field("duration"),
    durationSeconds: parseCount(field("duration_seconds")),
    listens: parseCount(field("listens")),
    downloads: parseCount(field("downloads")),
    status: field("status"),
    error: field("error"),
  };
}

/**
 * Records repository
 *
 * Data access layer for the records table. Rows are only ever inserted;
 * code is the primary key, so a second insert for a code fails.
 */

import type { CrawlRecord } from "@/types";
import { getDb } from "../connection";

type RecordDbRow = {
  code: string;
  url: string;
  title: string;
  duration: string;
  duration_seconds: number | null;
  listens: number | null;
  downloads: number | null;
  status: string;
  error: string;
};

function readNullableNumber(value: unknown): number | null {
  return typeof value === "number" ? value : null;
}

function readString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function toRecordDbRow(row: unknown): RecordDbRow {
  const source: Record<string, unknown> =
    typeof row === "object" && row !== null ? { ...row } : {};
  return {
    code: readString(source.code),
    url: readString(source.url),
    title: readString(source.title),
    duration: readString(source.duration),
    duration_seconds: readNullableNumber(source.duration_seconds),
    listens: readNullableNumber(source.listens),
    downloads: readNullableNumber(source.downloads),
    status: readString(source.status),
    error: readString(source.error),
  };
}

function toCrawlRecord(row: RecordDbRow): CrawlRecord {
  return {
    url: row.url,
    code: row.code,
    title: row.title,
    duration: row.duration,
    durationSeconds: row.duration_seconds,
    listens: row.listens,
    downloads: row.downloads,
    status: row.status,
    error: row.error,
  };
}

/**
 * Insert all records of one batch in a single transaction
 *
 * All-or-nothing: any failing row rolls back the whole batch.
 *
 * @returns Number of rows inserted
 */
export function insertRecordBatch(batchIndex: number, records: CrawlRecord[]): number {
  const db = getDb();

  const insert = db.prepare(`
    INSERT INTO records (
      code, url, title, duration, duration_seconds,
      listens, downloads, status, error, batch_index
    )
    VALUES (
      @code, @url, @title, @duration, @duration_seconds,
      @listens, @downloads, @status, @error, @batch_index
    )
  `);

  const insertAll = db.transaction((rows: CrawlRecord[]) => {
    for (const record of rows) {
      insert.run({
        code: record.code,
        url: record.url,
        title: record.title,
        duration: record.duration,
        duration_seconds: record.durationSeconds,
        listens: record.listens,
        downloads: record.downloads,
        status: record.status,
        error: record.error,
        batch_index: batchIndex,
      });
    }
    return rows.length;
  });

  return insertAll(records);
}

/**
 * Iterate all records in insertion order
 */
export function* iterateRecords(): Generator<CrawlRecord> {
  const db = getDb();
  const statement = db.prepare(`
    SELECT code, url, title, duration, duration_seconds,
           listens, downloads, status, error
    FROM records
    ORDER BY rowid
  `);

  for (const row of statement.iterate()) {
    yield toCrawlRecord(toRecordDbRow(row));
  }
}

/**
 * Iterate settled codes only (cheaper than full records)
 */
export function* iterateSettledCodes(): Generator<string> {
  const db = getDb();
  const statement = db.prepare("SELECT code FROM records").pluck();

  for (const code of statement.iterate()) {
    if (typeof code === "string") {
      yield code;
    }
  }
}

/**
 * Count records (all statuses)
 */
export function countRecords(): number {
  const db = getDb();
  const value: unknown = db.prepare("SELECT COUNT(*) FROM records").pluck().get();
  return typeof value === "number" ? value : 0;
}

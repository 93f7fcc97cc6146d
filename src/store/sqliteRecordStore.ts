/**
 * SQLite record store
 *
 * Same contract as the CSV store, backed by the records table. Each batch is
 * one transaction, so a failed commit leaves no row of that batch behind.
 */

import { existsSync } from "fs";
import type { BatchResult, CrawlRecord, StoreOpenResult } from "@/types";
import type { RecordStore } from "@/interfaces";
import {
  openDb,
  closeDb,
  runMigrations,
  insertRecordBatch,
  iterateRecords,
  iterateSettledCodes,
} from "@/db";
import { getErrorMessage } from "@/utils";
import { StoreWriteError } from "./storeErrors";

/**
 * Check if better-sqlite3 rejected a row because its code already exists
 */
export function isDuplicateCodeError(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return false;
  }
  return (
    error.code === "SQLITE_CONSTRAINT_PRIMARYKEY" ||
    error.code === "SQLITE_CONSTRAINT_UNIQUE"
  );
}

export class SqliteRecordStore implements RecordStore {
  readonly location: string;

  constructor(private readonly path: string) {
    this.location = path;
  }

  async open(): Promise<StoreOpenResult> {
    const existed = this.path !== ":memory:" && existsSync(this.path);
    openDb(this.path);
    runMigrations();
    return { created: !existed, repairedBytes: 0 };
  }

  async *iterateRecords(): AsyncGenerator<CrawlRecord> {
    yield* iterateRecords();
  }

  async loadSettled(): Promise<Set<string>> {
    return new Set(iterateSettledCodes());
  }

  async commit(batch: BatchResult): Promise<void> {
    if (batch.records.length === 0) {
      return;
    }

    try {
      insertRecordBatch(batch.index, batch.records);
    } catch (error) {
      const reason = isDuplicateCodeError(error)
        ? "a code in the batch already has a record"
        : getErrorMessage(error);
      throw new StoreWriteError(
        `Failed to commit batch ${batch.index} to ${this.path}: ${reason}`,
        batch.index,
        { cause: error },
      );
    }
  }

  async close(): Promise<void> {
    closeDb();
  }
}

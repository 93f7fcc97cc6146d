/**
 * CSV record store
 *
 * Line-oriented table with a fixed header; one record per line.
 *
 * Commit protocol: the whole batch is serialised in memory, appended with a
 * single write, then fsync'ed. A failed write or sync truncates the file back
 * to its size before the batch. A crash can only leave a torn final line,
 * which open() truncates before anything reads the file.
 */

import { createReadStream, existsSync } from "fs";
import { mkdir, open, stat, writeFile, type FileHandle } from "fs/promises";
import { dirname } from "path";
import { parse } from "csv-parse";
import { stringify } from "csv-stringify/sync";
import type { BatchResult, CrawlRecord, StoreOpenResult } from "@/types";
import type { RecordStore } from "@/interfaces";
import { RECORD_COLUMNS, TORN_TAIL_SCAN_BYTES } from "@/constants";
import { getErrorMessage } from "@/utils";
import * as logger from "@/logger";
import { recordToValues, rowToRecord } from "./recordRow";
import { StoreSchemaError, StoreWriteError } from "./storeErrors";

const HEADER_LINE = stringify([[...RECORD_COLUMNS]]);

/**
 * Read the first line of a file (without the line break)
 */
async function readFirstLine(path: string): Promise<string> {
  const handle = await open(path, "r");
  try {
    const buffer = Buffer.alloc(4096);
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
    const text = buffer.subarray(0, bytesRead).toString("utf-8");
    const newline = text.indexOf("\n");
    return (newline >= 0 ? text.slice(0, newline) : text).replace(/\r$/, "");
  } finally {
    await handle.close();
  }
}

/**
 * Cut the file back to the size it had before a failed commit
 *
 * @returns false when the file could not be restored
 */
async function rollbackAppend(handle: FileHandle, size: number, path: string): Promise<boolean> {
  try {
    await handle.truncate(size);
    await handle.sync();
    return true;
  } catch (error) {
    logger.error("Failed to roll back partial batch", {
      path,
      size,
      error: getErrorMessage(error),
    });
    return false;
  }
}

/**
 * Truncate a trailing partial line left by an interrupted append
 *
 * @returns Number of bytes removed
 */
async function repairTornTail(path: string): Promise<number> {
  const handle = await open(path, "r+");
  try {
    const { size } = await handle.stat();
    if (size === 0) {
      return 0;
    }

    const scanLength = Math.min(size, TORN_TAIL_SCAN_BYTES);
    const buffer = Buffer.alloc(scanLength);
    await handle.read(buffer, 0, scanLength, size - scanLength);

    if (buffer[scanLength - 1] === 0x0a) {
      return 0;
    }

    const lastNewline = buffer.lastIndexOf(0x0a);
    if (lastNewline < 0) {
      throw new StoreSchemaError(
        `Cannot repair torn tail: no line break in the last ${scanLength} bytes`,
        path,
      );
    }

    const keep = size - scanLength + lastNewline + 1;
    await handle.truncate(keep);
    await handle.sync();
    return size - keep;
  } finally {
    await handle.close();
  }
}

export class CsvRecordStore implements RecordStore {
  readonly location: string;

  constructor(private readonly path: string) {
    this.location = path;
  }

  async open(): Promise<StoreOpenResult> {
    await mkdir(dirname(this.path), { recursive: true });

    const exists = existsSync(this.path);
    if (!exists || (await stat(this.path)).size === 0) {
      const handle = await open(this.path, "w");
      try {
        await handle.writeFile(HEADER_LINE, "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      logger.info("Created record store", { path: this.path });
      return { created: true, repairedBytes: 0 };
    }

    const header = await readFirstLine(this.path);
    if (header !== HEADER_LINE.trimEnd()) {
      throw new StoreSchemaError(
        `Unexpected header "${header}" (expected "${HEADER_LINE.trimEnd()}")`,
        this.path,
      );
    }

    const repairedBytes = await repairTornTail(this.path);
    if (repairedBytes > 0) {
      logger.warn("Dropped torn trailing line from record store", {
        path: this.path,
        repairedBytes,
      });
    }

    return { created: false, repairedBytes };
  }

  async *iterateRecords(): AsyncGenerator<CrawlRecord> {
    if (!existsSync(this.path)) {
      return;
    }

    const parser = createReadStream(this.path).pipe(
      parse({ columns: true, skip_empty_lines: true }),
    );

    try {
      for await (const row of parser) {
        yield rowToRecord(row);
      }
    } catch (error) {
      throw new StoreSchemaError(
        `Failed to read record store: ${getErrorMessage(error)}`,
        this.path,
      );
    }
  }

  async loadSettled(): Promise<Set<string>> {
    const settled = new Set<string>();
    for await (const record of this.iterateRecords()) {
      if (record.code) {
        settled.add(record.code);
      }
    }
    return settled;
  }

  async commit(batch: BatchResult): Promise<void> {
    if (batch.records.length === 0) {
      return;
    }

    const payload = stringify(batch.records.map(recordToValues));
    const fail = (error: unknown, suffix = ""): StoreWriteError =>
      new StoreWriteError(
        `Failed to commit batch ${batch.index} to ${this.path}: ${getErrorMessage(error)}${suffix}`,
        batch.index,
        { cause: error },
      );

    let handle: FileHandle;
    try {
      handle = await open(this.path, "a");
    } catch (error) {
      throw fail(error);
    }

    let sizeBefore: number | null = null;
    try {
      sizeBefore = (await handle.stat()).size;
      await handle.appendFile(payload, "utf-8");
      await handle.sync();
    } catch (error) {
      // Nothing was written when stat itself failed
      const restored =
        sizeBefore === null || (await rollbackAppend(handle, sizeBefore, this.path));
      throw fail(error, restored ? "" : " (rollback failed)");
    } finally {
      await handle.close();
    }
  }

  async close(): Promise<void> {
    // Every commit closes its own handle
  }
}

/**
 * Write a CSV store file directly (header plus records)
 *
 * Used to seed stores in tests.
 */
export async function writeCsvStore(path: string, records: CrawlRecord[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, HEADER_LINE + stringify(records.map(recordToValues)), "utf-8");
}

/**
 * Record store factory
 */

import type { StoreConfig } from "@/types";
import type { RecordStore } from "@/interfaces";
import { CsvRecordStore } from "./csvRecordStore";
import { SqliteRecordStore } from "./sqliteRecordStore";

export function createRecordStore(config: StoreConfig): RecordStore {
  switch (config.backend) {
    case "csv":
      return new CsvRecordStore(config.path);
    case "sqlite":
      return new SqliteRecordStore(config.path);
  }
}

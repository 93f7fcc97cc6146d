export { CsvRecordStore, writeCsvStore } from "./csvRecordStore";
export { SqliteRecordStore, isDuplicateCodeError } from "./sqliteRecordStore";
export { createRecordStore } from "./createRecordStore";
export { StoreWriteError, StoreSchemaError } from "./storeErrors";
export { recordToRow, recordToValues, rowToRecord } from "./recordRow";
export type { RecordRow } from "./recordRow";
export {
  lockPathFor,
  acquireRunLock,
  refreshRunLock,
  releaseRunLock,
  getRunLock,
} from "./runLock";

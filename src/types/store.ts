/**
 * Record store type definitions
 */

export type StoreBackend = "csv" | "sqlite";

export type StoreConfig = {
  backend: StoreBackend;
  /** File path of the CSV file or SQLite database */
  path: string;
};

/**
 * Result of opening a store
 */
export type StoreOpenResult = {
  /** True when the store did not exist and was created */
  created: boolean;
  /** Bytes dropped from a torn trailing line (CSV only) */
  repairedBytes: number;
};

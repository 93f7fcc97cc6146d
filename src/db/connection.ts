/**
 * SQLite database connection
 *
 * Manages database connection lifecycle and configuration.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";
import { DEFAULT_SQLITE_STORE_PATH } from "@/constants";

let db: Database.Database | null = null;

/**
 * Resolve database file path: explicit path, then the default store location
 */
function getDbPath(explicitPath?: string): string {
  const dbPath = explicitPath || join(process.cwd(), DEFAULT_SQLITE_STORE_PATH);

  // Ensure parent directory exists (skip for :memory:)
  if (dbPath !== ":memory:") {
    const dir = dirname(dbPath);
    mkdirSync(dir, { recursive: true });
  }

  return dbPath;
}

/**
 * Open database connection with required pragmas
 * Returns existing connection if already open
 */
export function openDb(dbPath?: string): Database.Database {
  if (db) {
    return db;
  }

  db = new Database(getDbPath(dbPath));

  // WAL mode: readers never see a half-committed transaction
  db.pragma("journal_mode = WAL");

  // Commits are durable before the next batch starts
  db.pragma("synchronous = FULL");

  return db;
}

/**
 * Close database connection
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Get current database connection (must be opened first)
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return db;
}

/**
 * Set database connection for testing purposes only.
 * This allows injecting a test database into the singleton.
 *
 * @internal Test use only - do not use in production code
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}

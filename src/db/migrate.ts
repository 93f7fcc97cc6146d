/**
 * Database migration runner
 *
 * Applies SQL migrations from migrations/ directory in order.
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import { getDb } from "./connection";
import * as logger from "@/logger";

function getMigrationsDir(): string {
  return join(process.cwd(), "migrations");
}

/**
 * Ensure schema_migrations table exists
 */
function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

/**
 * Get list of applied migrations
 */
function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db.prepare("SELECT version FROM schema_migrations").all();
  const versions = new Set<string>();
  for (const row of rows) {
    if (typeof row === "object" && row !== null && "version" in row && typeof row.version === "string") {
      versions.add(row.version);
    }
  }
  return versions;
}

/**
 * List migration files from migrations/ directory, sorted by name
 */
export function listMigrationFiles(): string[] {
  let files: string[];
  try {
    files = readdirSync(getMigrationsDir());
  } catch {
    // No migrations directory
    return [];
  }

  return files.filter((f) => f.endsWith(".sql")).sort();
}

/**
 * Apply a single migration file atomically
 */
function applyMigration(db: Database.Database, filename: string): void {
  const sql = readFileSync(join(getMigrationsDir(), filename), "utf-8");

  // Wrap migration + recording in a transaction
  const transaction = db.transaction(() => {
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(
      filename,
    );
  });

  transaction();
}

/**
 * Run all pending migrations on the given (or currently open) database
 *
 * @returns Names of the migrations applied
 */
export function runMigrations(db: Database.Database = getDb()): string[] {
  ensureMigrationsTable(db);

  const appliedMigrations = getAppliedMigrations(db);
  const pendingMigrations = listMigrationFiles().filter(
    (f) => !appliedMigrations.has(f),
  );

  if (pendingMigrations.length === 0) {
    logger.debug("No pending migrations");
    return [];
  }

  logger.info("Applying migrations", { count: pendingMigrations.length });

  for (const migration of pendingMigrations) {
    logger.debug("Applying migration", { migration });
    applyMigration(db, migration);
  }

  return pendingMigrations;
}

/**
 * Run lock type definitions
 *
 * Types for the store run lock (keeps the record store single-writer).
 */

/**
 * Lock file contents
 */
export type RunLockFile = {
  /** Owner process identifier (UUID) */
  owner_id: string;

  /** Owner process id, for operators */
  pid: number;

  /** When the lock was acquired (ISO 8601 string) */
  acquired_at: string;

  /** When the lock expires (ISO 8601 string) */
  expires_at: string;
};

/**
 * Lock acquisition result
 */
export type RunLockAcquireResult =
  | { ok: true }
  | { ok: false; reason: "LOCKED" | "UNKNOWN"; holder?: RunLockFile };

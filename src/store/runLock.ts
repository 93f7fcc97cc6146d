/**
 * Store run lock
 *
 * Lock file next to the record store so only one process writes it.
 * Lock ownership is by owner id (UUID) with a TTL to prevent permanent
 * deadlocks after a crash: an expired lock can be taken over.
 */

import {
  openSync,
  writeSync,
  closeSync,
  readFileSync,
  writeFileSync,
  renameSync,
  rmSync,
} from "fs";
import type { RunLockAcquireResult, RunLockFile } from "@/types";
import { RUN_LOCK_FILE_SUFFIX, RUN_LOCK_TTL_SECONDS } from "@/constants";

/**
 * Lock file path for a store path
 */
export function lockPathFor(storePath: string): string {
  return storePath + RUN_LOCK_FILE_SUFFIX;
}

function isRunLockFile(value: unknown): value is RunLockFile {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "owner_id" in value &&
    typeof value.owner_id === "string" &&
    "pid" in value &&
    typeof value.pid === "number" &&
    "acquired_at" in value &&
    typeof value.acquired_at === "string" &&
    "expires_at" in value &&
    typeof value.expires_at === "string"
  );
}

function buildLock(ownerId: string, ttlSeconds: number, now: Date, acquiredAt?: string): RunLockFile {
  return {
    owner_id: ownerId,
    pid: process.pid,
    acquired_at: acquiredAt ?? now.toISOString(),
    expires_at: new Date(now.getTime() + ttlSeconds * 1000).toISOString(),
  };
}

/**
 * Replace the lock file contents atomically (write temp file, then rename)
 */
function replaceLock(lockPath: string, lock: RunLockFile): void {
  const tempPath = `${lockPath}.${lock.owner_id}.tmp`;
  writeFileSync(tempPath, JSON.stringify(lock));
  renameSync(tempPath, lockPath);
}

function isErrnoCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

/**
 * Get current lock state
 *
 * @returns Lock contents if the file exists and is readable, null otherwise
 */
export function getRunLock(lockPath: string): RunLockFile | null {
  try {
    const parsed: unknown = JSON.parse(readFileSync(lockPath, "utf-8"));
    return isRunLockFile(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Acquire the run lock
 *
 * Creates the lock file exclusively. If it exists and is not expired,
 * returns LOCKED. If it is expired or unreadable, takes it over.
 *
 * @param lockPath - Lock file path (see lockPathFor)
 * @param ownerId - Unique process identifier (UUID)
 */
export function acquireRunLock(
  lockPath: string,
  ownerId: string,
  ttlSeconds: number = RUN_LOCK_TTL_SECONDS,
  now: Date = new Date(),
): RunLockAcquireResult {
  const lock = buildLock(ownerId, ttlSeconds, now);

  try {
    const fd = openSync(lockPath, "wx");
    try {
      writeSync(fd, JSON.stringify(lock));
    } finally {
      closeSync(fd);
    }
    return { ok: true };
  } catch (error) {
    if (!isErrnoCode(error, "EEXIST")) {
      return { ok: false, reason: "UNKNOWN" };
    }
  }

  const holder = getRunLock(lockPath);
  if (holder && new Date(holder.expires_at).getTime() > now.getTime()) {
    return { ok: false, reason: "LOCKED", holder };
  }

  // Expired (or unreadable) lock: take it over, then confirm ownership
  try {
    replaceLock(lockPath, lock);
  } catch {
    return { ok: false, reason: "UNKNOWN" };
  }

  const current = getRunLock(lockPath);
  if (current?.owner_id === ownerId) {
    return { ok: true };
  }
  return current
    ? { ok: false, reason: "LOCKED", holder: current }
    : { ok: false, reason: "UNKNOWN" };
}

/**
 * Refresh run lock expiry
 *
 * @returns true if lock was refreshed, false if not owned by this process
 */
export function refreshRunLock(
  lockPath: string,
  ownerId: string,
  ttlSeconds: number = RUN_LOCK_TTL_SECONDS,
  now: Date = new Date(),
): boolean {
  const current = getRunLock(lockPath);
  if (current?.owner_id !== ownerId) {
    return false;
  }

  try {
    replaceLock(lockPath, buildLock(ownerId, ttlSeconds, now, current.acquired_at));
    return true;
  } catch {
    return false;
  }
}

/**
 * Release run lock
 *
 * @returns true if lock was released, false if not owned by this process
 */
export function releaseRunLock(lockPath: string, ownerId: string): boolean {
  const current = getRunLock(lockPath);
  if (current?.owner_id !== ownerId) {
    return false;
  }

  try {
    rmSync(lockPath, { force: true });
    return true;
  } catch {
    return false;
  }
}

/**
 * Run lock repository
 *
 * Global run lock so that two runner processes sharing a database never
 * execute a cycle at the same time. DB-based locking with TTL prevents
 * permanent deadlocks after a crash.
 */

import type { RunLockRow, RunLockAcquireResult } from "@/types";
import { getDb } from "../connection";
import { RUN_LOCK_NAME, RUN_LOCK_TTL_SECONDS } from "@/constants";

/**
 * Acquire global run lock
 *
 * Attempts to acquire the lock atomically. If lock exists and is not expired,
 * returns LOCKED. If lock is expired, takes over the lock.
 *
 * Atomic across processes through INSERT ... ON CONFLICT.
 *
 * @param ownerId - Unique process identifier (UUID)
 * @throws When the database is not open or the statement fails
 */
export function acquireRunLock(
  ownerId: string,
  ttlSeconds: number = RUN_LOCK_TTL_SECONDS,
): RunLockAcquireResult {
  const db = getDb();

  // 1. Try to insert a new lock
  // 2. On conflict, take it over only if it has expired
  const result = db
    .prepare(
      `
      INSERT INTO run_lock (lock_name, owner_id, acquired_at, expires_at)
      VALUES (
        ?,
        ?,
        datetime('now'),
        datetime('now', '+' || ? || ' seconds')
      )
      ON CONFLICT(lock_name) DO UPDATE SET
        owner_id = excluded.owner_id,
        acquired_at = excluded.acquired_at,
        expires_at = excluded.expires_at,
        updated_at = datetime('now')
      WHERE datetime('now') >= expires_at
    `,
    )
    .run(RUN_LOCK_NAME, ownerId, ttlSeconds);

  // changes > 0: inserted or took over an expired lock
  if (result.changes > 0) {
    return { ok: true };
  }

  return { ok: false, reason: "LOCKED" };
}

/**
 * Release run lock
 *
 * Deletes the lock row if owned by this process.
 *
 * @returns true if lock was released, false if not owned by this process
 */
export function releaseRunLock(ownerId: string): boolean {
  const db = getDb();

  const result = db
    .prepare(
      `
      DELETE FROM run_lock
      WHERE lock_name = ?
        AND owner_id = ?
    `,
    )
    .run(RUN_LOCK_NAME, ownerId);

  return result.changes > 0;
}

/**
 * Get current run lock state
 */
export function getRunLock(): RunLockRow | null {
  const db = getDb();

  const row = db
    .prepare<[string], RunLockRow>("SELECT * FROM run_lock WHERE lock_name = ?")
    .get(RUN_LOCK_NAME);

  return row ?? null;
}

/**
 * Run lock type definitions
 *
 * Cross-process guard that keeps two runners from executing a cycle at
 * the same time against the same database.
 */

/**
 * Row in the run_lock table
 */
export type RunLockRow = {
  lock_name: string;
  /** Owner process identifier (UUID) */
  owner_id: string;
  acquired_at: string;
  expires_at: string;
  updated_at: string;
};

/**
 * Outcome of a lock attempt. Database errors are thrown, never reported
 * here.
 */
export type RunLockAcquireResult =
  | { ok: true }
  | { ok: false; reason: "LOCKED" };

/**
 * Run lock constants
 */

/**
 * Single lock for the whole system
 */
export const RUN_LOCK_NAME = "global";

/**
 * After this many seconds a stale lock can be taken over by another process.
 */
export const RUN_LOCK_TTL_SECONDS = 3600;

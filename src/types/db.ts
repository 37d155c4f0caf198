/**
 * Database type definitions
 *
 * Row shapes as returned by better-sqlite3, aligned with migrations/.
 */

/**
 * Row of the postings table
 */
export type PostingRow = {
  id: number;
  company: string;
  title: string;
  url: string;
  location: string;
  employment_type: string;
  description: string;
  first_seen_at: string;
  /** SQLite boolean (0 | 1) */
  notified: number;
};

/**
 * Final status of a runner cycle
 */
export type CycleRunStatus = "success" | "failure" | "skipped";

/**
 * Row of the cycle_runs table
 */
export type CycleRunRow = {
  id: number;
  started_at: string;
  finished_at: string | null;
  status: CycleRunStatus | null;
  collected: number | null;
  matched: number | null;
  new_postings: number | null;
  producer_errors: number | null;
  channel_errors: number | null;
  marked_notified: number | null;
  notes: string | null;
};

/**
 * Counters written when a cycle run is finished
 */
export type CycleRunUpdate = {
  finished_at: string;
  status: CycleRunStatus;
  collected?: number;
  matched?: number;
  new_postings?: number;
  producer_errors?: number;
  channel_errors?: number;
  marked_notified?: number;
  notes?: string | null;
};

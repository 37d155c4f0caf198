/**
 * PostingStore interface — persistent set of postings keyed by URL
 *
 * URL uniqueness is enforced by the store itself, atomically, so callers
 * never pre-check before inserting.
 */

import type { Posting, StoredPosting } from "@/types";

export interface PostingStore {
  exists(url: string): boolean;

  /**
   * Insert iff the URL is not yet stored.
   *
   * @returns true when this call inserted the row, false when the URL was
   * already present (including a lost insert race)
   */
  add(posting: Posting): boolean;

  /**
   * Set the notified flag. No-op for unknown or already-notified URLs.
   */
  markNotified(url: string): void;

  /**
   * Every stored posting still waiting for a successful delivery, oldest first
   */
  unnotified(): StoredPosting[];

  count(): number;
}

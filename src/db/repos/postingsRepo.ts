/**
 * Postings repository
 *
 * Data access layer for postings table.
 */

import type { Posting, PostingRow, StoredPosting } from "@/types";
import { getDb } from "../connection";
import { isUniqueConstraintError } from "@/utils/dbErrors";

/**
 * Map a postings row to the domain shape (frozen)
 */
export function rowToStoredPosting(row: PostingRow): StoredPosting {
  return Object.freeze({
    id: row.id,
    url: row.url,
    company: row.company,
    title: row.title,
    location: row.location,
    employmentType: row.employment_type,
    description: row.description,
    firstSeenAt: row.first_seen_at,
    notified: row.notified === 1,
  });
}

/**
 * Insert a posting unless its URL is already stored
 *
 * No pre-check: the UNIQUE(url) constraint decides, so two inserts of the
 * same URL can never both succeed.
 *
 * @returns true if inserted, false on a URL conflict
 */
export function insertPosting(
  posting: Posting,
  firstSeenAt: string = new Date().toISOString(),
): boolean {
  const db = getDb();

  try {
    db.prepare(
      `
      INSERT INTO postings (
        company, title, url, location, employment_type, description,
        first_seen_at, notified
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, 0)
    `,
    ).run(
      posting.company,
      posting.title,
      posting.url,
      posting.location,
      posting.employmentType,
      posting.description,
      posting.firstSeenAt ?? firstSeenAt,
    );
    return true;
  } catch (err) {
    if (isUniqueConstraintError(err)) {
      return false;
    }
    throw err;
  }
}

export function postingExists(url: string): boolean {
  const db = getDb();
  const row = db
    .prepare<[string], { found: number }>(
      "SELECT 1 AS found FROM postings WHERE url = ? LIMIT 1",
    )
    .get(url);
  return row !== undefined;
}

/**
 * Flip notified 0 -> 1
 *
 * @returns true if this call changed the row
 */
export function markPostingNotified(url: string): boolean {
  const db = getDb();
  const result = db
    .prepare("UPDATE postings SET notified = 1 WHERE url = ? AND notified = 0")
    .run(url);
  return result.changes > 0;
}

/**
 * Postings still waiting for delivery, in insertion order
 */
export function listUnnotifiedPostings(): StoredPosting[] {
  const db = getDb();
  return db
    .prepare<[], PostingRow>(
      "SELECT * FROM postings WHERE notified = 0 ORDER BY id ASC",
    )
    .all()
    .map(rowToStoredPosting);
}

export function countPostings(): number {
  const db = getDb();
  const row = db
    .prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM postings")
    .get();
  return row?.total ?? 0;
}

/**
 * Get posting by URL
 */
export function getPostingByUrl(url: string): StoredPosting | null {
  const db = getDb();
  const row = db
    .prepare<[string], PostingRow>("SELECT * FROM postings WHERE url = ?")
    .get(url);
  return row ? rowToStoredPosting(row) : null;
}

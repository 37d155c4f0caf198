/**
 * SQLite-backed PostingStore
 *
 * Thin adapter from the PostingStore contract to the postings repository.
 * Anything the repository raises, other than a URL conflict (already
 * handled inside insertPosting), means storage is unavailable and is
 * rethrown as PostingStoreError.
 */

import type { PostingStore } from "@/interfaces";
import type { Posting, StoredPosting } from "@/types";
import {
  countPostings,
  insertPosting,
  listUnnotifiedPostings,
  markPostingNotified,
  postingExists,
} from "./repos/postingsRepo";

/**
 * Storage failure; fatal to the running cycle.
 */
export class PostingStoreError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Posting store ${operation} failed: ${reason}`, { cause });
    this.name = "PostingStoreError";
    this.operation = operation;
  }
}

function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw new PostingStoreError(operation, err);
  }
}

export function createSqlitePostingStore(): PostingStore {
  return {
    exists: (url: string): boolean =>
      guard("exists", () => postingExists(url)),

    add: (posting: Posting): boolean =>
      guard("add", () => insertPosting(posting)),

    markNotified: (url: string): void => {
      guard("markNotified", () => markPostingNotified(url));
    },

    unnotified: (): StoredPosting[] =>
      guard("unnotified", () => listUnnotifiedPostings()),

    count: (): number => guard("count", () => countPostings()),
  };
}

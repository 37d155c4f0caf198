/**
 * Posting type definitions
 *
 * A posting is identified by its source URL alone. Everything else is a
 * value captured when the posting is first created; only the `notified`
 * flag changes afterwards, and only from false to true, inside the store.
 */

/**
 * Candidate posting as yielded by a producer.
 * Optional fields default to empty strings in `createPosting`.
 */
export type PostingInput = {
  url: string;
  company: string;
  title: string;
  location?: string | null;
  employmentType?: string | null;
  description?: string | null;
};

/**
 * Immutable in-memory posting.
 */
export type Posting = Readonly<{
  url: string;
  company: string;
  title: string;
  location: string;
  employmentType: string;
  description: string;
  /** ISO-8601, null until the store persists the posting */
  firstSeenAt: string | null;
  notified: boolean;
}>;

/**
 * Posting read back from the store.
 */
export type StoredPosting = Posting &
  Readonly<{
    id: number;
    firstSeenAt: string;
  }>;

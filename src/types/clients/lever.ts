/**
 * Lever postings API payloads
 *
 * https://github.com/lever/postings-api
 *
 * Internal to the Lever producer; mapped to PostingInput before leaving it.
 * Only the fields the producer reads are declared.
 */

export type LeverPosting = {
  id: string;
  /** Posting title */
  text: string;
  hostedUrl: string;
  categories?: {
    location?: string | null;
    commitment?: string | null;
    allLocations?: string[] | null;
  } | null;
  description?: string | null;
  descriptionPlain?: string | null;
  lists?: Array<{
    text: string;
    content: string;
  }> | null;
  additionalPlain?: string | null;
};

/**
 * Greenhouse Job Board API payloads
 *
 * https://developers.greenhouse.io/job-board.html
 *
 * Internal to the Greenhouse producer; mapped to PostingInput before leaving it.
 * Only the fields the producer reads are declared.
 */

export type GreenhouseJob = {
  id: number;
  title: string;
  absolute_url: string;
  location?: {
    name?: string | null;
  } | null;
  /** HTML-escaped job description, present with content=true */
  content?: string | null;
  metadata?: Array<{
    name: string;
    value: string | string[] | null;
  }> | null;
};

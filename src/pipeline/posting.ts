/**
 * Posting construction
 */

import type { Posting, PostingInput } from "@/types";
import { isRecord } from "@/utils";

function clean(value: string | null | undefined): string {
  return typeof value === "string" ? value.trim() : "";
}

/**
 * Build an immutable posting from producer output.
 *
 * Text fields are trimmed and optional ones default to "". The result is
 * frozen with `notified = false` and no `firstSeenAt`; only the store
 * assigns those.
 *
 * @returns null when the URL or the title is blank
 */
export function createPosting(input: PostingInput): Posting | null {
  const url = clean(input.url);
  const title = clean(input.title);

  if (url === "" || title === "") {
    return null;
  }

  return Object.freeze({
    url,
    company: clean(input.company),
    title,
    location: clean(input.location),
    employmentType: clean(input.employmentType),
    description: clean(input.description),
    firstSeenAt: null,
    notified: false,
  });
}

function text(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

/**
 * Read one item of producer output without trusting its shape.
 *
 * Non-string fields are treated as missing, so `createPosting` rejects an
 * item whose URL or title is not text.
 *
 * @returns null when the item is not an object
 */
export function readPostingInput(value: unknown): PostingInput | null {
  if (!isRecord(value)) {
    return null;
  }

  return {
    url: text(value.url) ?? "",
    company: text(value.company) ?? "",
    title: text(value.title) ?? "",
    location: text(value.location),
    employmentType: text(value.employmentType),
    description: text(value.description),
  };
}

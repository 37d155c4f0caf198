/**
 * Careers page producer constants
 */

/**
 * Hrefs that look like a single listing
 */
export const DEFAULT_CAREERS_LINK_PATTERN = "job|career|position";

export const CAREERS_PAGE_HTTP_TIMEOUT_MS = 30000;

export const CAREERS_PAGE_HTTP_MAX_ATTEMPTS = 3;

export const CAREERS_PAGE_HTTP_HEADERS = {
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
  "User-Agent":
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
} as const;

/**
 * Anchor texts shorter than this are navigation, not titles
 */
export const MIN_TITLE_LENGTH = 4;

export const MAX_POSTINGS_PER_PAGE = 200;

/**
 * Longer anchor texts are blurbs or whole cards, not titles
 */
export const MAX_TITLE_LENGTH = 200;

/**
 * HTTP client defaults
 */

import type { HttpMethod } from "@/types";

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

export const DEFAULT_JSON_HEADERS: Record<string, string> = {
  "Content-Type": "application/json",
  Accept: "application/json",
};

export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;

/**
 * Attempts including the initial request
 */
export const DEFAULT_MAX_ATTEMPTS = 3;

/**
 * First retry waits ~1s, second ~2s (before jitter)
 */
export const DEFAULT_BASE_DELAY_MS = 1_000;

export const DEFAULT_MAX_DELAY_MS = 30_000;

/**
 * Upper bound on a server-provided Retry-After
 */
export const DEFAULT_MAX_RETRY_AFTER_MS = 60_000;

/**
 * Only idempotent methods are retried
 */
export const RETRYABLE_HTTP_METHODS: readonly HttpMethod[] = ["GET", "HEAD"];

/**
 * 408 timeout, 429 rate limit, 5xx server errors
 */
export const RETRYABLE_STATUS_CODES: readonly number[] = [
  408, 429, 500, 502, 503, 504,
];

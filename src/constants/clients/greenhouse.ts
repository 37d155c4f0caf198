/**
 * Greenhouse producer constants
 */

export const GREENHOUSE_API_BASE_URL = "https://boards-api.greenhouse.io/v1";

export const GREENHOUSE_HTTP_TIMEOUT_MS = 15000;

export const GREENHOUSE_HTTP_MAX_ATTEMPTS = 2;

export const GREENHOUSE_HTTP_HEADERS = {
  Accept: "application/json",
  "User-Agent": "job-alerts/0.1",
} as const;

export const GREENHOUSE_LIMITS = {
  /** Applied after sorting by id so the selection is deterministic */
  MAX_JOBS_PER_BOARD: 500,
  MAX_DESCRIPTION_CHARS: 5000,
} as const;

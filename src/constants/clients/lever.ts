/**
 * Lever producer constants
 */

export const LEVER_API_BASE_URL = "https://api.lever.co/v0";

export const LEVER_HTTP_TIMEOUT_MS = 15000;

export const LEVER_HTTP_MAX_ATTEMPTS = 2;

export const LEVER_HTTP_HEADERS = {
  Accept: "application/json",
  "User-Agent": "job-alerts/0.1",
} as const;

export const LEVER_MAX_DESCRIPTION_CHARS = 5000;

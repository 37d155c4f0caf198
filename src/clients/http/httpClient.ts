/**
 * HTTP client wrapper — general-purpose client using native fetch
 * Supports timeouts, query params, retries with exponential backoff, and structured error handling
 */

import type { HttpMethod, HttpRequest, HttpRequestFn, Logger } from "@/types";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRY_AFTER_MS,
  RETRYABLE_HTTP_METHODS,
} from "@/constants/clients/http";
import { HttpError } from "./httpError";

/**
 * Build URL with query parameters (supports arrays for repeated params)
 */
function buildUrl(baseUrl: string, query?: HttpRequest["query"]): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  Object.entries(query).forEach(([key, value]) => {
    if (Array.isArray(value)) {
      // Append each array element as a repeated query param
      value.forEach((item) => url.searchParams.append(key, String(item)));
    } else {
      url.searchParams.append(key, String(value));
    }
  });

  return url.toString();
}

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(
  response: Response,
): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch {
    // The snippet is only decoration on the HttpError being thrown
    return undefined;
  }
}

/**
 * Check if an HTTP method is safe to retry (idempotent)
 */
function isMethodRetryable(method: HttpMethod): boolean {
  return RETRYABLE_HTTP_METHODS.includes(method);
}

/**
 * Check if an error is retryable
 * Returns true for network errors, timeouts, and retryable HTTP status codes
 */
function isErrorRetryable(error: unknown, method: HttpMethod): boolean {
  // Only retry idempotent methods
  if (!isMethodRetryable(method)) {
    return false;
  }

  if (error instanceof HttpError) {
    return error.isTransient;
  }

  // AbortError (timeout), TypeError (network)
  if (error instanceof Error) {
    return error.name === "AbortError" || error.name === "TypeError";
  }

  return false;
}

/**
 * Parse Retry-After header value
 * Supports both delay-seconds (number) and HTTP-date formats
 * Returns delay in milliseconds, or null if invalid/missing
 */
export function parseRetryAfter(
  retryAfterHeader: string | null,
  now: number = Date.now(),
): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  if (/^\d+$/.test(retryAfterHeader.trim())) {
    const seconds = parseInt(retryAfterHeader, 10);
    return seconds > 0 ? seconds * 1000 : null;
  }

  const date = new Date(retryAfterHeader);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - now;
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

/**
 * Exponential backoff with jitter:
 * min(maxDelay, baseDelay * 2^(attempt-1)) * (0.5 + random(0.5))
 */
function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

/**
 * Retry-After wins (clamped) over exponential backoff
 */
function computeRetryDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  maxRetryAfterMs: number,
  retryAfterHeader: string | null,
): number {
  const retryAfterMs = parseRetryAfter(retryAfterHeader);
  if (retryAfterMs !== null) {
    return Math.min(retryAfterMs, maxRetryAfterMs);
  }

  return computeBackoffDelay(attempt, baseDelayMs, maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isJsonContentType(contentType: string | null): boolean {
  return (
    contentType !== null &&
    (contentType.includes("application/json") || contentType.includes("+json"))
  );
}

/**
 * Perform a single HTTP request attempt (no retries)
 */
async function performRequest(
  req: HttpRequest,
  url: string,
  timeoutMs: number,
  logger?: Logger,
): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    // Defaults first, caller headers override
    const headers: Record<string, string> = {};
    if (req.json !== undefined) {
      Object.assign(headers, DEFAULT_JSON_HEADERS);
    }
    Object.assign(headers, req.headers);

    const options: RequestInit = {
      method: req.method,
      headers,
      signal: controller.signal,
    };

    if (req.json !== undefined) {
      options.body = JSON.stringify(req.json);
    }

    const response = await fetch(url, options);

    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet,
        headers: response.headers,
      });
    }

    if (response.status === 204) {
      return undefined;
    }

    if (req.responseType === "text") {
      return await response.text();
    }

    const contentType = response.headers.get("content-type");
    if (!isJsonContentType(contentType)) {
      logger?.warn("Non-JSON response received", {
        method: req.method,
        url,
        status: response.status,
        contentType: contentType || "none",
      });
      // Text fallback, the caller's payload validation decides
      return await response.text();
    }

    return await response.json();
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Perform an HTTP request with timeout, retries, and error handling
 *
 * Retries are only performed for idempotent methods (GET, HEAD) on:
 * - Network errors (no response received)
 * - Timeout errors
 * - HTTP 408 (Request Timeout)
 * - HTTP 429 (Too Many Requests) - respects Retry-After header
 * - HTTP 5xx (Server errors)
 *
 * @returns Decoded body: parsed JSON, or a string for text responses
 * @throws {HttpError} On non-2xx status codes (after all retries exhausted)
 * @throws {Error} On network errors, timeouts or invalid JSON
 */
export async function httpRequest(
  req: HttpRequest,
  logger?: Logger,
): Promise<unknown> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);

  const maxAttempts = req.retry?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const baseDelayMs = req.retry?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = req.retry?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const maxRetryAfterMs =
    req.retry?.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await performRequest(req, url, timeoutMs, logger);
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts) {
        break;
      }

      if (!isErrorRetryable(error, req.method)) {
        throw error;
      }

      const retryAfterHeader =
        error instanceof HttpError ? error.retryAfter : null;

      const delayMs = computeRetryDelay(
        attempt,
        baseDelayMs,
        maxDelayMs,
        maxRetryAfterMs,
        retryAfterHeader,
      );

      logger?.debug("Retrying HTTP request", {
        method: req.method,
        url: req.url,
        attempt,
        maxAttempts,
        delayMs,
        reason:
          error instanceof HttpError
            ? `status ${error.status}`
            : error instanceof Error
              ? error.name
              : "unknown",
      });

      await sleep(delayMs);
    }
  }

  throw lastError;
}

/**
 * Bind the request function to a logger
 */
export function createHttpClient(logger?: Logger): HttpRequestFn {
  return (req) => httpRequest(req, logger);
}

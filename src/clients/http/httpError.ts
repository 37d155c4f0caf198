/**
 * HttpError — non-2xx response from a job board or careers page
 */

import type { HttpErrorDetails } from "@/types";
import { RETRYABLE_STATUS_CODES } from "@/constants/clients/http";

/**
 * Statuses whose Retry-After header is honoured
 */
const RETRY_AFTER_STATUSES: readonly number[] = [429, 503];

export class HttpError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly url: string;
  readonly bodySnippet?: string;
  readonly headers?: Headers;

  constructor(details: HttpErrorDetails) {
    const snippet = details.bodySnippet ? ` - ${details.bodySnippet}` : "";
    super(`HTTP ${details.status} ${details.statusText} - ${details.url}${snippet}`);
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;
  }

  /** Timeouts, rate limits and transient server errors */
  get isTransient(): boolean {
    return RETRYABLE_STATUS_CODES.includes(this.status);
  }

  /**
   * Raw Retry-After value, only for 429 and 503
   */
  get retryAfter(): string | null {
    if (!this.headers || !RETRY_AFTER_STATUSES.includes(this.status)) {
      return null;
    }
    return this.headers.get("retry-after");
  }
}

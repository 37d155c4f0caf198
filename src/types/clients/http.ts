/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

/**
 * How the response body is decoded
 *
 * - json: parsed JSON (non-JSON content types fall back to text)
 * - text: raw body as a string
 */
export type HttpResponseType = "json" | "text";

/**
 * Retry configuration for HTTP requests
 */
export interface HttpRetryConfig {
  /** Maximum number of attempts (including initial request). Default from constants. */
  maxAttempts?: number;
  /** Base delay in ms for exponential backoff. Default from constants. */
  baseDelayMs?: number;
  /** Maximum delay in ms between retries. Default from constants. */
  maxDelayMs?: number;
  /** Maximum time in ms to wait for Retry-After header. Default from constants. */
  maxRetryAfterMs?: number;
}

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean | Array<string | number | boolean>>;
  json?: unknown;
  timeoutMs?: number;
  retry?: HttpRetryConfig;
  responseType?: HttpResponseType;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

/**
 * HTTP request function, injectable into producers for testing.
 *
 * Resolves the decoded body as `unknown`; callers validate the payload
 * shape before reading it.
 */
export type HttpRequestFn = (req: HttpRequest) => Promise<unknown>;

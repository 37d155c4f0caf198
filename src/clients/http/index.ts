/**
 * HTTP client public API
 */

export { httpRequest, createHttpClient, parseRetryAfter } from "./httpClient";
export { HttpError } from "./httpError";
export type {
  HttpRequest,
  HttpRequestFn,
  HttpMethod,
  HttpErrorDetails,
  HttpRetryConfig,
} from "@/types";

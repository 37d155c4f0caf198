/**
 * Unit tests for the fetch-based HTTP client (stubbed fetch)
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { HttpError, httpRequest, parseRetryAfter } from "@/clients/http";
import { createCapturingLogger } from "../helpers/fakes";

describe("parseRetryAfter", () => {
  it("parses delay seconds", () => {
    expect(parseRetryAfter("120")).toBe(120_000);
    expect(parseRetryAfter(" 5 ")).toBe(5_000);
  });

  it("parses an HTTP date relative to now", () => {
    const date = "Wed, 21 Oct 2015 07:28:00 GMT";
    const now = Date.parse(date) - 5_000;

    expect(parseRetryAfter(date, now)).toBe(5_000);
  });

  it("returns null for missing, zero, past or invalid values", () => {
    expect(parseRetryAfter(null)).toBeNull();
    expect(parseRetryAfter("0")).toBeNull();
    expect(
      parseRetryAfter("Wed, 21 Oct 2015 07:28:00 GMT", Date.now()),
    ).toBeNull();
    expect(parseRetryAfter("soon")).toBeNull();
  });
});

describe("httpRequest", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
      status,
      headers: { "content-type": "application/json" },
    });
  }

  it("appends query params, repeating arrays", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ ok: true }));

    const body = await httpRequest({
      url: "https://api.example.com/items",
      method: "GET",
      query: { page: 2, tag: ["a", "b"] },
    });

    expect(body).toEqual({ ok: true });
    expect(fetchMock.mock.calls[0][0]).toBe(
      "https://api.example.com/items?page=2&tag=a&tag=b",
    );
  });

  it("returns text when asked to", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response("<html></html>", {
        status: 200,
        headers: { "content-type": "text/html" },
      }),
    );

    await expect(
      httpRequest({
        url: "https://careers.example.com",
        method: "GET",
        responseType: "text",
      }),
    ).resolves.toBe("<html></html>");
  });

  it("falls back to text with a warning on a non-JSON response", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response("plain", {
        status: 200,
        headers: { "content-type": "text/plain" },
      }),
    );
    const logger = createCapturingLogger();

    const body = await httpRequest(
      { url: "https://api.example.com/items", method: "GET" },
      logger,
    );

    expect(body).toBe("plain");
    expect(logger.messages("warn")).toEqual(["Non-JSON response received"]);
  });

  it("retries a retryable status on GET", async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ error: "busy" }, 503))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));

    const body = await httpRequest({
      url: "https://api.example.com/items",
      method: "GET",
      retry: { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1 },
    });

    expect(body).toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("does not retry a client error", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: "missing" }, 404));

    const request = httpRequest({
      url: "https://api.example.com/items",
      method: "GET",
      retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1 },
    });

    await expect(request).rejects.toBeInstanceOf(HttpError);
    await expect(request).rejects.toMatchObject({ status: 404 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("does not retry a non-idempotent method", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: "busy" }, 503));

    await expect(
      httpRequest({
        url: "https://api.example.com/items",
        method: "POST",
        json: { a: 1 },
        retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1 },
      }),
    ).rejects.toMatchObject({ status: 503 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe("HttpError", () => {
  const error = (status: number, headers?: Record<string, string>) =>
    new HttpError({
      status,
      statusText: "Status",
      url: "https://api.example.com/items",
      headers: headers ? new Headers(headers) : undefined,
    });

  it("builds its message from status, URL and body snippet", () => {
    const withBody = new HttpError({
      status: 404,
      statusText: "Not Found",
      url: "https://api.example.com/items",
      bodySnippet: "missing",
    });

    expect(withBody.message).toBe(
      "HTTP 404 Not Found - https://api.example.com/items - missing",
    );
    expect(withBody.name).toBe("HttpError");
  });

  it("flags transient statuses", () => {
    expect(error(429).isTransient).toBe(true);
    expect(error(503).isTransient).toBe(true);
    expect(error(404).isTransient).toBe(false);
  });

  it("exposes Retry-After only for rate limits and unavailability", () => {
    expect(error(429, { "Retry-After": "3" }).retryAfter).toBe("3");
    expect(error(503, { "Retry-After": "7" }).retryAfter).toBe("7");
    expect(error(500, { "Retry-After": "3" }).retryAfter).toBeNull();
    expect(error(429).retryAfter).toBeNull();
  });
});

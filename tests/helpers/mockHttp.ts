/**
 * Mock HTTP Harness for offline tests
 *
 * Provides a controllable HTTP mock that:
 * - Returns canned bodies for registered routes
 * - Throws loudly on unmocked requests (prevents accidental real calls)
 * - Matches on method + URL, ignoring the query string
 *
 * Usage:
 *   const mock = createMockHttp();
 *   mock.on("GET", "https://boards-api.greenhouse.io/v1/boards/acme/jobs", body);
 *   const producer = new GreenhouseProducer(config, { logger, httpRequest: mock.request });
 */

import { readFileSync } from "fs";
import { join } from "path";
import type { HttpRequest, HttpRequestFn } from "@/types";
import { HttpError } from "@/clients/http";

type RouteKey = string; // "METHOD URL"
type RouteHandler = (req: HttpRequest) => Promise<unknown>;

type MockHttpHeaders = Record<string, string>;

type MockHttpReply = {
  status: number;
  body: unknown;
  headers?: MockHttpHeaders;
};

/**
 * Mock HTTP client for testing
 */
export interface MockHttp {
  /** Register a 200 response for a given method+url */
  on(method: string, url: string, body: unknown): void;

  /** Register a response with explicit status/body/headers */
  onResponse(method: string, url: string, reply: MockHttpReply): void;

  /** Register a custom handler; whatever it resolves is the body */
  onCustom(method: string, url: string, handler: RouteHandler): void;

  /** Mock httpRequest function (inject into producers) */
  request: HttpRequestFn;

  /** Recorded requests (for assertions) */
  getRecordedRequests(): HttpRequest[];

  /** Clear all mocks and recorded requests */
  reset(): void;
}

/**
 * Load fixture content from tests/fixtures as UTF-8 text
 *
 * @param relativePath - Path relative to tests/fixtures (e.g. "lever/postings.json")
 */
export function loadFixtureText(relativePath: string): string {
  return readFileSync(
    join(process.cwd(), "tests", "fixtures", relativePath),
    "utf-8",
  );
}

/**
 * Load and parse a JSON fixture
 */
export function loadFixtureJson(relativePath: string): unknown {
  return JSON.parse(loadFixtureText(relativePath));
}

function buildRouteKey(method: string, url: string): RouteKey {
  return `${method.toUpperCase()} ${url.split("?")[0]}`;
}

export function createMockHttp(): MockHttp {
  const routes = new Map<RouteKey, RouteHandler>();
  const recordedRequests: HttpRequest[] = [];

  const onResponse = (
    method: string,
    url: string,
    reply: MockHttpReply,
  ): void => {
    routes.set(buildRouteKey(method, url), async (req) => {
      if (reply.status >= 200 && reply.status < 300) {
        return reply.body;
      }

      throw new HttpError({
        status: reply.status,
        statusText: "Mock Response",
        url: req.url,
        bodySnippet:
          typeof reply.body === "string"
            ? reply.body
            : JSON.stringify(reply.body),
        headers: reply.headers ? new Headers(reply.headers) : undefined,
      });
    });
  };

  const on = (method: string, url: string, body: unknown): void => {
    onResponse(method, url, { status: 200, body });
  };

  const onCustom = (
    method: string,
    url: string,
    handler: RouteHandler,
  ): void => {
    routes.set(buildRouteKey(method, url), handler);
  };

  const request: HttpRequestFn = async (req) => {
    recordedRequests.push({ ...req });

    const key = buildRouteKey(req.method, req.url);
    const handler = routes.get(key);

    if (!handler) {
      throw new Error(
        `[MockHttp] Unmocked request: ${key}\n` +
          `All HTTP requests must be explicitly mocked to prevent accidental network calls.\n` +
          `Available routes: ${Array.from(routes.keys()).join(", ") || "(none)"}`,
      );
    }

    return handler(req);
  };

  return {
    on,
    onResponse,
    onCustom,
    request,
    getRecordedRequests: () => [...recordedRequests],
    reset: () => {
      routes.clear();
      recordedRequests.length = 0;
    },
  };
}

/**
 * Mock HTTP Harness for offline tests
 *
 * Provides a controllable HTTP mock that:
 * - Returns fixture JSON for registered routes
 * - Throws loudly on unmocked requests (prevents accidental real calls)
 * - Supports basic method+url matching
 *
 * Usage:
 *   const mock = createMockHttp();
 *   mock.on("POST", "https://api.example.test/conversations/search", page);
 *   const client = new IntercomClient({ credentials, httpRequest: mock.request });
 */

import type { HttpRequest, HttpResponse } from "@/types";
import { HttpError } from "@/clients/http";

type RouteKey = string; // "METHOD URL"
type RouteHandler = (req: HttpRequest) => Promise<MockHttpReply>;

type MockHttpHeaders = Record<string, string>;

export interface MockHttpReply {
  status: number;
  body: unknown;
  headers?: MockHttpHeaders;
}

/**
 * Mock HTTP client for testing
 */
export interface MockHttp {
  /**
   * Register a 200 response for a given method+url
   */
  on(method: string, url: string, body: unknown, headers?: MockHttpHeaders): void;

  /**
   * Register a mock response with explicit status/body/headers
   */
  onResponse(method: string, url: string, response: MockHttpReply): void;

  /**
   * Register a custom handler for a given method+url
   */
  onCustom(method: string, url: string, handler: RouteHandler): void;

  /**
   * Mock httpRequest function (inject into clients)
   */
  request: <T>(req: HttpRequest) => Promise<HttpResponse<T | null>>;

  /**
   * Get recorded requests (for assertions)
   */
  getRecordedRequests(): HttpRequest[];

  /**
   * Clear all mocks and recorded requests
   */
  reset(): void;
}

/**
 * Build route key from method and URL (ignores query params)
 */
function buildRouteKey(method: string, url: string): RouteKey {
  const urlWithoutQuery = url.split("?")[0];
  return `${method.toUpperCase()} ${urlWithoutQuery}`;
}

/**
 * Create a mock HTTP client
 */
export function createMockHttp(): MockHttp {
  const routes = new Map<RouteKey, RouteHandler>();
  const recordedRequests: HttpRequest[] = [];

  const on = (method: string, url: string, body: unknown, headers?: MockHttpHeaders): void => {
    routes.set(buildRouteKey(method, url), async () => ({ status: 200, body, headers }));
  };

  const onResponse = (method: string, url: string, response: MockHttpReply): void => {
    routes.set(buildRouteKey(method, url), async () => response);
  };

  const onCustom = (method: string, url: string, handler: RouteHandler): void => {
    routes.set(buildRouteKey(method, url), handler);
  };

  const request = async <T>(req: HttpRequest): Promise<HttpResponse<T | null>> => {
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

    const reply = await handler(req);
    const headers = new Headers(reply.headers);

    if (reply.status >= 200 && reply.status < 300) {
      return {
        status: reply.status,
        headers,
        data: reply.body === undefined || reply.body === null ? null : (reply.body as T),
      };
    }

    const bodySnippet = typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body);

    throw new HttpError({
      status: reply.status,
      statusText: "Mock Response",
      url: req.url,
      bodySnippet,
      headers,
    });
  };

  const getRecordedRequests = (): HttpRequest[] => {
    return [...recordedRequests];
  };

  const reset = (): void => {
    routes.clear();
    recordedRequests.length = 0;
  };

  return {
    on,
    onResponse,
    onCustom,
    request,
    getRecordedRequests,
    reset,
  };
}

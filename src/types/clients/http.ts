/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  json?: unknown;
  timeoutMs?: number;
}

/**
 * Parsed response. Headers are kept because callers read rate-limit metadata
 * from successful responses, not only from errors.
 */
export interface HttpResponse<T> {
  status: number;
  headers: Headers;
  data: T;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

/**
 * HTTP request function type for dependency injection
 */
export type HttpRequestFn = <T>(req: HttpRequest) => Promise<HttpResponse<T | null>>;

/**
 * HTTP client wrapper: general-purpose JSON client using native fetch
 * Supports timeouts, JSON bodies and structured error handling.
 *
 * No retries here: search pagination fails on the first error, and write
 * retries follow the caller's RetryPolicy (see @/execution).
 */

import type { HttpRequest, HttpResponse } from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
} from "@/constants";
import * as logger from "@/logger";

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch (err) {
    logger.debug("Could not read error response body", {
      url: response.url,
      error: logger.describeError(err),
    });
    return undefined;
  }
}

function isJsonContentType(contentType: string | null): boolean {
  return (
    contentType !== null &&
    (contentType.includes("application/json") || contentType.includes("+json"))
  );
}

/**
 * Perform an HTTP request with timeout and error handling
 *
 * `data` is null when the response has no JSON body (204, non-JSON content
 * type, or a body that fails to parse).
 *
 * @throws {HttpError} On non-2xx status codes
 * @throws {Error} On network errors; timeouts surface as an AbortError
 */
export async function httpRequest<T>(req: HttpRequest): Promise<HttpResponse<T | null>> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = req.url;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    // Build headers - defaults first, caller headers override
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
      return { status: response.status, headers: response.headers, data: null };
    }

    const contentType = response.headers.get("content-type");
    if (!isJsonContentType(contentType)) {
      logger.warn("Non-JSON response received", {
        method: req.method,
        url,
        status: response.status,
        contentType: contentType || "none",
      });
      return { status: response.status, headers: response.headers, data: null };
    }

    try {
      const data = (await response.json()) as T;
      return { status: response.status, headers: response.headers, data };
    } catch (parseError) {
      logger.warn("JSON parse failed", {
        method: req.method,
        url,
        status: response.status,
        error: logger.describeError(parseError),
      });
      return { status: response.status, headers: response.headers, data: null };
    }
  } finally {
    clearTimeout(timeoutId);
  }
}

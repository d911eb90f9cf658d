/**
 * Helpers for reading records and cursors out of loosely-shaped search responses
 */

import type { ItemIdentifier, PageCursor, SearchResponseBody } from "@/types";

/**
 * Return the first non-empty array found under `keys`, or an empty array
 */
export function extractPageItems(
  body: SearchResponseBody,
  keys: readonly string[],
): unknown[] {
  for (const key of keys) {
    const value = body[key];
    if (Array.isArray(value) && value.length > 0) {
      return value;
    }
  }
  return [];
}

/**
 * Default id extractor: `item.id` as a string (numeric ids are stringified)
 */
export function extractDefaultId(item: unknown): ItemIdentifier | null {
  if (typeof item !== "object" || item === null || !("id" in item)) {
    return null;
  }
  const id = item.id;
  if (typeof id === "string" && id.length > 0) {
    return id;
  }
  if (typeof id === "number" && Number.isFinite(id)) {
    return String(id);
  }
  return null;
}

/**
 * Continuation cursor of a page, or null when this was the last page
 *
 * `hasNext` is reported separately so callers can tell a clean end apart
 * from a `next` block that is missing its token.
 */
export function extractNextCursor(body: SearchResponseBody): {
  hasNext: boolean;
  cursor: PageCursor | null;
} {
  const next = body.pages?.next;
  if (!next) {
    return { hasNext: false, cursor: null };
  }
  const cursor = next.starting_after;
  return {
    hasNext: true,
    cursor: typeof cursor === "string" && cursor.length > 0 ? cursor : null,
  };
}

/**
 * Search type definitions: queries, identifiers and page shapes
 */

import type { RateLimitSnapshot } from "./rateLimit";

/**
 * Opaque identifier of a remote record. The engine never looks inside it.
 */
export type ItemIdentifier = string;

/**
 * Continuation token returned by the remote service (`starting_after`)
 */
export type PageCursor = string;

export type SearchFieldOperator = "=" | "!=" | "IN" | "NIN" | "<" | ">" | "~" | "!~" | "^" | "$";

export type SearchCombinator = "AND" | "OR";

export interface SearchFilter {
  field: string;
  operator: SearchFieldOperator;
  value: string | number | boolean | null | Array<string | number>;
}

/**
 * Structured filter forwarded verbatim to the search endpoint
 */
export interface SearchQuery {
  operator: SearchCombinator;
  value: Array<SearchFilter | SearchQuery>;
}

/**
 * Caller-facing search parameters, turned into a SearchQuery by an
 * operation's query builder
 */
export interface SearchCriteria {
  /** Team (inbox) whose conversations are searched. Required. */
  teamId: string;
  /** Conversation state to match (e.g. "open"). Builders apply their own default. */
  state?: string;
}

export interface SearchPagination {
  per_page: number;
  starting_after?: PageCursor;
}

export interface SearchPageRequest {
  query: SearchQuery;
  pagination: SearchPagination;
}

/**
 * Pagination block of a search response
 */
export interface SearchPagesInfo {
  type?: string;
  page?: number;
  per_page?: number;
  total_pages?: number;
  next?: { page?: number; starting_after?: PageCursor | null } | null;
}

/**
 * Loosely-typed search response body. Records may come back under one of
 * several keys depending on the searched entity.
 */
export interface SearchResponseBody {
  type?: string;
  total_count?: number;
  pages?: SearchPagesInfo;
  [key: string]: unknown;
}

/**
 * Extracts the identifier from one raw search record; null skips the record
 */
export type ItemIdExtractor = (item: unknown) => ItemIdentifier | null;

/**
 * One fetched search page: body (null when the response had no JSON) and
 * the quota metadata of the response that carried it
 */
export interface SearchPage {
  body: SearchResponseBody | null;
  rateLimit: RateLimitSnapshot;
}

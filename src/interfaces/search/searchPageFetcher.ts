/**
 * SearchPageFetcher interface: one network call per search page
 *
 * Implemented by API clients; consumed by the paginated search stream, which
 * owns cursor handling. Non-2xx responses must reject.
 */

import type { SearchPage, SearchPageRequest } from "@/types";

export interface SearchPageFetcher {
  fetchSearchPage(request: SearchPageRequest): Promise<SearchPage>;
}

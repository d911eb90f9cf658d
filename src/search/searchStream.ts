/**
 * Paginated search stream: lazy sequence of record identifiers
 *
 * One network call per page pulled. The generator is single-use: restarting
 * a search means calling searchItems again, which starts from the first page.
 * Fetch failures are not retried or masked; they end the stream by throwing
 * into the consumer.
 */

import type {
  ItemIdExtractor,
  ItemIdentifier,
  Logger,
  SearchPageRequest,
  SearchQuery,
} from "@/types";
import type { SearchPageFetcher } from "@/interfaces";
import type { RateLimitMonitor } from "@/rateLimit";
import { INTERCOM_DEFAULT_PAGE_SIZE, INTERCOM_SEARCH_ITEM_KEYS } from "@/constants";
import { rootLogger } from "@/logger";
import { extractDefaultId, extractNextCursor, extractPageItems } from "./itemExtraction";

export interface SearchStreamOptions {
  fetcher: SearchPageFetcher;
  query: SearchQuery;
  rateLimitMonitor: RateLimitMonitor;
  pageSize?: number;
  extractId?: ItemIdExtractor;
  /** Keys checked, in order, for the page's record list */
  itemKeys?: readonly string[];
  logger?: Logger;
}

export async function* searchItems(
  options: SearchStreamOptions,
): AsyncGenerator<ItemIdentifier, void, undefined> {
  const {
    fetcher,
    query,
    rateLimitMonitor,
    pageSize = INTERCOM_DEFAULT_PAGE_SIZE,
    extractId = extractDefaultId,
    itemKeys = INTERCOM_SEARCH_ITEM_KEYS,
    logger = rootLogger,
  } = options;

  let request: SearchPageRequest = {
    query,
    pagination: { per_page: pageSize },
  };
  let pageCount = 0;
  let totalItems = 0;

  logger.info("Searching for items", { query: JSON.stringify(query), pageSize });

  while (true) {
    pageCount++;
    logger.debug("Fetching search page", { page: pageCount });

    const page = await fetcher.fetchSearchPage(request);
    await rateLimitMonitor.check(page.rateLimit);

    if (!page.body) {
      logger.warn("Search page had no JSON body, stopping", { page: pageCount });
      break;
    }

    const items = extractPageItems(page.body, itemKeys);
    totalItems += items.length;

    logger.debug("Search page received", { page: pageCount, items: items.length });
    if (pageCount === 1) {
      logger.info("Search totals", {
        totalPages: page.body.pages?.total_pages ?? "unknown",
        totalCount: page.body.total_count ?? "unknown",
      });
    }

    for (const item of items) {
      const id = extractId(item);
      if (id === null) {
        logger.warn("Search record without usable id, skipping", { page: pageCount });
        continue;
      }
      yield id;
    }

    const { hasNext, cursor } = extractNextCursor(page.body);
    if (!hasNext) {
      break;
    }
    if (cursor === null) {
      logger.warn("Next page announced without starting_after cursor, stopping", {
        page: pageCount,
      });
      break;
    }

    request = {
      query,
      pagination: { per_page: pageSize, starting_after: cursor },
    };
  }

  logger.info("Search complete", { pages: pageCount, totalItems });
}

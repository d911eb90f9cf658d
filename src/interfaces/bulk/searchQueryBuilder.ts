/**
 * SearchQueryBuilder interface: decides which records a bulk run touches
 */

import type { SearchCriteria, SearchQuery } from "@/types";

export interface SearchQueryBuilder {
  /**
   * Build the structured filter for the given criteria
   *
   * @throws {Error} If a required criterion (such as the team id) is missing
   */
  build(criteria: SearchCriteria): SearchQuery;
}

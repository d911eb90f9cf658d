/**
 * BulkOperation: a search builder and an item action bundled under a name
 *
 * Concrete operations (closing, tagging, state changes, custom fields) are
 * values of this shape handed to the same generic orchestrator.
 */

import type { ItemIdExtractor } from "@/types";
import type { SearchQueryBuilder } from "./searchQueryBuilder";
import type { ItemAction } from "./itemAction";

export interface BulkOperation<T = unknown> {
  /** Human-readable name used in logs */
  readonly name: string;
  readonly searchQuery: SearchQueryBuilder;
  readonly itemAction: ItemAction<T>;
  /** How to read an identifier from a search record; defaults to `item.id` */
  readonly extractId?: ItemIdExtractor;
}

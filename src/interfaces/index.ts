export type { SearchPageFetcher } from "./search/searchPageFetcher";
export type { SearchQueryBuilder } from "./bulk/searchQueryBuilder";
export type { ItemAction } from "./bulk/itemAction";
export type { BulkOperation } from "./bulk/bulkOperation";

/**
 * Intercom client constants: base URL, endpoint paths, header names
 */

export const INTERCOM_DEFAULT_BASE_URL = "https://api.intercom.io";

/**
 * Conversations search endpoint path
 */
export const INTERCOM_CONVERSATIONS_SEARCH_PATH = "/conversations/search";

/**
 * Conversation resource path prefix (use with conversation id)
 */
export const INTERCOM_CONVERSATIONS_PATH = "/conversations";

/**
 * Default number of records per search page
 */
export const INTERCOM_DEFAULT_PAGE_SIZE = 150;

/**
 * Keys under which search responses may carry their records, checked in order
 */
export const INTERCOM_SEARCH_ITEM_KEYS = ["conversations", "items", "data"] as const;

export const RATE_LIMIT_REMAINING_HEADER = "x-ratelimit-remaining";
export const RATE_LIMIT_LIMIT_HEADER = "x-ratelimit-limit";
export const RATE_LIMIT_RESET_HEADER = "x-ratelimit-reset";
export const RETRY_AFTER_HEADER = "retry-after";

/**
 * Environment variable names read by loadAppConfig
 */

export const ENV_INTERCOM_ACCESS_TOKEN = "INTERCOM_ACCESS_TOKEN";
export const ENV_INTERCOM_ADMIN_ID = "INTERCOM_ADMIN_ID";
export const ENV_INTERCOM_INBOX_ID = "INTERCOM_INBOX_ID";
export const ENV_INTERCOM_BASE_URL = "INTERCOM_BASE_URL";
export const ENV_LOG_LEVEL = "LOG_LEVEL";
export const ENV_BULK_MODE = "BULK_MODE";
export const ENV_BULK_OPERATION = "BULK_OPERATION";
export const ENV_BULK_PARALLEL_WORKERS = "BULK_PARALLEL_WORKERS";
export const ENV_BULK_BATCH_SIZE = "BULK_BATCH_SIZE";
export const ENV_BULK_MAX_ITEMS = "BULK_MAX_ITEMS";
export const ENV_BULK_DELAY_MS = "BULK_DELAY_MS";
export const ENV_BULK_SEARCH_STATE = "BULK_SEARCH_STATE";
export const ENV_BULK_TAG_IDS = "BULK_TAG_IDS";
export const ENV_BULK_NEW_STATE = "BULK_NEW_STATE";
export const ENV_BULK_CUSTOM_FIELDS = "BULK_CUSTOM_FIELDS";

export const DEFAULT_BULK_MODE = "hybrid";
export const DEFAULT_BULK_OPERATION = "close";
export const DEFAULT_NEW_STATE = "closed";
export const DEFAULT_SEARCH_STATE = "open";

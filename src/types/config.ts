/**
 * Application configuration type definitions
 */

import type { BulkMode } from "./bulk";
import type { LogLevel } from "./logger";

export type BulkOperationName = "close" | "tag" | "state" | "custom-fields";

/**
 * Intercom credentials and endpoint, constructed once at startup
 */
export interface IntercomCredentials {
  accessToken: string;
  adminId: string;
  baseUrl: string;
}

/**
 * Fully resolved configuration for one process run
 */
export interface AppConfig {
  intercom: IntercomCredentials;
  /** Team inbox whose conversations are processed */
  inboxId: string;
  logLevel: LogLevel;
  run: {
    mode: BulkMode;
    operation: BulkOperationName;
    parallelWorkers?: number;
    batchSize?: number;
    maxItems?: number;
    delayMs?: number;
    searchState?: string;
  };
  operationParams: {
    tagIds: string[];
    newState: string;
    customFields: Record<string, unknown>;
  };
}

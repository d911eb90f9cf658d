/**
 * Intercom API type definitions
 *
 * Only the fields this project reads are modeled; everything else is passed
 * through untouched.
 */

import type { HttpRequestFn } from "./http";
import type { IntercomCredentials } from "../config";

export interface IntercomClientConfig {
  credentials: IntercomCredentials;
  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
}

/**
 * Conversation record as returned by search and mutation endpoints
 */
export interface IntercomConversation {
  type?: string;
  id: string;
  state?: string;
  open?: boolean;
  [key: string]: unknown;
}

export interface IntercomClosePayload {
  message_type: "close";
  type: "admin";
  admin_id: string;
}

export interface IntercomTagPayload {
  id: string;
  tags: Array<{ id: string }>;
}

export interface IntercomStatePayload {
  id: string;
  state: string;
}

export interface IntercomCustomAttributesPayload {
  id: string;
  custom_attributes: Record<string, unknown>;
}

/**
 * IntercomClient: API client for Intercom conversations
 *
 * Implements SearchPageFetcher for the search stream and exposes the
 * conversation mutations used by bulk operations. Every mutation resolves
 * with the parsed conversation plus the response's rate-limit snapshot, and
 * rejects with HttpError on non-2xx statuses.
 */

import type { SearchPageFetcher } from "@/interfaces";
import type {
  ActionCallOptions,
  ActionOutcome,
  HttpMethod,
  HttpRequestFn,
  IntercomClientConfig,
  IntercomClosePayload,
  IntercomConversation,
  IntercomCredentials,
  IntercomCustomAttributesPayload,
  IntercomStatePayload,
  IntercomTagPayload,
  ItemIdentifier,
  SearchPage,
  SearchPageRequest,
  SearchResponseBody,
} from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { parseRateLimitHeaders } from "@/rateLimit";
import { ConfigError } from "@/config";
import {
  INTERCOM_CONVERSATIONS_PATH,
  INTERCOM_CONVERSATIONS_SEARCH_PATH,
  ENV_INTERCOM_ACCESS_TOKEN,
  ENV_INTERCOM_ADMIN_ID,
} from "@/constants";
import * as logger from "@/logger";

export class IntercomClient implements SearchPageFetcher {
  private readonly credentials: IntercomCredentials;
  private readonly httpRequest: HttpRequestFn;
  private readonly baseHeaders: Record<string, string>;

  constructor(config: IntercomClientConfig) {
    const { credentials } = config;

    const missing: string[] = [];
    if (!credentials.accessToken) missing.push(ENV_INTERCOM_ACCESS_TOKEN);
    if (!credentials.adminId) missing.push(ENV_INTERCOM_ADMIN_ID);
    if (missing.length > 0) {
      throw new ConfigError(
        `Intercom authentication configuration missing: ${missing.join(", ")}`,
        missing,
      );
    }

    this.credentials = credentials;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.baseHeaders = {
      Authorization: `Bearer ${credentials.accessToken}`,
      Accept: "application/json",
    };

    logger.debug("IntercomClient initialized", {
      adminId: credentials.adminId,
      baseUrl: credentials.baseUrl,
    });
  }

  private url(path: string): string {
    return `${this.credentials.baseUrl.replace(/\/+$/, "")}${path}`;
  }

  private conversationPath(conversationId: ItemIdentifier, suffix = ""): string {
    return `${INTERCOM_CONVERSATIONS_PATH}/${encodeURIComponent(conversationId)}${suffix}`;
  }

  /**
   * Fetch one page of conversation search results
   * Non-2xx statuses reject with HttpError; no retry happens here.
   */
  async fetchSearchPage(request: SearchPageRequest): Promise<SearchPage> {
    const response = await this.httpRequest<SearchResponseBody>({
      method: "POST",
      url: this.url(INTERCOM_CONVERSATIONS_SEARCH_PATH),
      headers: this.baseHeaders,
      json: request,
    });

    return {
      body: response.data,
      rateLimit: parseRateLimitHeaders(response.headers),
    };
  }

  /**
   * Close a conversation by adding a `close` part as the configured admin
   */
  closeConversation(
    conversationId: ItemIdentifier,
    options: ActionCallOptions,
  ): Promise<ActionOutcome<IntercomConversation>> {
    const payload: IntercomClosePayload = {
      message_type: "close",
      type: "admin",
      admin_id: this.credentials.adminId,
    };
    return this.mutate(
      "POST",
      this.conversationPath(conversationId, "/parts"),
      payload,
      conversationId,
      options,
    );
  }

  /**
   * Attach tags to a conversation
   */
  tagConversation(
    conversationId: ItemIdentifier,
    tagIds: readonly string[],
    options: ActionCallOptions,
  ): Promise<ActionOutcome<IntercomConversation>> {
    const payload: IntercomTagPayload = {
      id: conversationId,
      tags: tagIds.map((id) => ({ id })),
    };
    return this.mutate(
      "POST",
      this.conversationPath(conversationId, "/tags"),
      payload,
      conversationId,
      options,
    );
  }

  /**
   * Move a conversation to another state (open, snoozed, closed)
   */
  changeConversationState(
    conversationId: ItemIdentifier,
    state: string,
    options: ActionCallOptions,
  ): Promise<ActionOutcome<IntercomConversation>> {
    const payload: IntercomStatePayload = { id: conversationId, state };
    return this.mutate(
      "PUT",
      this.conversationPath(conversationId),
      payload,
      conversationId,
      options,
    );
  }

  /**
   * Set custom attributes on a conversation
   */
  updateCustomAttributes(
    conversationId: ItemIdentifier,
    attributes: Record<string, unknown>,
    options: ActionCallOptions,
  ): Promise<ActionOutcome<IntercomConversation>> {
    const payload: IntercomCustomAttributesPayload = {
      id: conversationId,
      custom_attributes: attributes,
    };
    return this.mutate(
      "PUT",
      this.conversationPath(conversationId),
      payload,
      conversationId,
      options,
    );
  }

  private async mutate(
    method: HttpMethod,
    path: string,
    payload: unknown,
    conversationId: ItemIdentifier,
    options: ActionCallOptions,
  ): Promise<ActionOutcome<IntercomConversation>> {
    const response = await this.httpRequest<IntercomConversation>({
      method,
      url: this.url(path),
      headers: this.baseHeaders,
      json: payload,
      timeoutMs: options.timeoutMs,
    });

    if (response.data === null) {
      logger.debug("Intercom mutation returned no JSON body", { conversationId, path });
    }

    return {
      data: response.data ?? { id: conversationId },
      rateLimit: parseRateLimitHeaders(response.headers),
    };
  }
}

/**
 * Conversation bulk operations
 *
 * Each factory binds an IntercomClient (and the action's own parameters) into
 * a BulkOperation for the generic orchestrator:
 * - close: close conversations in a state (default open)
 * - tag: attach tags to conversations in a state
 * - state: move conversations from one state to another
 * - custom-fields: set custom attributes on every conversation of a team
 */

import type { BulkOperation } from "@/interfaces";
import type { BulkOperationName, IntercomConversation } from "@/types";
import type { IntercomClient } from "@/clients/intercom";
import { conversationsInStateQuery, teamConversationsQuery } from "@/queries";
import { DEFAULT_NEW_STATE } from "@/constants";

export type ConversationOperation = BulkOperation<IntercomConversation>;

export function createConversationCloser(client: IntercomClient): ConversationOperation {
  return {
    name: "close-conversations",
    searchQuery: conversationsInStateQuery,
    itemAction: {
      perform: (conversationId, options) => client.closeConversation(conversationId, options),
    },
  };
}

export function createTagAssigner(
  client: IntercomClient,
  tagIds: readonly string[],
): ConversationOperation {
  const tags = tagIds.map((id) => id.trim()).filter((id) => id.length > 0);
  if (tags.length === 0) {
    throw new Error("At least one tag id is required to tag conversations");
  }

  return {
    name: "tag-conversations",
    searchQuery: conversationsInStateQuery,
    itemAction: {
      perform: (conversationId, options) => client.tagConversation(conversationId, tags, options),
    },
  };
}

export function createStateChanger(
  client: IntercomClient,
  newState: string = DEFAULT_NEW_STATE,
): ConversationOperation {
  if (newState.trim() === "") {
    throw new Error("Target state must not be empty");
  }

  return {
    name: `set-state-${newState}`,
    searchQuery: conversationsInStateQuery,
    itemAction: {
      perform: (conversationId, options) =>
        client.changeConversationState(conversationId, newState, options),
    },
  };
}

export function createCustomFieldUpdater(
  client: IntercomClient,
  customFields: Record<string, unknown>,
): ConversationOperation {
  if (Object.keys(customFields).length === 0) {
    throw new Error("At least one custom field is required to update conversations");
  }

  return {
    name: "update-custom-fields",
    searchQuery: teamConversationsQuery,
    itemAction: {
      perform: (conversationId, options) =>
        client.updateCustomAttributes(conversationId, customFields, options),
    },
  };
}

export interface ConversationOperationParams {
  tagIds: readonly string[];
  newState: string;
  customFields: Record<string, unknown>;
}

/**
 * Pick the operation named in configuration
 */
export function createConversationOperation(
  name: BulkOperationName,
  client: IntercomClient,
  params: ConversationOperationParams,
): ConversationOperation {
  switch (name) {
    case "close":
      return createConversationCloser(client);
    case "tag":
      return createTagAssigner(client, params.tagIds);
    case "state":
      return createStateChanger(client, params.newState);
    case "custom-fields":
      return createCustomFieldUpdater(client, params.customFields);
  }
}

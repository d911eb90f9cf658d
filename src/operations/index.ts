export {
  createConversationCloser,
  createTagAssigner,
  createStateChanger,
  createCustomFieldUpdater,
  createConversationOperation,
} from "./conversationOperations";
export type {
  ConversationOperation,
  ConversationOperationParams,
} from "./conversationOperations";

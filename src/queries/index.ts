/**
 * Search query builders
 */

export { conversationsInStateQuery, teamConversationsQuery } from "./conversations";

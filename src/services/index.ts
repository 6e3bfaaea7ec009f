/**
 * Service module exports
 */

export { ConversationSession } from "./assistant";
export { createAuthorizationPolicy, type AuthorizationLists } from "./authorization";
export { MessageRouter, UNAUTHORIZED_REPLY, extractMentionQuery, type RouterOptions } from "./router";
export {
  buildAssistRequest,
  describeAssistRequest,
  describeAssistResponse,
  loadAssistMethod,
  loadAssistService,
  parseAssistResponse,
} from "./protocol";
export {
  createAssistantChannel,
  createBearerMetadataGenerator,
  createChannelCredentials,
  loadCredentials,
  type AssistantChannel,
} from "./transport";

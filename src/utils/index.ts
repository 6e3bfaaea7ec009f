/**
 * Centralized utility exports
 */

export { logger, createLogger, type LogLevel } from "./logger";
export {
  AssistantError,
  DeadlineExceededError,
  RemoteServiceError,
  TransportError,
  classifyCallError,
  type AssistantErrorKind,
} from "./errors";
export { SerialQueue } from "./queue";
export {
  createChatActions,
  sendResponse,
  splitMessage,
  toChatEvent,
  type TelegramChatContext,
  type TelegramTextMessage,
} from "./telegram";

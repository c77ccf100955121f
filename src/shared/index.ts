/**
 * Shared modules for chat-relay.
 */
export type {
  ChatCompletionChunk,
  ChatImage,
  ChatMessage,
  ChatRequest,
  ChatRole,
  CompletionResponse,
  CompletionUsage,
  FinishReason,
  ImageMediaType,
  LogEntry,
  LogFieldValue,
  LogLevel,
  TokenBudget,
  TrimmedContext,
} from "./types.js";
export { CHAT_ROLES, FINISH_REASONS, IMAGE_MEDIA_TYPES, LOG_LEVELS } from "./types.js";
export { Logger, createLogger, sanitize } from "./logger.js";
export type { LogFields, LogSink, LoggerContext, LoggerOptions } from "./logger.js";
export { Mutex } from "./mutex.js";

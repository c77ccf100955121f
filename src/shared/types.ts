/**
 * Shared TypeScript types for chat-relay.
 *
 * Defines the caller-facing data structures (OpenAI chat-completion shapes),
 * the context-budget types and the log entry format.
 */

// ---------------------------------------------------------------------------
// Chat messages and requests
// ---------------------------------------------------------------------------

export const CHAT_ROLES = ["system", "user", "assistant"] as const;

export type ChatRole = (typeof CHAT_ROLES)[number];

export const IMAGE_MEDIA_TYPES = ["image/jpeg", "image/png", "image/gif", "image/webp"] as const;

export type ImageMediaType = (typeof IMAGE_MEDIA_TYPES)[number];

/** Image from an `image_url` content part: inline base64 data or a URL. */
export type ChatImage =
  | { readonly kind: "base64"; readonly mediaType: ImageMediaType; readonly data: string }
  | { readonly kind: "url"; readonly url: string };

export interface ChatMessage {
  readonly role: ChatRole;
  /** Text content; text parts are joined with "\n". */
  readonly content: string;
  /** Attached images in part order. Only user messages carry them. */
  readonly images?: readonly ChatImage[];
}

export interface ChatRequest {
  /** Caller-facing model identifier. */
  readonly model: string;
  /** Chronological history, last = most recent. Never empty. */
  readonly messages: readonly ChatMessage[];
  /** Sampling temperature in [0, 2]. */
  readonly temperature?: number;
  /** Nucleus sampling in [0, 1]. */
  readonly topP?: number;
  /** Whether the caller wants a server-sent event stream. */
  readonly stream: boolean;
  /** Upper bound on generated tokens. */
  readonly maxOutputTokens?: number;
  /** Stop sequences. */
  readonly stop?: readonly string[];
}

// ---------------------------------------------------------------------------
// Context budget
// ---------------------------------------------------------------------------

export interface TokenBudget {
  /** Soft target the trimmed context should stay under. */
  preferred: number;
  /** Hard ceiling the backend accepts. */
  maximum: number;
}

export interface TrimmedContext {
  /** Ordered subsequence of the original messages (a fresh array). */
  messages: readonly ChatMessage[];
  /** Sum of per-message estimates for `messages`. */
  estimatedTokens: number;
  /** Whether any message was dropped. */
  truncated: boolean;
  /** Number of messages dropped. */
  dropped: number;
}

// ---------------------------------------------------------------------------
// Caller-facing responses
// ---------------------------------------------------------------------------

export const FINISH_REASONS = ["stop", "length", "content_filter"] as const;

export type FinishReason = (typeof FINISH_REASONS)[number];

export interface CompletionUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface CompletionResponse {
  id: string;
  object: "chat.completion";
  created: number;
  model: string;
  choices: Array<{
    index: number;
    message: { role: "assistant"; content: string };
    finish_reason: FinishReason;
  }>;
  usage: CompletionUsage;
}

export interface ChatCompletionChunk {
  id: string;
  object: "chat.completion.chunk";
  created: number;
  model: string;
  choices: Array<{
    index: number;
    delta: { role?: "assistant"; content?: string };
    finish_reason: FinishReason | null;
  }>;
  usage?: CompletionUsage;
}

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace"];

export type LogFieldValue = string | number | boolean;

export interface LogEntry {
  /** ISO-8601 timestamp. */
  ts: string;
  /** Severity level. */
  level: LogLevel;
  /** Component that emitted the log (e.g. "relay"). */
  component: string;
  /** Request identifier, empty outside a request. */
  requestId: string;
  /** Human-readable message. */
  msg: string;
  /** Structured key/value context, omitted when empty. */
  fields?: Record<string, LogFieldValue>;
}

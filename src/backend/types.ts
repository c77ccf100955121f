/**
 * Backend collaborator contract.
 *
 * The gateway talks to the model through this interface only. Responses and
 * stream chunks are tagged variants so translators switch on `kind`/`type`
 * instead of probing fields.
 */
import type { ChatImage, ChatMessage } from "../shared/types.js";

export interface BackendTurn {
  role: "user" | "assistant";
  content: string;
  /** Images sent ahead of the text, user turns only. */
  images?: ChatImage[];
}

export interface BackendRequest {
  /** Backend model identifier. */
  model: string;
  /** Joined system prompt, omitted when the history has none. */
  system?: string;
  /** Alternating turns, first one `user`. */
  messages: BackendTurn[];
  maxTokens: number;
  temperature?: number;
  topP?: number;
  stopSequences?: string[];
}

export const BACKEND_STOP_REASONS = [
  "end_turn",
  "max_tokens",
  "stop_sequence",
  "tool_use",
  "pause_turn",
] as const;

export type BackendStopReason = (typeof BACKEND_STOP_REASONS)[number];

export interface BackendUsage {
  inputTokens: number;
  outputTokens: number;
}

export type BackendResponse =
  | {
      kind: "message";
      id: string;
      model: string;
      text: string;
      stopReason: BackendStopReason;
      usage: BackendUsage;
    }
  | {
      /** The backend declined to answer for safety reasons. */
      kind: "refusal";
      id: string;
      model: string;
      text: string;
      usage: BackendUsage;
    };

export type BackendChunk =
  | { type: "delta"; text: string }
  | { type: "finish"; stopReason: BackendStopReason | "refusal"; usage: BackendUsage };

export interface ModelBackend {
  /** Short name shown by the health and info endpoints. */
  readonly name: string;
  /** One complete response. */
  generate(request: BackendRequest, signal?: AbortSignal): Promise<BackendResponse>;
  /**
   * Incremental response as a pull-based, finite, non-restartable sequence.
   * Aborting `signal` cancels the underlying stream.
   */
  stream(request: BackendRequest, signal?: AbortSignal): AsyncIterable<BackendChunk>;
  /** Approximate tokens a message occupies in this backend's context. */
  estimateTokens(message: ChatMessage): number;
}

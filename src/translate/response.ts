/**
 * Response translator — backend responses and chunks → OpenAI shapes.
 *
 * Usage numbers are copied from the backend, never re-estimated.
 */
import { randomUUID } from "node:crypto";
import type {
  BackendChunk,
  BackendResponse,
  BackendStopReason,
  BackendUsage,
} from "../backend/types.js";
import type {
  ChatCompletionChunk,
  CompletionResponse,
  CompletionUsage,
  FinishReason,
} from "../shared/types.js";

export interface ResponseContext {
  /** Completion id shared by every chunk of one response. */
  id: string;
  /** Caller-facing model identifier (not the backend's). */
  model: string;
  /** Unix seconds. */
  created: number;
}

export function createResponseContext(model: string, now: () => number = Date.now): ResponseContext {
  return {
    id: `chatcmpl-${randomUUID()}`,
    model,
    created: Math.floor(now() / 1000),
  };
}

export function mapFinishReason(reason: BackendStopReason | "refusal"): FinishReason {
  switch (reason) {
    case "end_turn":
    case "stop_sequence":
    case "tool_use":
    case "pause_turn":
      return "stop";
    case "max_tokens":
      return "length";
    case "refusal":
      return "content_filter";
  }
}

export function toCompletionUsage(usage: BackendUsage): CompletionUsage {
  return {
    prompt_tokens: usage.inputTokens,
    completion_tokens: usage.outputTokens,
    total_tokens: usage.inputTokens + usage.outputTokens,
  };
}

export function translateResponse(
  response: BackendResponse,
  ctx: ResponseContext,
): CompletionResponse {
  const finishReason: FinishReason =
    response.kind === "refusal" ? "content_filter" : mapFinishReason(response.stopReason);

  return {
    id: ctx.id,
    object: "chat.completion",
    created: ctx.created,
    model: ctx.model,
    choices: [
      {
        index: 0,
        message: { role: "assistant", content: response.text },
        finish_reason: finishReason,
      },
    ],
    usage: toCompletionUsage(response.usage),
  };
}

/**
 * Translate one backend chunk into one caller stream event.
 *
 * The first event of a stream (sequenceIndex 0) carries the assistant role.
 * A finish chunk becomes the terminal event: empty delta, finish_reason and
 * usage.
 */
export function translateChunk(
  chunk: BackendChunk,
  sequenceIndex: number,
  ctx: ResponseContext,
): ChatCompletionChunk {
  const base = {
    id: ctx.id,
    object: "chat.completion.chunk" as const,
    created: ctx.created,
    model: ctx.model,
  };

  switch (chunk.type) {
    case "delta":
      return {
        ...base,
        choices: [
          {
            index: 0,
            delta:
              sequenceIndex === 0
                ? { role: "assistant", content: chunk.text }
                : { content: chunk.text },
            finish_reason: null,
          },
        ],
      };
    case "finish":
      return {
        ...base,
        choices: [
          {
            index: 0,
            delta: sequenceIndex === 0 ? { role: "assistant" } : {},
            finish_reason: mapFinishReason(chunk.stopReason),
          },
        ],
        usage: toCompletionUsage(chunk.usage),
      };
  }
}

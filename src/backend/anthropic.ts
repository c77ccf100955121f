/**
 * Anthropic Messages API backend.
 *
 * Wraps the Anthropic SDK behind the ModelBackend contract. The SDK's
 * server-sent event stream is exposed as a pull-based async generator of
 * BackendChunks; SDK errors propagate unchanged and are classified at the
 * gateway boundary (errors/index.ts).
 */
import Anthropic from "@anthropic-ai/sdk";
import type { ChatImage, ChatMessage } from "../shared/types.js";
import { estimateMessageTokens } from "../context/token-estimator.js";
import {
  BACKEND_STOP_REASONS,
  type BackendChunk,
  type BackendRequest,
  type BackendResponse,
  type BackendStopReason,
  type BackendTurn,
  type BackendUsage,
  type ModelBackend,
} from "./types.js";

export interface AnthropicClientOptions {
  /** Anthropic API key. Falls back to ANTHROPIC_API_KEY env var. */
  apiKey?: string;
  /** API base URL override (proxies, test servers). */
  baseURL?: string;
  /** SDK-level retries. The gateway itself never retries. */
  maxRetries?: number;
  /** Per-request timeout in milliseconds. */
  timeoutMs?: number;
}

/**
 * Create an Anthropic client instance.
 *
 * Uses ANTHROPIC_API_KEY from environment if no key is provided.
 */
export function createAnthropicClient(options: AnthropicClientOptions = {}): Anthropic {
  return new Anthropic({
    apiKey: options.apiKey ?? process.env.ANTHROPIC_API_KEY,
    ...(options.baseURL ? { baseURL: options.baseURL } : {}),
    maxRetries: options.maxRetries ?? 0,
    ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {}),
  });
}

const KNOWN_STOP_REASONS = new Set<string>(BACKEND_STOP_REASONS);

function isBackendStopReason(value: string): value is BackendStopReason {
  return KNOWN_STOP_REASONS.has(value);
}

/**
 * Normalize the SDK's stop_reason.
 *
 * A missing reason is treated as a natural end of turn; reasons newer than
 * this gateway fall back to "end_turn" as well.
 */
export function normalizeStopReason(reason: string | null): BackendStopReason | "refusal" {
  if (reason === "refusal") return "refusal";
  if (reason !== null && isBackendStopReason(reason)) return reason;
  return "end_turn";
}

function toImageBlock(image: ChatImage): Anthropic.ImageBlockParam {
  return image.kind === "base64"
    ? { type: "image", source: { type: "base64", media_type: image.mediaType, data: image.data } }
    : { type: "image", source: { type: "url", url: image.url } };
}

/** Plain string for text-only turns; image blocks then the text block otherwise. */
function toMessageParam(turn: BackendTurn): Anthropic.MessageParam {
  const images = turn.images ?? [];
  if (images.length === 0) return { role: turn.role, content: turn.content };
  const content: Anthropic.ContentBlockParam[] = images.map(toImageBlock);
  if (turn.content !== "") content.push({ type: "text", text: turn.content });
  return { role: turn.role, content };
}

export function toCreateParams(request: BackendRequest): Anthropic.MessageCreateParamsNonStreaming {
  return {
    model: request.model,
    max_tokens: request.maxTokens,
    messages: request.messages.map(toMessageParam),
    ...(request.system !== undefined ? { system: request.system } : {}),
    ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    ...(request.topP !== undefined ? { top_p: request.topP } : {}),
    ...(request.stopSequences !== undefined ? { stop_sequences: request.stopSequences } : {}),
  };
}

function textOf(message: Anthropic.Message): string {
  let text = "";
  for (const block of message.content) {
    if (block.type === "text") text += block.text;
  }
  return text;
}

export class AnthropicBackend implements ModelBackend {
  readonly name = "anthropic";
  private readonly client: Anthropic;

  constructor(client: Anthropic) {
    this.client = client;
  }

  async generate(request: BackendRequest, signal?: AbortSignal): Promise<BackendResponse> {
    const message = await this.client.messages.create(toCreateParams(request), { signal });

    const usage: BackendUsage = {
      inputTokens: message.usage.input_tokens,
      outputTokens: message.usage.output_tokens,
    };
    const stopReason = normalizeStopReason(message.stop_reason);
    const base = { id: message.id, model: message.model, text: textOf(message), usage };

    return stopReason === "refusal"
      ? { kind: "refusal", ...base }
      : { kind: "message", ...base, stopReason };
  }

  async *stream(request: BackendRequest, signal?: AbortSignal): AsyncGenerator<BackendChunk> {
    const events = await this.client.messages.create(
      { ...toCreateParams(request), stream: true },
      { signal },
    );

    let inputTokens = 0;
    let outputTokens = 0;
    let stopReason: string | null = null;
    let finished = false;

    try {
      for await (const event of events) {
        switch (event.type) {
          case "message_start":
            inputTokens = event.message.usage.input_tokens;
            break;
          case "content_block_delta":
            if (event.delta.type === "text_delta" && event.delta.text.length > 0) {
              yield { type: "delta", text: event.delta.text };
            }
            break;
          case "message_delta":
            stopReason = event.delta.stop_reason ?? stopReason;
            outputTokens = event.usage.output_tokens;
            break;
          case "message_stop":
            finished = true;
            yield {
              type: "finish",
              stopReason: normalizeStopReason(stopReason),
              usage: { inputTokens, outputTokens },
            };
            return;
          default:
            break;
        }
      }
    } finally {
      // Consumer stopped early (client disconnect): tear down the HTTP stream.
      if (!finished) events.controller.abort();
    }
  }

  estimateTokens(message: ChatMessage): number {
    return estimateMessageTokens(message);
  }
}

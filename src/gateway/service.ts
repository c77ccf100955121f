/**
 * Chat completion service — the request path behind the HTTP routes.
 *
 * Order per request: admission, validation, model lookup, context trimming,
 * translation, then one backend call (generate or stream).
 */
import type { RateLimiter } from "../admission/rate-limiter.js";
import type { BackendRequest, ModelBackend } from "../backend/types.js";
import type { GatewayConfig } from "../config/index.js";
import { trim, formatTrimMessage } from "../context/window.js";
import { rateLimited } from "../errors/index.js";
import { relayStream, type RelayOutcome, type StreamSink } from "../relay/streaming-relay.js";
import type { Logger } from "../shared/logger.js";
import type {
  ChatRequest,
  CompletionResponse,
  TokenBudget,
  TrimmedContext,
} from "../shared/types.js";
import { resolveModel, translateRequest } from "../translate/request.js";
import {
  createResponseContext,
  translateResponse,
  type ResponseContext,
} from "../translate/response.js";
import { parseChatRequest } from "../translate/validation.js";

export interface ChatServiceDeps {
  limiter: RateLimiter;
  backend: ModelBackend;
  config: GatewayConfig;
  /** Clock for response timestamps. */
  now?: () => number;
}

/** A validated, trimmed and translated request, ready for the backend. */
export interface PreparedCompletion {
  request: ChatRequest;
  context: TrimmedContext;
  backendRequest: BackendRequest;
  ctx: ResponseContext;
}

export interface PrepareOptions {
  /** Model taken from the route path; replaces the body's `model`. */
  model?: string;
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class ChatCompletionService {
  private readonly limiter: RateLimiter;
  private readonly backend: ModelBackend;
  private readonly config: GatewayConfig;
  private readonly now: () => number;

  constructor(deps: ChatServiceDeps) {
    this.limiter = deps.limiter;
    this.backend = deps.backend;
    this.config = deps.config;
    this.now = deps.now ?? Date.now;
  }

  get budget(): TokenBudget {
    return {
      preferred: this.config.context.preferredTokens,
      maximum: this.config.context.maxTokens,
    };
  }

  /**
   * Run everything that happens before the backend is called.
   *
   * Throws a GatewayError (RateLimited, InvalidRequest, InvalidModel) without
   * touching the backend.
   */
  async prepare(body: unknown, options: PrepareOptions = {}): Promise<PreparedCompletion> {
    const { logger } = options;

    if (!(await this.limiter.admit())) {
      logger?.warn("Rate limit exceeded");
      throw rateLimited();
    }

    const source =
      options.model !== undefined && isRecord(body) ? { ...body, model: options.model } : body;
    const request = parseChatRequest(source);
    resolveModel(request.model, this.config.models);

    const budget = this.budget;
    const context = trim(request.messages, budget, (message) =>
      this.backend.estimateTokens(message),
    );
    if (context.truncated) {
      logger?.warn(formatTrimMessage(context, budget), {
        dropped: context.dropped,
        estimatedTokens: context.estimatedTokens,
      });
    }

    const backendRequest = translateRequest(context, request, this.config.models, {
      maxOutputTokens: this.config.backend.defaultMaxTokens,
    });
    logger?.debug("Prepared backend request", {
      model: backendRequest.model,
      stream: request.stream,
      estimatedTokens: context.estimatedTokens,
    });

    return {
      request,
      context,
      backendRequest,
      ctx: createResponseContext(request.model, this.now),
    };
  }

  /** Non-streaming mode: one backend call, one response. */
  async complete(prepared: PreparedCompletion, signal?: AbortSignal): Promise<CompletionResponse> {
    const response = await this.backend.generate(prepared.backendRequest, signal);
    return translateResponse(response, prepared.ctx);
  }

  /** Streaming mode: relay backend chunks to `sink` until a terminal state. */
  stream(
    prepared: PreparedCompletion,
    sink: StreamSink,
    signal?: AbortSignal,
    logger?: Logger,
  ): Promise<RelayOutcome> {
    return relayStream({
      open: (backendSignal) => this.backend.stream(prepared.backendRequest, backendSignal),
      sink,
      ctx: prepared.ctx,
      signal,
      logger,
    });
  }
}

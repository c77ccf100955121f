/**
 * Gateway server — HTTP surface of chat-relay.
 *
 * Routes:
 *   POST /v1/chat/completions       JSON or text/event-stream
 *   POST /v1/models/:modelId/chat   same, model taken from the path
 *   GET  /v1/health
 *   GET  /v1/models
 *   GET  /v1/info
 *
 * Every response carries X-Request-Id and X-Process-Time.
 */
import { randomUUID } from "node:crypto";
import type { Server } from "node:http";
import express, {
  type ErrorRequestHandler,
  type Express,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import { RateLimiter } from "../admission/rate-limiter.js";
import { AnthropicBackend, createAnthropicClient } from "../backend/anthropic.js";
import type { ModelBackend } from "../backend/types.js";
import type { GatewayConfig } from "../config/index.js";
import { invalidRequest, toGatewayError, type GatewayError } from "../errors/index.js";
import { mapError } from "../errors/mapper.js";
import { SseSink } from "../relay/sse.js";
import type { Logger } from "../shared/logger.js";
import { VERSION } from "../version.js";
import { ChatCompletionService } from "./service.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GatewayDeps {
  config: GatewayConfig;
  backend: ModelBackend;
  limiter: RateLimiter;
  logger: Logger;
  /** Clock override for tests. */
  now?: () => number;
}

export interface GatewayHandle {
  server: Server;
  /** Base URL the server listens on, e.g. http://127.0.0.1:8000 */
  url: string;
  close(): Promise<void>;
}

interface RequestState {
  requestId: string;
  startedAt: bigint;
  logger: Logger;
}

const SERVER_NAME = "chat-relay";
const REQUEST_ID_PATTERN = /^[\w.-]{1,128}$/;
const BODY_LIMIT = "10mb";

// ---------------------------------------------------------------------------
// Response helpers
// ---------------------------------------------------------------------------

const requestStates = new WeakMap<Response, RequestState>();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stampProcessTime(res: Response): void {
  const state = requestStates.get(res);
  if (!state || res.headersSent) return;
  const seconds = Number(process.hrtime.bigint() - state.startedAt) / 1e9;
  res.setHeader("X-Process-Time", seconds.toFixed(6));
}

function sendJson(res: Response, status: number, body: unknown): void {
  stampProcessTime(res);
  res.status(status).json(body);
}

function notFoundBody(req: Request): { error: { type: string; message: string; code: string } } {
  return {
    error: {
      type: "not_found",
      message: `Route ${req.method} ${req.path} not found`,
      code: "not_found",
    },
  };
}

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------

export function createApp(deps: GatewayDeps): Express {
  const { config, backend, limiter, logger } = deps;
  const now = deps.now ?? Date.now;
  const service = new ChatCompletionService({ limiter, backend, config, now });
  const createdAt = Math.floor(now() / 1000);

  const app = express();
  app.disable("x-powered-by");

  const stateOf = (res: Response): RequestState => {
    const state = requestStates.get(res);
    if (state) return state;
    const fallback: RequestState = {
      requestId: randomUUID(),
      startedAt: process.hrtime.bigint(),
      logger,
    };
    requestStates.set(res, fallback);
    return fallback;
  };

  const sendError = (res: Response, error: GatewayError): void => {
    const mapped = mapError(error);
    if (error.kind === "RateLimited") {
      res.setHeader("Retry-After", String(Math.max(1, Math.ceil(limiter.retryAfterMs() / 1000))));
    }
    sendJson(res, mapped.status, mapped.body);
  };

  // Request id, timing and access log.
  const requestContext: RequestHandler = (req, res, next) => {
    const incoming = req.get("x-request-id");
    const requestId = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : randomUUID();
    const startedAt = process.hrtime.bigint();
    const requestLogger = logger.child(
      { component: "gateway", requestId },
      { method: req.method, path: req.path },
    );
    requestStates.set(res, { requestId, startedAt, logger: requestLogger });
    res.setHeader("X-Request-Id", requestId);

    res.on("finish", () => {
      const ms = Number(process.hrtime.bigint() - startedAt) / 1e6;
      requestLogger.info("Request completed", {
        status: res.statusCode,
        durationMs: Math.round(ms * 10) / 10,
      });
    });
    next();
  };

  const corsHeaders: RequestHandler = (req, res, next) => {
    const origin = req.get("origin");
    if (config.cors.origins.includes("*")) {
      res.setHeader("Access-Control-Allow-Origin", "*");
    } else if (origin && config.cors.origins.includes(origin)) {
      res.setHeader("Access-Control-Allow-Origin", origin);
      res.setHeader("Vary", "Origin");
    }
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization, X-Request-Id");
    res.setHeader("Access-Control-Expose-Headers", "X-Request-Id, X-Process-Time, Retry-After");

    if (req.method === "OPTIONS") {
      stampProcessTime(res);
      res.status(204).end();
      return;
    }
    next();
  };

  app.use(requestContext);
  app.use(corsHeaders);
  app.use(express.json({ limit: BODY_LIMIT }));

  // -------------------------------------------------------------------------
  // Chat
  // -------------------------------------------------------------------------

  async function handleChat(body: unknown, res: Response, model?: string): Promise<void> {
    const { logger: requestLogger } = stateOf(res);
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const prepared = await service.prepare(body, { model, logger: requestLogger });

      if (prepared.request.stream) {
        const sink = new SseSink(res, { beforeHeaders: () => stampProcessTime(res) });
        const outcome = await service.stream(
          prepared,
          sink,
          controller.signal,
          requestLogger.child({ component: "relay" }),
        );
        requestLogger.debug("Stream finished", { state: outcome.state, events: outcome.events });
        return;
      }

      const completion = await service.complete(prepared, controller.signal);
      if (controller.signal.aborted) {
        requestLogger.info("Client disconnected before the response was sent");
        return;
      }
      sendJson(res, 200, completion);
    } catch (error: unknown) {
      const gatewayError = toGatewayError(error);
      if (controller.signal.aborted || gatewayError.kind === "ClientDisconnected") {
        requestLogger.info("Client disconnected; backend call cancelled");
        return;
      }
      const status = mapError(gatewayError).status;
      const fields = { kind: gatewayError.kind, status };
      if (status >= 500) requestLogger.error(gatewayError.message, fields);
      else requestLogger.warn(gatewayError.message, fields);
      sendError(res, gatewayError);
    }
  }

  app.post("/v1/chat/completions", (req: Request, res: Response, next: NextFunction) => {
    handleChat(req.body, res).catch(next);
  });

  app.post(
    "/v1/models/:modelId/chat",
    (req: Request<{ modelId: string }>, res: Response, next: NextFunction) => {
      handleChat(req.body, res, req.params.modelId).catch(next);
    },
  );

  // -------------------------------------------------------------------------
  // Metadata
  // -------------------------------------------------------------------------

  const contextInfo = () => ({
    preferred: config.context.preferredTokens,
    maximum: config.context.maxTokens,
  });

  app.get("/v1/health", (_req, res) => {
    sendJson(res, 200, {
      status: "ok",
      version: VERSION,
      backend: backend.name,
      rateLimit: {
        limit: config.rateLimit.requestsPerMinute,
        remaining: limiter.remaining(),
        windowMs: limiter.snapshot().windowMs,
      },
      context: contextInfo(),
    });
  });

  app.get("/v1/models", (_req, res) => {
    sendJson(res, 200, {
      object: "list",
      data: config.models.map((model) => ({
        id: model.id,
        object: "model",
        created: createdAt,
        owned_by: SERVER_NAME,
      })),
    });
  });

  app.get("/v1/info", (_req, res) => {
    sendJson(res, 200, {
      name: SERVER_NAME,
      version: VERSION,
      backend: backend.name,
      models: config.models.map((model) => model.id),
      context: contextInfo(),
      rateLimit: {
        enabled: config.rateLimit.enabled,
        requestsPerMinute: config.rateLimit.requestsPerMinute,
      },
      capabilities: ["text", "vision", "streaming"],
    });
  });

  // -------------------------------------------------------------------------
  // Fallbacks
  // -------------------------------------------------------------------------

  app.use((req, res) => {
    sendJson(res, 404, notFoundBody(req));
  });

  const handleError: ErrorRequestHandler = (err: unknown, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (isRecord(err) && err.type === "entity.parse.failed") {
      sendError(res, invalidRequest("Request body is not valid JSON"));
      return;
    }
    if (isRecord(err) && err.type === "entity.too.large") {
      sendError(res, invalidRequest(`Request body exceeds ${BODY_LIMIT}`));
      return;
    }
    const gatewayError = toGatewayError(err);
    stateOf(res).logger.error(`Unhandled error: ${gatewayError.message}`, {
      kind: gatewayError.kind,
    });
    sendError(res, gatewayError);
  };
  app.use(handleError);

  return app;
}

// ---------------------------------------------------------------------------
// Wiring
// ---------------------------------------------------------------------------

/** Build the production dependencies from config and an API key. */
export function createGatewayDeps(
  config: GatewayConfig,
  apiKey: string,
  logger: Logger,
): GatewayDeps {
  const client = createAnthropicClient({
    apiKey,
    baseURL: config.backend.baseUrl,
    maxRetries: config.backend.maxRetries,
    timeoutMs: config.backend.timeoutMs,
  });
  const limiter = new RateLimiter({
    limit: config.rateLimit.requestsPerMinute,
    enabled: config.rateLimit.enabled,
  });
  return { config, backend: new AnthropicBackend(client), limiter, logger };
}

/** Listen on host:port and resolve once the socket is bound. */
export function startGateway(
  app: Express,
  listen: { host: string; port: number },
): Promise<GatewayHandle> {
  return new Promise((resolve, reject) => {
    const server = app.listen(listen.port, listen.host);
    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : listen.port;
      const host = listen.host.includes(":") ? `[${listen.host}]` : listen.host;

      resolve({
        server,
        url: `http://${host}:${port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => (error ? fail(error) : done()));
            // Open SSE streams would otherwise keep close() pending.
            server.closeAllConnections();
          }),
      });
    });
  });
}

/**
 * Error taxonomy for the gateway.
 *
 * Every failure inside the request path is turned into a GatewayError whose
 * `kind` decides the caller-facing status code (see mapper.ts).
 */
import Anthropic from "@anthropic-ai/sdk";

export const ERROR_KINDS = [
  "RateLimited",
  "InvalidRequest",
  "InvalidModel",
  "UpstreamAuth",
  "UpstreamUnavailable",
  "UpstreamError",
  "Internal",
  "ClientDisconnected",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export interface GatewayErrorOptions {
  /** Request field the error refers to (e.g. "messages"). */
  param?: string;
  /** Underlying error, kept for logging. */
  cause?: unknown;
}

export class GatewayError extends Error {
  readonly kind: ErrorKind;
  readonly param: string | undefined;
  readonly cause: unknown;

  constructor(kind: ErrorKind, message: string, options: GatewayErrorOptions = {}) {
    super(message);
    this.name = "GatewayError";
    this.kind = kind;
    this.param = options.param;
    this.cause = options.cause;
  }
}

export function invalidRequest(message: string, param?: string): GatewayError {
  return new GatewayError("InvalidRequest", message, { param });
}

export function invalidModel(model: string): GatewayError {
  return new GatewayError("InvalidModel", `Model '${model}' not found`, { param: "model" });
}

export function rateLimited(): GatewayError {
  return new GatewayError("RateLimited", "Rate limit exceeded");
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

// Statuses the backend uses for overload and transient faults.
const TRANSIENT_STATUSES = new Set([408, 409, 429]);

/**
 * Classify anything thrown on the request path.
 *
 * Backend SDK errors are sorted into the upstream kinds; unknown errors
 * become Internal.
 */
export function toGatewayError(error: unknown): GatewayError {
  if (isGatewayError(error)) return error;

  // Connection errors extend APIError, so they are checked first.
  if (error instanceof Anthropic.APIUserAbortError) {
    return new GatewayError("ClientDisconnected", "Request aborted by client", { cause: error });
  }
  if (
    error instanceof Anthropic.APIConnectionTimeoutError ||
    error instanceof Anthropic.APIConnectionError
  ) {
    return new GatewayError("UpstreamUnavailable", `Backend unreachable: ${error.message}`, {
      cause: error,
    });
  }
  if (error instanceof Anthropic.APIError) {
    const status = error.status;
    if (status === 401 || status === 403) {
      return new GatewayError("UpstreamAuth", "Backend rejected the gateway credentials", {
        cause: error,
      });
    }
    if (status !== undefined && (TRANSIENT_STATUSES.has(status) || status >= 500)) {
      return new GatewayError("UpstreamUnavailable", `Backend unavailable (${status})`, {
        cause: error,
      });
    }
    return new GatewayError("UpstreamError", `Backend error: ${error.message}`, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new GatewayError("Internal", message, { cause: error });
}

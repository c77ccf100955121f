/**
 * Error mapper — converts gateway failures into caller-facing HTTP errors.
 *
 * The table is keyed by ErrorKind, so adding a kind without a mapping fails
 * to compile.
 */
import { redactCredentials } from "../security/credentials.js";
import { toGatewayError, type ErrorKind } from "./index.js";

export interface CallerErrorBody {
  error: {
    type: string;
    message: string;
    code: string;
    param?: string;
  };
}

export interface MappedError {
  status: number;
  body: CallerErrorBody;
}

interface ErrorMapping {
  status: number;
  type: string;
  code: string;
  /** Whether the internal message may be shown to the caller. */
  expose: boolean;
}

export const ERROR_TABLE = {
  RateLimited: { status: 429, type: "rate_limit_exceeded", code: "rate_limit", expose: true },
  InvalidRequest: {
    status: 400,
    type: "invalid_request_error",
    code: "invalid_request",
    expose: true,
  },
  InvalidModel: {
    status: 400,
    type: "invalid_request_error",
    code: "model_not_found",
    expose: true,
  },
  UpstreamAuth: { status: 502, type: "authentication_error", code: "upstream_auth", expose: true },
  UpstreamUnavailable: {
    status: 503,
    type: "service_unavailable",
    code: "upstream_unavailable",
    expose: true,
  },
  // Unclassified backend failure; only auth (502) and transient (503) faults differ.
  UpstreamError: { status: 500, type: "upstream_error", code: "upstream_error", expose: true },
  Internal: { status: 500, type: "server_error", code: "server_error", expose: false },
  // Never written to a caller: the connection is already gone.
  ClientDisconnected: {
    status: 499,
    type: "client_disconnected",
    code: "client_disconnected",
    expose: false,
  },
} satisfies Record<ErrorKind, ErrorMapping>;

const GENERIC_MESSAGE = "Internal server error";

export function mapError(error: unknown): MappedError {
  const gatewayError = toGatewayError(error);
  const mapping: ErrorMapping = ERROR_TABLE[gatewayError.kind];
  const message = mapping.expose ? redactCredentials(gatewayError.message) : GENERIC_MESSAGE;

  const body: CallerErrorBody = {
    error: {
      type: mapping.type,
      message,
      code: mapping.code,
      ...(gatewayError.param ? { param: gatewayError.param } : {}),
    },
  };

  return { status: mapping.status, body };
}

/**
 * Configuration for chat-relay.
 *
 * Loads ~/.chat-relay/config.yaml (or an explicit path), applies
 * CHAT_RELAY_* environment overrides and CLI overrides on top of the
 * defaults, then validates the result.
 *
 * Precedence: defaults < file < environment < CLI.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import type { LogLevel } from "../shared/types.js";
import { LOG_LEVELS } from "../shared/types.js";
import type { ModelRoute } from "../translate/request.js";

const STATE_DIRNAME = ".chat-relay";
const CONFIG_FILENAME = "config.yaml";

export class ConfigError extends Error {
  /** Dotted path of the offending field, e.g. "server.port". */
  readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message);
    this.name = "ConfigError";
    this.field = field;
  }
}

export interface GatewayConfig {
  server: { host: string; port: number };
  rateLimit: { enabled: boolean; requestsPerMinute: number };
  context: { preferredTokens: number; maxTokens: number };
  backend: {
    defaultMaxTokens: number;
    maxRetries: number;
    timeoutMs: number;
    baseUrl?: string;
  };
  models: ModelRoute[];
  cors: { origins: string[] };
  log: { level: LogLevel; file: boolean };
}

export interface ConfigOverrides {
  port?: number;
  host?: string;
}

export interface LoadConfigOptions {
  /** Explicit config file; a missing explicit file is an error. */
  path?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

export function defaultConfig(): GatewayConfig {
  return {
    server: { host: "127.0.0.1", port: 8000 },
    rateLimit: { enabled: true, requestsPerMinute: 150 },
    context: { preferredTokens: 200_000, maxTokens: 1_000_000 },
    backend: { defaultMaxTokens: 4096, maxRetries: 0, timeoutMs: 600_000 },
    models: [{ id: "claude-sonnet-4-5", backend: "claude-sonnet-4-5" }],
    cors: { origins: ["*"] },
    log: { level: "info", file: true },
  };
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.CHAT_RELAY_STATE_DIR?.trim();
  if (override) {
    if (override.includes("..")) {
      throw new ConfigError(
        `Invalid CHAT_RELAY_STATE_DIR '${override}': path must not contain '..' segments`,
      );
    }
    return path.resolve(override);
  }
  return path.join(os.homedir(), STATE_DIRNAME);
}

export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  stateDir: string = resolveStateDir(env),
): string {
  const override = env.CHAT_RELAY_CONFIG?.trim();
  return override ? path.resolve(override) : path.join(stateDir, CONFIG_FILENAME);
}

export function resolveLogDir(stateDir: string): string {
  return path.join(stateDir, "logs");
}

/**
 * Create the state directory with its logs/ and credentials/ subdirectories.
 *
 * The credentials directory is owner-only (0700).
 */
export function ensureStateDir(stateDir: string): void {
  fs.mkdirSync(resolveLogDir(stateDir), { recursive: true });
  const credentialsDir = path.join(stateDir, "credentials");
  fs.mkdirSync(credentialsDir, { recursive: true });
  fs.chmodSync(credentialsDir, 0o700);
}

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

type Section = Record<string, unknown>;

function isRecord(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Section, key: string): Section {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) throw new ConfigError(`${key} must be a mapping`, key);
  return value;
}

function readInt(value: unknown, field: string, fallback: number, min: number): number {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw new ConfigError(`${field} must be an integer >= ${min}`, field);
  }
  return value;
}

function readString(value: unknown, field: string, fallback: string): string {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`${field} must be a non-empty string`, field);
  }
  return value.trim();
}

function readBool(value: unknown, field: string, fallback: boolean): boolean {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "boolean") throw new ConfigError(`${field} must be true or false`, field);
  return value;
}

function readLogLevel(value: unknown, field: string, fallback: LogLevel): LogLevel {
  if (value === undefined || value === null) return fallback;
  const level = LOG_LEVELS.find((l) => l === value);
  if (!level) {
    throw new ConfigError(`${field} must be one of ${LOG_LEVELS.join(", ")}`, field);
  }
  return level;
}

function readModels(value: unknown, fallback: ModelRoute[]): ModelRoute[] {
  if (value === undefined || value === null) return fallback;
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError("models must be a non-empty list", "models");
  }
  return value.map((entry: unknown, i): ModelRoute => {
    const field = `models[${i}]`;
    if (typeof entry === "string") return { id: readString(entry, field, ""), backend: entry.trim() };
    if (!isRecord(entry)) throw new ConfigError(`${field} must be a string or mapping`, field);
    const id = readString(entry.id ?? null, `${field}.id`, "");
    if (!id) throw new ConfigError(`${field}.id is required`, `${field}.id`);
    return { id, backend: readString(entry.backend, `${field}.backend`, id) };
  });
}

function readOrigins(value: unknown, fallback: string[]): string[] {
  if (value === undefined || value === null) return fallback;
  if (!Array.isArray(value) || !value.every((o): o is string => typeof o === "string")) {
    throw new ConfigError("cors.origins must be a list of strings", "cors.origins");
  }
  return value;
}

/** Validate a parsed YAML document against the defaults. */
export function parseConfig(raw: unknown, base: GatewayConfig = defaultConfig()): GatewayConfig {
  if (raw === undefined || raw === null) return base;
  if (!isRecord(raw)) throw new ConfigError("config root must be a mapping");

  const server = section(raw, "server");
  const rateLimit = section(raw, "rateLimit");
  const context = section(raw, "context");
  const backend = section(raw, "backend");
  const cors = section(raw, "cors");
  const log = section(raw, "log");

  const baseUrl =
    backend.baseUrl === undefined
      ? base.backend.baseUrl
      : readString(backend.baseUrl, "backend.baseUrl", "");

  return {
    server: {
      host: readString(server.host, "server.host", base.server.host),
      port: readInt(server.port, "server.port", base.server.port, 0),
    },
    rateLimit: {
      enabled: readBool(rateLimit.enabled, "rateLimit.enabled", base.rateLimit.enabled),
      requestsPerMinute: readInt(
        rateLimit.requestsPerMinute,
        "rateLimit.requestsPerMinute",
        base.rateLimit.requestsPerMinute,
        1,
      ),
    },
    context: {
      preferredTokens: readInt(
        context.preferredTokens,
        "context.preferredTokens",
        base.context.preferredTokens,
        1,
      ),
      maxTokens: readInt(context.maxTokens, "context.maxTokens", base.context.maxTokens, 1),
    },
    backend: {
      defaultMaxTokens: readInt(
        backend.defaultMaxTokens,
        "backend.defaultMaxTokens",
        base.backend.defaultMaxTokens,
        1,
      ),
      maxRetries: readInt(backend.maxRetries, "backend.maxRetries", base.backend.maxRetries, 0),
      timeoutMs: readInt(backend.timeoutMs, "backend.timeoutMs", base.backend.timeoutMs, 1),
      ...(baseUrl ? { baseUrl } : {}),
    },
    models: readModels(raw.models, base.models),
    cors: { origins: readOrigins(cors.origins, base.cors.origins) },
    log: {
      level: readLogLevel(log.level, "log.level", base.log.level),
      file: readBool(log.file, "log.file", base.log.file),
    },
  };
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) throw new ConfigError(`${name} must be an integer`, name);
  return value;
}

function envBool(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return undefined;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigError(`${name} must be a boolean`, name);
}

/** Parse "id" or "id=backend" entries separated by commas. */
export function parseModelList(value: string): ModelRoute[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const [id = "", backend] = entry.split("=", 2).map((part) => part.trim());
      return { id, backend: backend || id };
    });
}

/** Environment overrides, expressed as a partial document for parseConfig. */
function envDocument(env: NodeJS.ProcessEnv): Section {
  const models = env.CHAT_RELAY_MODELS?.trim();
  return {
    server: { host: env.CHAT_RELAY_HOST?.trim() || undefined, port: envInt(env, "CHAT_RELAY_PORT") },
    rateLimit: {
      enabled: envBool(env, "CHAT_RELAY_RATE_LIMIT_ENABLED"),
      requestsPerMinute: envInt(env, "CHAT_RELAY_RATE_LIMIT_RPM"),
    },
    context: {
      preferredTokens: envInt(env, "CHAT_RELAY_PREFERRED_CONTEXT_TOKENS"),
      maxTokens: envInt(env, "CHAT_RELAY_MAX_CONTEXT_TOKENS"),
    },
    models: models ? parseModelList(models) : undefined,
    log: { level: env.CHAT_RELAY_LOG_LEVEL?.trim() || undefined },
  };
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

function readConfigFile(filePath: string, required: boolean): unknown {
  if (!fs.existsSync(filePath)) {
    if (required) throw new ConfigError(`Config file not found: ${filePath}`);
    return undefined;
  }
  const text = fs.readFileSync(filePath, "utf-8");
  try {
    return parseYaml(text);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML in ${filePath}: ${reason}`);
  }
}

export function loadConfig(options: LoadConfigOptions = {}): GatewayConfig {
  const env = options.env ?? process.env;
  const explicit = options.path ?? env.CHAT_RELAY_CONFIG?.trim();
  const filePath = explicit ? path.resolve(explicit) : resolveConfigPath(env);

  const fromFile = parseConfig(readConfigFile(filePath, Boolean(explicit)));
  const fromEnv = parseConfig(envDocument(env), fromFile);
  const config = parseConfig(
    { server: { host: options.overrides?.host, port: options.overrides?.port } },
    fromEnv,
  );

  if (config.context.preferredTokens > config.context.maxTokens) {
    throw new ConfigError(
      "context.preferredTokens must not exceed context.maxTokens",
      "context.preferredTokens",
    );
  }
  if (config.server.port > 65_535) {
    throw new ConfigError("server.port must be <= 65535", "server.port");
  }
  return config;
}

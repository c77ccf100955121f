/**
 * Structured logger for chat-relay.
 *
 * Every entry carries the emitting component, the request id and optional
 * key/value fields. Entries go to the console as one line, to a JSON-lines
 * file under <stateDir>/logs/ (one file per UTC day) and to an optional sink.
 * Messages and string fields are redacted before any output sees them.
 *
 * Console format: [component] (requestId) message key=value ...
 */
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import type { LogEntry, LogFieldValue, LogLevel } from "./types.js";
import { redactCredentials } from "../security/credentials.js";

export function sanitize(input: string): string {
  return redactCredentials(input);
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

/** Fields passed with a call; `undefined` values are dropped. */
export type LogFields = Readonly<Record<string, LogFieldValue | undefined>>;

/** Receives every emitted entry after redaction. */
export type LogSink = (entry: LogEntry) => void;

export interface LoggerContext {
  /** Emitting component (e.g. "gateway", "relay"). */
  component: string;
  /** Request identifier (X-Request-Id). */
  requestId: string;
}

export interface LoggerOptions {
  /** Minimum log level to emit. Defaults to "info". */
  level?: LogLevel;
  /** Directory for JSON log files. Defaults to ~/.chat-relay/logs/. */
  logDir?: string;
  /** Whether to write to file. Defaults to true. */
  fileOutput?: boolean;
  /** Whether to write to console. Defaults to true. */
  consoleOutput?: boolean;
  sink?: LogSink;
}

function compactFields(fields: LogFields): Record<string, LogFieldValue> {
  const out: Record<string, LogFieldValue> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) out[key] = typeof value === "string" ? sanitize(value) : value;
  }
  return out;
}

function formatFieldValue(value: LogFieldValue): string {
  if (typeof value !== "string") return String(value);
  return value === "" || /[\s"=]/.test(value) ? JSON.stringify(value) : value;
}

/** Render fields as `key=value` pairs in insertion order. */
function formatFields(fields: Readonly<Record<string, LogFieldValue>>): string {
  return Object.entries(fields)
    .map(([key, value]) => `${key}=${formatFieldValue(value)}`)
    .join(" ");
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly bound: Record<string, LogFieldValue>;
  private readonly options: Required<Omit<LoggerOptions, "sink">> & { sink?: LogSink };
  private readonly minLevel: number;
  private logDirReady = false;

  constructor(context: LoggerContext, options: LoggerOptions = {}, bound: LogFields = {}) {
    this.context = context;
    this.bound = compactFields(bound);
    this.options = {
      level: options.level ?? "info",
      logDir: options.logDir ?? path.join(os.homedir(), ".chat-relay", "logs"),
      fileOutput: options.fileOutput ?? true,
      consoleOutput: options.consoleOutput ?? true,
      sink: options.sink,
    };
    this.minLevel = LOG_LEVEL_PRIORITY[this.options.level];
  }

  fatal(msg: string, fields?: LogFields): void {
    this.log("fatal", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.log("error", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.log("warn", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.log("info", msg, fields);
  }

  debug(msg: string, fields?: LogFields): void {
    this.log("debug", msg, fields);
  }

  trace(msg: string, fields?: LogFields): void {
    this.log("trace", msg, fields);
  }

  private isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= this.minLevel;
  }

  /**
   * Create a child logger with an updated context. `fields` are bound to the
   * child and precede per-call fields on every entry.
   */
  child(overrides: Partial<LoggerContext>, fields: LogFields = {}): Logger {
    return new Logger({ ...this.context, ...overrides }, this.options, {
      ...this.bound,
      ...fields,
    });
  }

  private log(level: LogLevel, msg: string, fields: LogFields = {}): void {
    if (!this.isEnabled(level)) return;

    const merged = { ...this.bound, ...compactFields(fields) };
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      component: this.context.component,
      requestId: this.context.requestId,
      msg: sanitize(msg),
      ...(Object.keys(merged).length > 0 ? { fields: merged } : {}),
    };

    if (this.options.consoleOutput) this.writeConsole(entry);
    if (this.options.fileOutput) this.writeFile(entry);
    this.options.sink?.(entry);
  }

  private writeConsole(entry: LogEntry): void {
    const parts = [entry.component ? `[${entry.component}]` : "[chat-relay]"];
    if (entry.requestId) parts.push(`(${entry.requestId})`);
    parts.push(entry.msg);
    if (entry.fields) parts.push(formatFields(entry.fields));
    const line = parts.join(" ");

    if (entry.level === "fatal" || entry.level === "error") {
      console.error(line);
    } else if (entry.level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private writeFile(entry: LogEntry): void {
    try {
      if (!this.logDirReady) {
        fs.mkdirSync(this.options.logDir, { recursive: true });
        this.logDirReady = true;
      }
      const file = path.join(this.options.logDir, `chat-relay-${entry.ts.slice(0, 10)}.jsonl`);
      fs.appendFileSync(file, JSON.stringify(entry) + "\n");
    } catch (error: unknown) {
      if (this.options.consoleOutput) {
        console.error(
          `[chat-relay] log file write failed: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
  }
}

/** Create a logger with default context. */
export function createLogger(
  context: Partial<LoggerContext> = {},
  options: LoggerOptions = {},
): Logger {
  return new Logger(
    {
      component: context.component ?? "",
      requestId: context.requestId ?? "",
    },
    options,
  );
}

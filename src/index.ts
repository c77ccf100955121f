#!/usr/bin/env node
/**
 * chat-relay — OpenAI-compatible chat gateway.
 *
 * Main entry point: installs process-level error handlers and hands the
 * command line to Commander.
 */
import process from "node:process";
import { buildProgram } from "./cli/program.js";

function formatError(error: unknown): unknown {
  return error instanceof Error ? (error.stack ?? error.message) : error;
}

process.on("uncaughtException", (error) => {
  console.error("[chat-relay] Uncaught exception:", formatError(error));
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  console.error("[chat-relay] Unhandled rejection:", formatError(reason));
  process.exit(1);
});

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`[chat-relay] ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });

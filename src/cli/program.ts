/**
 * CLI program definition for chat-relay.
 *
 * Uses Commander to define the command structure:
 *   chat-relay serve [--port] [--host] [--config]
 *   chat-relay config [--config]
 */
import path from "node:path";
import { Command, InvalidArgumentError } from "commander";
import { stringify as stringifyYaml } from "yaml";
import { VERSION } from "../version.js";
import {
  ConfigError,
  ensureStateDir,
  loadConfig,
  resolveLogDir,
  resolveStateDir,
  type ConfigOverrides,
  type GatewayConfig,
} from "../config/index.js";
import { createApp, createGatewayDeps, startGateway, type GatewayHandle } from "../gateway/server.js";
import { getEnvVarName, loadCredential, resolveCredentialsDir } from "../security/credentials.js";
import { createLogger, type Logger } from "../shared/logger.js";

export interface ServeOptions {
  port?: number;
  host?: string;
  config?: string;
}

export interface ConfigCommandOptions {
  config?: string;
}

export interface RunningServer {
  handle: GatewayHandle;
  logger: Logger;
  config: GatewayConfig;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new InvalidArgumentError("must be an integer between 0 and 65535");
  }
  return port;
}

function toOverrides(opts: ServeOptions): ConfigOverrides {
  return { port: opts.port, host: opts.host };
}

/**
 * Load config and credentials, then start listening.
 *
 * Throws ConfigError when no API key is available.
 */
export async function runServe(
  opts: ServeOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<RunningServer> {
  const stateDir = resolveStateDir(env);
  ensureStateDir(stateDir);

  const config = loadConfig({ path: opts.config, env, overrides: toOverrides(opts) });
  const logger = createLogger(
    { component: "server" },
    { level: config.log.level, logDir: resolveLogDir(stateDir), fileOutput: config.log.file },
  );

  const credential = loadCredential("anthropic", stateDir, env);
  if (!credential) {
    const keyFile = path.join(resolveCredentialsDir(stateDir), "anthropic.key");
    throw new ConfigError(
      `No Anthropic API key found. Set ${getEnvVarName("anthropic")} or write it to ${keyFile}`,
    );
  }
  logger.debug("Loaded API key", { source: credential.source });

  const app = createApp(createGatewayDeps(config, credential.value, logger));
  const handle = await startGateway(app, config.server);

  logger.info(`chat-relay ${VERSION} listening on ${handle.url}`, {
    models: config.models.map((m) => m.id).join(","),
    rateLimit: config.rateLimit.enabled ? config.rateLimit.requestsPerMinute : "off",
  });
  return { handle, logger, config };
}

/** Resolved configuration as YAML, with the credential source but never the key. */
export function renderConfig(
  opts: ConfigCommandOptions,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const stateDir = resolveStateDir(env);
  const config = loadConfig({ path: opts.config, env });
  const credential = loadCredential("anthropic", stateDir, env);
  return stringifyYaml({
    ...config,
    credentials: { anthropic: credential?.source ?? "missing" },
  });
}

function installShutdown(running: RunningServer): void {
  const shutdown = (signal: NodeJS.Signals): void => {
    running.logger.info(`Received ${signal}, shutting down`);
    running.handle.close().then(
      () => process.exit(0),
      (error: unknown) => {
        running.logger.error(
          `Shutdown failed: ${error instanceof Error ? error.message : String(error)}`,
        );
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("chat-relay")
    .description("OpenAI-compatible chat completions gateway for the Anthropic Messages API")
    .version(VERSION);

  program
    .command("serve")
    .description("Start the HTTP gateway")
    .option("--port <number>", "port to listen on", parsePort)
    .option("--host <host>", "interface to bind")
    .option("--config <path>", "config file (default: ~/.chat-relay/config.yaml)")
    .action(async (opts: ServeOptions) => {
      installShutdown(await runServe(opts));
    });

  program
    .command("config")
    .description("Print the resolved configuration")
    .option("--config <path>", "config file (default: ~/.chat-relay/config.yaml)")
    .action((opts: ConfigCommandOptions) => {
      process.stdout.write(renderConfig(opts));
    });

  return program;
}

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  ConfigError,
  defaultConfig,
  ensureStateDir,
  loadConfig,
  parseConfig,
  parseModelList,
  resolveConfigPath,
  resolveStateDir,
} from "./index.js";

function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "chat-relay-config-test-"));
}

function rmrf(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

describe("resolveStateDir", () => {
  it("returns ~/.chat-relay by default", () => {
    expect(resolveStateDir({})).toBe(path.join(os.homedir(), ".chat-relay"));
  });

  it("respects CHAT_RELAY_STATE_DIR", () => {
    expect(resolveStateDir({ CHAT_RELAY_STATE_DIR: "/tmp/custom-state" })).toBe(
      "/tmp/custom-state",
    );
  });

  it("rejects traversal segments", () => {
    expect(() => resolveStateDir({ CHAT_RELAY_STATE_DIR: "/tmp/../etc" })).toThrow(ConfigError);
  });
});

describe("resolveConfigPath", () => {
  it("returns config.yaml inside the state dir", () => {
    expect(resolveConfigPath({}, "/tmp/test")).toBe("/tmp/test/config.yaml");
  });

  it("prefers CHAT_RELAY_CONFIG", () => {
    expect(resolveConfigPath({ CHAT_RELAY_CONFIG: "/etc/relay.yaml" }, "/tmp/test")).toBe(
      "/etc/relay.yaml",
    );
  });
});

describe("ensureStateDir", () => {
  let tmpDir: string;

  afterEach(() => {
    if (tmpDir) rmrf(tmpDir);
  });

  it("creates logs/ and an owner-only credentials/", () => {
    tmpDir = makeTmpDir();
    const stateDir = path.join(tmpDir, ".chat-relay");
    ensureStateDir(stateDir);

    expect(fs.existsSync(path.join(stateDir, "logs"))).toBe(true);
    expect(fs.statSync(path.join(stateDir, "credentials")).mode & 0o777).toBe(0o700);
  });

  it("is idempotent", () => {
    tmpDir = makeTmpDir();
    ensureStateDir(tmpDir);
    expect(() => ensureStateDir(tmpDir)).not.toThrow();
  });
});

describe("parseConfig", () => {
  it("returns the defaults for an empty document", () => {
    expect(parseConfig(null)).toEqual(defaultConfig());
  });

  it("merges partial sections over the defaults", () => {
    const config = parseConfig({ server: { port: 9000 }, rateLimit: { requestsPerMinute: 5 } });
    expect(config.server).toEqual({ host: "127.0.0.1", port: 9000 });
    expect(config.rateLimit).toEqual({ enabled: true, requestsPerMinute: 5 });
    expect(config.context).toEqual({ preferredTokens: 200_000, maxTokens: 1_000_000 });
  });

  it("defaults a model's backend identifier to its id", () => {
    const config = parseConfig({
      models: ["gpt-4o", { id: "fast", backend: "claude-haiku-4-5" }, { id: "plain" }],
    });
    expect(config.models).toEqual([
      { id: "gpt-4o", backend: "gpt-4o" },
      { id: "fast", backend: "claude-haiku-4-5" },
      { id: "plain", backend: "plain" },
    ]);
  });

  it("names the offending field", () => {
    try {
      parseConfig({ server: { port: "eighty" } });
      expect.unreachable();
    } catch (error: unknown) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError ? error.field : undefined).toBe("server.port");
    }
  });

  it("rejects an unknown log level", () => {
    expect(() => parseConfig({ log: { level: "verbose" } })).toThrow(
      "log.level must be one of fatal, error, warn, info, debug, trace",
    );
  });

  it("rejects an empty model list", () => {
    expect(() => parseConfig({ models: [] })).toThrow("models must be a non-empty list");
  });

  it("rejects a non-mapping root", () => {
    expect(() => parseConfig(["a"])).toThrow("config root must be a mapping");
  });
});

describe("parseModelList", () => {
  it("splits ids and backend identifiers", () => {
    expect(parseModelList("gpt-4o=claude-sonnet-4-5, claude-haiku-4-5 ,")).toEqual([
      { id: "gpt-4o", backend: "claude-sonnet-4-5" },
      { id: "claude-haiku-4-5", backend: "claude-haiku-4-5" },
    ]);
  });
});

describe("loadConfig", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTmpDir();
  });

  afterEach(() => {
    rmrf(tmpDir);
  });

  function writeConfig(text: string): string {
    const file = path.join(tmpDir, "config.yaml");
    fs.writeFileSync(file, text);
    return file;
  }

  it("uses the defaults when the state dir has no config file", () => {
    expect(loadConfig({ env: { CHAT_RELAY_STATE_DIR: tmpDir } })).toEqual(defaultConfig());
  });

  it("reads config.yaml from the state dir", () => {
    writeConfig("server:\n  port: 8100\nlog:\n  file: false\n");
    const config = loadConfig({ env: { CHAT_RELAY_STATE_DIR: tmpDir } });
    expect(config.server.port).toBe(8100);
    expect(config.log.file).toBe(false);
  });

  it("applies defaults < file < env < CLI", () => {
    const file = writeConfig(
      "server:\n  host: 0.0.0.0\n  port: 8100\nrateLimit:\n  requestsPerMinute: 20\n",
    );
    const config = loadConfig({
      path: file,
      env: { CHAT_RELAY_PORT: "8200", CHAT_RELAY_RATE_LIMIT_RPM: "30" },
      overrides: { port: 8300 },
    });

    expect(config.server).toEqual({ host: "0.0.0.0", port: 8300 });
    expect(config.rateLimit.requestsPerMinute).toBe(30);
  });

  it("reads every environment override", () => {
    const config = loadConfig({
      env: {
        CHAT_RELAY_STATE_DIR: tmpDir,
        CHAT_RELAY_HOST: "0.0.0.0",
        CHAT_RELAY_RATE_LIMIT_ENABLED: "false",
        CHAT_RELAY_PREFERRED_CONTEXT_TOKENS: "1000",
        CHAT_RELAY_MAX_CONTEXT_TOKENS: "2000",
        CHAT_RELAY_MODELS: "gpt-4o=claude-sonnet-4-5",
        CHAT_RELAY_LOG_LEVEL: "debug",
      },
    });

    expect(config.server.host).toBe("0.0.0.0");
    expect(config.rateLimit.enabled).toBe(false);
    expect(config.context).toEqual({ preferredTokens: 1000, maxTokens: 2000 });
    expect(config.models).toEqual([{ id: "gpt-4o", backend: "claude-sonnet-4-5" }]);
    expect(config.log.level).toBe("debug");
  });

  it("takes the file from CHAT_RELAY_CONFIG", () => {
    const file = writeConfig("backend:\n  baseUrl: http://localhost:9999\n");
    const config = loadConfig({ env: { CHAT_RELAY_CONFIG: file } });
    expect(config.backend.baseUrl).toBe("http://localhost:9999");
  });

  it("fails when an explicit file is missing", () => {
    expect(() => loadConfig({ path: path.join(tmpDir, "missing.yaml"), env: {} })).toThrow(
      "Config file not found",
    );
  });

  it("fails on malformed YAML", () => {
    const file = writeConfig("server: [unclosed\n");
    expect(() => loadConfig({ path: file, env: {} })).toThrow(ConfigError);
  });

  it("rejects a preferred size above the maximum", () => {
    expect(() =>
      loadConfig({
        env: {
          CHAT_RELAY_STATE_DIR: tmpDir,
          CHAT_RELAY_PREFERRED_CONTEXT_TOKENS: "5000",
          CHAT_RELAY_MAX_CONTEXT_TOKENS: "100",
        },
      }),
    ).toThrow("context.preferredTokens must not exceed context.maxTokens");
  });

  it("rejects a non-numeric port in the environment", () => {
    expect(() =>
      loadConfig({ env: { CHAT_RELAY_STATE_DIR: tmpDir, CHAT_RELAY_PORT: "http" } }),
    ).toThrow("CHAT_RELAY_PORT must be an integer");
  });
});

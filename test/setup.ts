/**
 * Global test setup.
 *
 * Keeps every test away from the real ~/.chat-relay directory and from any
 * API key present in the developer's shell.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeEach } from "vitest";

const stateDir = fs.mkdtempSync(path.join(os.tmpdir(), "chat-relay-test-state-"));

beforeEach(() => {
  process.env.CHAT_RELAY_STATE_DIR = stateDir;
  delete process.env.ANTHROPIC_API_KEY;
  delete process.env.CHAT_RELAY_CONFIG;
});

afterAll(() => {
  fs.rmSync(stateDir, { recursive: true, force: true });
});

/**
 * Credential lookup for the backend API key.
 *
 * Priority: environment variable > credential file in
 * <stateDir>/credentials/. Keys never reach log files or caller-facing error
 * bodies: both go through redactCredentials().
 */

import fs from "node:fs";
import path from "node:path";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CredentialKey = "anthropic";

export interface CredentialSource {
  /** Where the value came from. */
  source: "env" | "file";
  /** The credential itself. */
  value: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const CREDENTIALS_DIRNAME = "credentials";

const ENV_VAR_MAP: Record<CredentialKey, string> = {
  anthropic: "ANTHROPIC_API_KEY",
};

const FILE_MAP: Record<CredentialKey, string> = {
  anthropic: "anthropic.key",
};

/**
 * Redact credential values from a string.
 *
 * Replaces key=value pairs, Anthropic keys and bearer tokens with
 * ***REDACTED***.
 */
export function redactCredentials(input: string): string {
  let result = input.replace(
    /(api.?key|token|password|secret|credential)[=:]\s*\S+/gi,
    "$1=***REDACTED***",
  );
  result = result.replace(/sk-ant-[A-Za-z0-9_-]+/g, "***REDACTED***");
  result = result.replace(/Bearer\s+[A-Za-z0-9._-]+/g, "Bearer ***REDACTED***");
  return result;
}

export function resolveCredentialsDir(stateDir: string): string {
  return path.join(stateDir, CREDENTIALS_DIRNAME);
}

export function getEnvVarName(key: CredentialKey): string {
  return ENV_VAR_MAP[key];
}

/**
 * Load a credential from the environment or the state directory.
 *
 * Returns null when neither source has a non-empty value.
 */
export function loadCredential(
  key: CredentialKey,
  stateDir: string,
  env: NodeJS.ProcessEnv = process.env,
): CredentialSource | null {
  const envValue = env[ENV_VAR_MAP[key]]?.trim();
  if (envValue) return { source: "env", value: envValue };

  const filePath = path.join(resolveCredentialsDir(stateDir), FILE_MAP[key]);
  if (!fs.existsSync(filePath)) return null;

  const fileValue = fs.readFileSync(filePath, "utf-8").trim();
  return fileValue ? { source: "file", value: fileValue } : null;
}

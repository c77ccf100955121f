import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const PACKAGE_NAME = "chat-relay";

/** Source runs from src/, the build from dist/src/. */
const SEARCH_DEPTH = 3;

/** Walk up from this module to the package.json that names chat-relay. */
export function findPackageVersion(startDir: string): string | null {
  let dir = startDir;
  for (let depth = 0; depth <= SEARCH_DEPTH; depth++) {
    const candidate = path.join(dir, "package.json");
    if (fs.existsSync(candidate)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(candidate, "utf-8"));
      if (
        typeof parsed === "object" &&
        parsed !== null &&
        "name" in parsed &&
        parsed.name === PACKAGE_NAME &&
        "version" in parsed &&
        typeof parsed.version === "string" &&
        parsed.version.trim() !== ""
      ) {
        return parsed.version.trim();
      }
    }
    dir = path.dirname(dir);
  }
  return null;
}

export const VERSION =
  findPackageVersion(path.dirname(fileURLToPath(import.meta.url))) ?? "0.0.0";

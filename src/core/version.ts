/**
 * Version information for the CLI, read from package.json.
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const moduleDir = dirname(fileURLToPath(import.meta.url));

let cachedVersion: string | null = null;

function readVersionAt(path: string): string | null {
  try {
    const pkg: unknown = JSON.parse(readFileSync(path, "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg) {
      return typeof pkg.version === "string" ? pkg.version : null;
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Current version, cached after the first lookup.
 *
 * Compiled: dist/core/version.js -> ../../package.json
 * Source:   src/core/version.ts  -> ../../package.json
 */
export function getVersion(): string {
  if (cachedVersion) return cachedVersion;

  const version = readVersionAt(join(moduleDir, "..", "..", "package.json"));
  if (version) {
    cachedVersion = version;
    return version;
  }

  return "unknown";
}

/**
 * Coverage report loading: format detection and repository-relative paths.
 */

import { readFile } from "node:fs/promises";
import { basename, extname, isAbsolute, relative, resolve, sep } from "node:path";
import { CoverageReportError } from "../core/errors.js";
import { normalizePath } from "../core/sorting.js";
import type { CoverageFormat, CoverageGapSet } from "../core/types.js";
import { parseCobertura } from "./cobertura.js";
import { parseLcov } from "./lcov.js";
import type { ParsedCoverage } from "./types.js";

export { parseCobertura } from "./cobertura.js";
export { parseLcov } from "./lcov.js";
export type { ParsedCoverage } from "./types.js";

/**
 * Pick a format from the file name, then from the content.
 */
export function detectCoverageFormat(
  filePath: string,
  content: string
): CoverageFormat | null {
  const ext = extname(filePath).toLowerCase();
  const name = basename(filePath).toLowerCase();

  if (ext === ".info" || name.includes("lcov")) return "lcov";
  if (ext === ".xml") return "cobertura";

  const head = content.trimStart();
  if (head.startsWith("<")) return "cobertura";
  if (/^(TN|SF):/m.test(head)) return "lcov";
  return null;
}

function isInside(root: string, candidate: string): boolean {
  const rel = relative(root, candidate);
  return rel !== "" && !rel.startsWith("..") && !isAbsolute(rel);
}

/**
 * Map a report path onto the repository.
 *
 * Absolute paths inside `repoRoot` become relative; relative paths are tried
 * against each declared source root first and kept as written otherwise.
 */
export function toRepoPath(
  reportPath: string,
  repoRoot: string,
  sourceRoots: readonly string[] = []
): string {
  const root = resolve(repoRoot);

  if (isAbsolute(reportPath)) {
    const absolute = resolve(reportPath);
    return isInside(root, absolute)
      ? normalizePath(relative(root, absolute).split(sep).join("/"))
      : normalizePath(reportPath);
  }

  for (const sourceRoot of sourceRoots) {
    const candidate = resolve(root, sourceRoot, reportPath);
    if (isInside(root, candidate)) {
      return normalizePath(relative(root, candidate).split(sep).join("/"));
    }
  }

  return normalizePath(reportPath);
}

/**
 * Re-key parsed gaps by repository-relative path, merging collisions.
 */
export function relativizeGaps(
  parsed: ParsedCoverage,
  repoRoot: string
): Map<string, number[]> {
  const merged = new Map<string, Set<number>>();
  for (const [path, lines] of parsed.gaps) {
    const key = toRepoPath(path, repoRoot, parsed.sourceRoots);
    let set = merged.get(key);
    if (!set) {
      set = new Set();
      merged.set(key, set);
    }
    for (const line of lines) set.add(line);
  }

  const result = new Map<string, number[]>();
  for (const [path, set] of merged) {
    result.set(path, [...set].sort((a, b) => a - b));
  }
  return result;
}

export interface LoadCoverageOptions {
  repoRoot: string;
  format?: CoverageFormat | "auto";
}

/**
 * Read a coverage report and return its gaps keyed by repository path.
 */
export async function loadCoverageGaps(
  filePath: string,
  options: LoadCoverageOptions
): Promise<CoverageGapSet> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new CoverageReportError(
      filePath,
      error instanceof Error ? error.message : String(error)
    );
  }

  const requested = options.format ?? "auto";
  const format =
    requested === "auto" ? detectCoverageFormat(filePath, content) : requested;
  if (!format) {
    throw new CoverageReportError(filePath, "unrecognized coverage format");
  }

  let parsed: ParsedCoverage;
  try {
    parsed = format === "lcov" ? parseLcov(content) : parseCobertura(content);
  } catch (error) {
    throw new CoverageReportError(
      filePath,
      error instanceof Error ? error.message : String(error)
    );
  }

  return relativizeGaps(parsed, options.repoRoot);
}

/**
 * Path filtering: generated files and user include/exclude globs.
 */

import picomatch from "picomatch";
import { normalizePath } from "./sorting.js";
import type { CoverageGapSet } from "./types.js";

// Build output, dependencies and generated files never carry useful blame
const EXCLUDED_PATTERNS: RegExp[] = [
  /^dist\//,
  /^build\//,
  /^out\//,
  /^coverage\//,
  /^node_modules\//,
  /^vendor\//,
  /\.map$/,
  /\.d\.ts$/,
  /\.min\.(js|css)$/,
];

/**
 * Check if a file path should be excluded from analysis.
 */
export function shouldExcludeFile(path: string): boolean {
  return EXCLUDED_PATTERNS.some((pattern) => pattern.test(path));
}

export interface PathFilterOptions {
  include?: string[];
  exclude?: string[];
}

/**
 * Build a predicate accepting paths that survive the built-in exclusions,
 * match at least one include glob (when any are given) and no exclude glob.
 */
export function createPathFilter(
  options: PathFilterOptions = {}
): (path: string) => boolean {
  const includes = (options.include ?? []).map((p) => picomatch(p, { dot: true }));
  const excludes = (options.exclude ?? []).map((p) => picomatch(p, { dot: true }));

  return (path: string) => {
    if (shouldExcludeFile(path)) return false;
    if (includes.length > 0 && !includes.some((m) => m(path))) return false;
    return !excludes.some((m) => m(path));
  };
}

/**
 * Normalize gap-set paths and drop filtered files. Line lists come out
 * ascending and de-duplicated; entries sharing a normalized path are joined.
 */
export function filterGapSet(
  gaps: CoverageGapSet,
  accept: (path: string) => boolean
): Map<string, number[]> {
  const merged = new Map<string, Set<number>>();

  for (const [rawPath, lines] of gaps) {
    const path = normalizePath(rawPath);
    if (!accept(path)) continue;

    let set = merged.get(path);
    if (!set) {
      set = new Set();
      merged.set(path, set);
    }
    for (const line of lines) {
      if (Number.isInteger(line) && line >= 1) set.add(line);
    }
  }

  const result = new Map<string, number[]>();
  for (const [path, set] of merged) {
    result.set(path, [...set].sort((a, b) => a - b));
  }
  return result;
}

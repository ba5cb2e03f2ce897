/**
 * Sorting utilities for deterministic output ordering.
 */

import type { CommitInfo, FileAnalysis, LineChange } from "./types.js";

/**
 * Normalize a coverage or diff path to the repository-relative form used as
 * index key: forward slashes, no leading "./".
 */
export function normalizePath(path: string): string {
  let normalized = path.replace(/\\/g, "/");
  while (normalized.startsWith("./")) {
    normalized = normalized.slice(2);
  }
  return normalized;
}

/**
 * Compare two paths by code unit, independent of locale.
 */
export function comparePaths(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Order commits by recency. Negative when `a` is more recent than `b`.
 *
 * Order: timestamp desc, orderIndex asc, id desc.
 * Distinct commits never compare equal, which keeps every merge built on
 * this comparator independent of the order its inputs arrive in.
 */
export function compareRecency(
  a: Readonly<CommitInfo>,
  b: Readonly<CommitInfo>
): number {
  if (a.timestamp !== b.timestamp) {
    return b.timestamp - a.timestamp;
  }
  if (a.orderIndex !== b.orderIndex) {
    return a.orderIndex - b.orderIndex;
  }
  return comparePaths(b.id, a.id);
}

export function isMoreRecent(
  candidate: Readonly<CommitInfo>,
  current: Readonly<CommitInfo>
): boolean {
  return compareRecency(candidate, current) < 0;
}

/**
 * Pick the most recent change from a non-empty list.
 */
export function mostRecentChange(changes: readonly LineChange[]): LineChange | undefined {
  let best: LineChange | undefined;
  for (const change of changes) {
    if (!best || isMoreRecent(change.commit, best.commit)) {
      best = change;
    }
  }
  return best;
}

/**
 * Sort file analyses for "top culprits" reporting.
 * Order: culpritLines desc, file asc
 */
export function sortFileAnalyses(files: FileAnalysis[]): FileAnalysis[] {
  return [...files].sort((a, b) => {
    const countCompare = b.culpritLines - a.culpritLines;
    if (countCompare !== 0) return countCompare;
    return comparePaths(a.file, b.file);
  });
}

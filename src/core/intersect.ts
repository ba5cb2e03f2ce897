/**
 * Intersector: coverage gaps ∩ recently changed lines.
 */

import type { ChangeIndex } from "./change-index.js";
import { comparePaths } from "./sorting.js";
import type { CoverageGapSet, UncoveredChangedLine } from "./types.js";

/**
 * For every file present in both inputs, the gap lines that also have an
 * index entry, ascending and annotated with their attributing change.
 *
 * Gaps without an index entry are dropped (uncovered but not recently
 * changed). Files only present in the index are never surfaced. Files with
 * no culprit lines are omitted from the result.
 */
export function intersectCoverage(
  gaps: CoverageGapSet,
  index: ChangeIndex
): Map<string, UncoveredChangedLine[]> {
  const result = new Map<string, UncoveredChangedLine[]>();
  const files = [...gaps.keys()].sort(comparePaths);

  for (const file of files) {
    const lines = gaps.get(file) ?? [];
    const matched: UncoveredChangedLine[] = [];
    const seen = new Set<number>();

    for (const line of lines) {
      if (seen.has(line)) continue;
      seen.add(line);
      const change = index.get(file, line);
      if (change) {
        matched.push({ file, line, change });
      }
    }

    if (matched.length > 0) {
      matched.sort((a, b) => a.line - b.line);
      result.set(file, matched);
    }
  }

  return result;
}

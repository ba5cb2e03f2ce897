/**
 * ResultAssembler: per-file groups → FileAnalysis → Analysis.
 */

import { sortFileAnalyses } from "./sorting.js";
import type {
  Analysis,
  AnalysisParameters,
  BlameGroup,
  CoverageGapSet,
  FileAnalysis,
  ScanSummary,
} from "./types.js";

/**
 * `part / whole × 100`, or 0 when there is nothing to divide by.
 */
export function culpritPercentage(part: number, whole: number): number {
  if (whole === 0) return 0;
  return (part / whole) * 100;
}

/**
 * Count gap lines across the whole set.
 */
export function countGapLines(gaps: CoverageGapSet): number {
  let total = 0;
  for (const lines of gaps.values()) {
    total += new Set(lines).size;
  }
  return total;
}

export function buildFileAnalysis(
  file: string,
  uncoveredLines: number,
  groups: BlameGroup[]
): FileAnalysis {
  const culpritLines = groups.reduce((sum, g) => sum + g.lines.length, 0);
  return {
    file,
    uncoveredLines,
    culpritLines,
    culpritPercentage: culpritPercentage(culpritLines, uncoveredLines),
    groups,
  };
}

export interface AssembleInput {
  gaps: CoverageGapSet;
  groupsByFile: ReadonlyMap<string, BlameGroup[]>;
  parameters: AnalysisParameters;
  scan: ScanSummary;
  analyzedAt: string;
}

/**
 * Build the repository-level Analysis. Files without groups are left out;
 * the rest are ordered by culprit count desc, then path asc.
 */
export function assembleAnalysis(input: AssembleInput): Analysis {
  const { gaps, groupsByFile } = input;

  const files: FileAnalysis[] = [];
  for (const [file, groups] of groupsByFile) {
    if (groups.length === 0) continue;
    const uncovered = new Set(gaps.get(file) ?? []).size;
    files.push(buildFileAnalysis(file, uncovered, groups));
  }

  const totalUncoveredLines = countGapLines(gaps);
  const totalCulpritLines = files.reduce((sum, f) => sum + f.culpritLines, 0);

  return {
    analyzedAt: input.analyzedAt,
    totalUncoveredLines,
    totalCulpritLines,
    culpritPercentage: culpritPercentage(totalCulpritLines, totalUncoveredLines),
    files: sortFileAnalyses(files),
    parameters: input.parameters,
    scan: input.scan,
  };
}

/**
 * Files with the most culprit lines first.
 */
export function getTopCulprits(analysis: Analysis, limit = 10): FileAnalysis[] {
  return analysis.files.slice(0, Math.max(0, limit));
}

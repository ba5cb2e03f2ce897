/**
 * Analysis pipeline: scan → merge → intersect → group → assemble.
 *
 * Commit extraction is the only parallel stage. Everything after the scan
 * works on the merged ChangeIndex, so the resulting Analysis is the same for
 * any worker count or completion order.
 */

import { assembleAnalysis } from "./assembler.js";
import { ChangeIndex } from "./change-index.js";
import { resolveAnalysisOptions, type AnalysisOptionsInput } from "./config.js";
import { BackendAccessError } from "./errors.js";
import { createPathFilter, filterGapSet } from "./filters.js";
import { groupFileLines } from "./grouper.js";
import { intersectCoverage } from "./intersect.js";
import * as logger from "./logger.js";
import { lookbackWindow, scanCommits } from "./scanner.js";
import { compareRecency, comparePaths } from "./sorting.js";
import type {
  Analysis,
  AnalysisProgress,
  BlameGroup,
  CommitBatch,
  CoverageGapSet,
  ScanResult,
  ScanSummary,
  VcsSource,
} from "./types.js";

export interface RunAnalysisOptions extends AnalysisOptionsInput {
  onProgress?: (progress: AnalysisProgress) => void;
}

function toIso(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString();
}

function summarizeScan(scan: ScanResult, missingAtHead: string[]): ScanSummary {
  const ordered: CommitBatch[] = [...scan.batches].sort((a, b) =>
    compareRecency(a.commit, b.commit)
  );

  return {
    commitsScanned: scan.commitsTotal,
    commitsFailed: scan.failures.length,
    failures: [...scan.failures].sort((a, b) => comparePaths(a.commitId, b.commitId)),
    warnings: ordered.flatMap((batch) =>
      batch.warnings.map((w) => ({ ...w, commitId: batch.commit.id }))
    ),
    missingAtHead: [...missingAtHead].sort(comparePaths),
  };
}

async function readHeadContent(
  source: VcsSource,
  files: string[]
): Promise<Map<string, string>> {
  if (files.length === 0) return new Map();
  try {
    return await source.readHeadFiles(files);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    logger.warn(new BackendAccessError("files at HEAD", detail).message);
    return new Map();
  }
}

/**
 * Run one complete analysis against `source` for the given coverage gaps.
 *
 * Throws only when the backend is unusable as a whole (checked before any
 * commit is dispatched). Failed commits and files missing at HEAD are
 * excluded and reported in `analysis.scan`.
 */
export async function runAnalysis(
  source: VcsSource,
  gaps: CoverageGapSet,
  input: RunAnalysisOptions = {}
): Promise<Analysis> {
  const options = resolveAnalysisOptions(input);
  const { onProgress } = input;

  await source.verify();

  const window = lookbackWindow(options.now, options.days);
  const scan = await scanCommits(source, window, {
    workers: options.workers,
    taskTimeoutMs: options.taskTimeoutMs,
    onProgress: (p) => onProgress?.({ stage: "scan", ...p }),
  });

  const index = ChangeIndex.fromBatches(scan.batches);
  logger.debug(
    `Change index holds ${index.size} lines across ${index.files().length} files`
  );

  const filteredGaps = filterGapSet(gaps, createPathFilter(options));
  const intersection = intersectCoverage(filteredGaps, index);
  const culpritFiles = [...intersection.keys()];
  const headContent = await readHeadContent(source, culpritFiles);

  const groupsByFile = new Map<string, BlameGroup[]>();
  const missingAtHead: string[] = [];

  for (const file of culpritFiles) {
    const content = headContent.get(file);
    if (content === undefined) {
      missingAtHead.push(file);
      logger.warn(new BackendAccessError(file, "not present at HEAD").message);
      continue;
    }
    groupsByFile.set(
      file,
      groupFileLines(file, intersection.get(file) ?? [], content, options.context)
    );
  }

  onProgress?.({ stage: "group", filesWithCulprits: groupsByFile.size });

  return assembleAnalysis({
    gaps: filteredGaps,
    groupsByFile,
    parameters: {
      days: options.days,
      workers: options.workers,
      context: options.context,
      since: toIso(window.since),
      until: toIso(window.until),
    },
    scan: summarizeScan(scan, missingAtHead),
    analyzedAt: options.now.toISOString(),
  });
}

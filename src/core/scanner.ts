/**
 * CommitScanner: enumerate commits in the lookback window and extract their
 * changed lines on a bounded worker pool.
 */

import { buildCommitBatch } from "../git/parser.js";
import {
  BackendAccessError,
  GitCommandError,
  TaskTimeoutError,
} from "./errors.js";
import * as logger from "./logger.js";
import { runPool, withTimeout } from "./pool.js";
import type {
  CommitBatch,
  CommitInfo,
  LookbackWindow,
  ScanProgress,
  ScanResult,
  TaskFailure,
  TaskFailureKind,
  VcsSource,
} from "./types.js";

export interface ScanOptions {
  workers: number;
  taskTimeoutMs: number;
  onProgress?: (progress: ScanProgress) => void;
}

type TaskOutcome =
  | { ok: true; batch: CommitBatch }
  | { ok: false; failure: TaskFailure };

/**
 * Build the window `[now - days, now]` in epoch seconds.
 */
export function lookbackWindow(now: Date, days: number): LookbackWindow {
  const until = Math.floor(now.getTime() / 1000);
  return { since: until - days * 86_400, until };
}

function classifyFailure(error: unknown): TaskFailureKind {
  if (error instanceof TaskTimeoutError) return "timeout";
  if (error instanceof BackendAccessError || error instanceof GitCommandError) {
    return "backend";
  }
  return "unknown";
}

async function processCommit(
  source: VcsSource,
  commit: CommitInfo,
  taskTimeoutMs: number
): Promise<TaskOutcome> {
  try {
    const diffText = await withTimeout(commit.id, taskTimeoutMs, (signal) =>
      source.getCommitDiff(commit, { signal })
    );
    const batch = buildCommitBatch(commit, diffText);
    logger.debug(
      `${commit.shortId}: ${batch.changes.length} changed lines, ${batch.warnings.length} warnings`
    );
    return { ok: true, batch };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      failure: {
        commitId: commit.id,
        shortId: commit.shortId,
        kind: classifyFailure(error),
        message,
      },
    };
  }
}

/**
 * Scan every commit inside `window`.
 *
 * Per-commit failures are recorded and never cancel sibling tasks. Only a
 * failure to enumerate commits propagates. Batches are returned in
 * completion order; ChangeIndex makes that order irrelevant.
 */
export async function scanCommits(
  source: VcsSource,
  window: LookbackWindow,
  options: ScanOptions
): Promise<ScanResult> {
  const listed = await source.listCommits(window);
  const commits = listed.filter(
    (c) => c.timestamp >= window.since && c.timestamp <= window.until
  );

  if (commits.length === 0) {
    return { batches: [], failures: [], commitsTotal: 0 };
  }

  logger.debug(
    `Scanning ${commits.length} commits with ${options.workers} workers`
  );

  const batches: CommitBatch[] = [];
  const failures: TaskFailure[] = [];
  let processed = 0;

  await runPool(
    commits,
    options.workers,
    (commit) => processCommit(source, commit, options.taskTimeoutMs),
    (outcome, index) => {
      processed++;
      if (outcome.ok) {
        batches.push(outcome.batch);
      } else {
        failures.push(outcome.failure);
        logger.warn(
          `Skipping commit ${outcome.failure.shortId} (${outcome.failure.kind}): ${outcome.failure.message}`
        );
      }
      options.onProgress?.({
        processed,
        total: commits.length,
        failed: failures.length,
        commitId: commits[index]?.id ?? "",
      });
    }
  );

  return { batches, failures, commitsTotal: commits.length };
}

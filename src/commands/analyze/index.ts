/**
 * analyze command - coverage report + git history -> rendered blame report.
 */

import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { runAnalysis } from "../../core/analysis-runner.js";
import * as logger from "../../core/logger.js";
import type {
  Analysis,
  CoverageFormat,
  RenderFormat,
  VcsSource,
} from "../../core/types.js";
import { loadCoverageGaps } from "../../coverage/index.js";
import { GitBackend } from "../../git/collector.js";
import { renderJson, renderTerminal } from "../../render/index.js";

export interface AnalyzeCommandOptions {
  coverage: string;
  repo: string;
  days?: string;
  workers?: string;
  context?: string;
  timeout?: string;
  include?: string[];
  exclude?: string[];
  coverageFormat: CoverageFormat | "auto";
  format: RenderFormat;
  output?: string;
  top: number;
  /** Backend to analyze; a GitBackend on `repo` when omitted */
  source?: VcsSource;
}

export interface AnalyzeCommandResult {
  analysis: Analysis;
  rendered: string;
}

/**
 * Execute the analyze command and return the rendered report.
 * Writes the report to `output` when one is given.
 */
export async function executeAnalyze(
  options: AnalyzeCommandOptions
): Promise<AnalyzeCommandResult> {
  const repoRoot = resolve(options.repo);
  const backend = options.source ?? new GitBackend({ cwd: repoRoot });

  logger.info(`Reading coverage report ${options.coverage}`);
  const gaps = await loadCoverageGaps(resolve(options.coverage), {
    repoRoot,
    format: options.coverageFormat,
  });
  logger.info(`Found uncovered lines in ${gaps.size} files`);

  const analysis = await runAnalysis(backend, gaps, {
    days: options.days,
    workers: options.workers,
    context: options.context,
    taskTimeoutMs: options.timeout,
    include: options.include,
    exclude: options.exclude,
    onProgress: (event) => {
      if (event.stage === "scan") {
        logger.progress("Analyzing commits", event.processed, event.total);
      } else {
        logger.info(`Found ${event.filesWithCulprits} files with culprit lines`);
      }
    },
  });

  const rendered =
    options.format === "json"
      ? renderJson(analysis)
      : renderTerminal(analysis, { top: options.top });

  if (options.output) {
    await writeFile(options.output, rendered + "\n", "utf-8");
    logger.info(`Report written to ${options.output}`);
  }

  return { analysis, rendered };
}

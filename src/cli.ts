#!/usr/bin/env node
/**
 * coverage-culprit CLI entry point.
 */

import { Command, InvalidArgumentError, Option } from "commander";
import { executeAnalyze } from "./commands/analyze/index.js";
import { CoverageCulpritError } from "./core/errors.js";
import { configureLogger, error as logError } from "./core/logger.js";
import type { CoverageFormat, RenderFormat } from "./core/types.js";
import { getVersion } from "./core/version.js";

interface AnalyzeCliOptions {
  days: string;
  workers: string;
  context: string;
  timeout: string;
  include?: string[];
  exclude?: string[];
  coverageFormat: CoverageFormat | "auto";
  format: RenderFormat;
  output?: string;
  top: number;
  quiet: boolean;
  debug: boolean;
}

function parseTop(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

const program = new Command();

program
  .name("coverage-culprit")
  .description(
    "Find the recent commits behind untested lines by intersecting coverage gaps with git history"
  )
  .version(getVersion());

program
  .command("analyze")
  .description("Attribute uncovered lines to the commits that last changed them")
  .argument("<coverage>", "Coverage report (LCOV or Cobertura XML)")
  .argument("[repo]", "Path to the git repository", ".")
  .option("--days <n>", "Lookback window in days", "30")
  .option("-w, --workers <n>", "Commits processed in parallel", "4")
  .option("--context <n>", "Lines of context around each group", "5")
  .option("--timeout <ms>", "Per-commit time limit in milliseconds", "30000")
  .option("--include <glob...>", "Only analyze files matching these globs")
  .option("--exclude <glob...>", "Skip files matching these globs")
  .addOption(
    new Option("--coverage-format <format>", "Coverage report format")
      .choices(["auto", "lcov", "cobertura"])
      .default("auto")
  )
  .addOption(
    new Option("--format <format>", "Output format")
      .choices(["terminal", "json"])
      .default("terminal")
  )
  .option("-o, --output <file>", "Write the report to a file instead of stdout")
  .option("--top <n>", "Files shown in the terminal report", parseTop, 10)
  .option("-q, --quiet", "Only print errors to stderr", false)
  .option("--debug", "Print per-commit diagnostics to stderr", false)
  .action(async (coverage: string, repo: string, options: AnalyzeCliOptions) => {
    configureLogger({ quiet: options.quiet, debug: options.debug });
    try {
      const { rendered } = await executeAnalyze({
        coverage,
        repo,
        days: options.days,
        workers: options.workers,
        context: options.context,
        timeout: options.timeout,
        include: options.include,
        exclude: options.exclude,
        coverageFormat: options.coverageFormat,
        format: options.format,
        output: options.output,
        top: options.top,
      });

      if (!options.output) {
        console.log(rendered);
      }
      process.exit(0);
    } catch (error) {
      handleError(error);
    }
  });

/**
 * Handle errors and exit with appropriate code.
 */
function handleError(error: unknown): never {
  if (error instanceof CoverageCulpritError) {
    logError(`Error: ${error.message}`);
    process.exit(error.exitCode);
  }

  if (error instanceof Error) {
    logError(`Unexpected error: ${error.message}`);
    if (process.env.DEBUG) {
      logError(error.stack ?? "");
    }
  } else {
    logError("An unexpected error occurred");
  }

  process.exit(1);
}

program.parseAsync().catch(handleError);

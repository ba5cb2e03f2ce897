/**
 * Analysis options and their defaults.
 */

import { InvalidOptionError } from "./errors.js";
import { DEFAULT_CONTEXT_LINES } from "./grouper.js";
import type { AnalysisOptions } from "./types.js";

export const DEFAULT_OPTIONS = {
  days: 30,
  workers: 4,
  context: DEFAULT_CONTEXT_LINES,
  taskTimeoutMs: 30_000,
} as const;

/**
 * Raw values as they arrive from the CLI or a library caller.
 */
export interface AnalysisOptionsInput {
  days?: number | string;
  workers?: number | string;
  context?: number | string;
  taskTimeoutMs?: number | string;
  include?: string[];
  exclude?: string[];
  now?: Date;
}

function positiveInteger(
  name: string,
  value: number | string | undefined,
  fallback: number
): number {
  if (value === undefined) return fallback;
  const parsed = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidOptionError(name, value);
  }
  return parsed;
}

/**
 * Fill defaults and validate.
 */
export function resolveAnalysisOptions(
  input: AnalysisOptionsInput = {}
): AnalysisOptions {
  return {
    days: positiveInteger("days", input.days, DEFAULT_OPTIONS.days),
    workers: positiveInteger("workers", input.workers, DEFAULT_OPTIONS.workers),
    context: positiveInteger("context", input.context, DEFAULT_OPTIONS.context),
    taskTimeoutMs: positiveInteger(
      "timeout",
      input.taskTimeoutMs,
      DEFAULT_OPTIONS.taskTimeoutMs
    ),
    include: input.include ?? [],
    exclude: input.exclude ?? [],
    now: input.now ?? new Date(),
  };
}

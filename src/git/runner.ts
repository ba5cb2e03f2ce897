/**
 * Thin execa wrapper so git calls can be swapped out in tests.
 */

import { execa } from "execa";

// Whole-history diffs of large commits can be big
const MAX_BUFFER = 256 * 1024 * 1024;

export interface GitRunResult {
  stdout: string;
  /** Undecoded stdout, set when the run asked for `encoding: "buffer"` */
  stdoutBytes?: Buffer;
  stderr: string;
  /** -1 when the process could not start or was aborted */
  exitCode: number;
}

export interface GitRunOptions {
  input?: string;
  signal?: AbortSignal;
  /** Keep stdout as bytes, for output framed by byte counts */
  encoding?: "buffer";
}

export type GitRunner = (
  args: string[],
  options?: GitRunOptions
) => Promise<GitRunResult>;

/**
 * Run git inside `cwd`. Never rejects on a non-zero exit; callers inspect
 * `exitCode` and decide.
 */
export function createGitRunner(cwd: string): GitRunner {
  return async (args, options = {}) => {
    const shared = {
      cwd,
      reject: false,
      input: options.input,
      signal: options.signal,
      stripFinalNewline: false,
      maxBuffer: MAX_BUFFER,
    };

    if (options.encoding === "buffer") {
      const result = await execa("git", args, { ...shared, encoding: "buffer" });
      return {
        stdout: result.stdout.toString("utf-8"),
        stdoutBytes: result.stdout,
        stderr: result.isCanceled ? "aborted" : result.stderr.toString("utf-8"),
        exitCode: result.isCanceled ? -1 : result.exitCode ?? -1,
      };
    }

    const result = await execa("git", args, shared);
    return {
      stdout: result.stdout,
      stderr: result.isCanceled ? "aborted" : result.stderr,
      exitCode: result.isCanceled ? -1 : result.exitCode ?? -1,
    };
  };
}

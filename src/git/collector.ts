/**
 * Git-backed VcsSource: commit enumeration, per-commit diffs and HEAD reads.
 */

import {
  BackendAccessError,
  GitCommandError,
  NotAGitRepoError,
} from "../core/errors.js";
import type {
  CommitInfo,
  DiffRequestOptions,
  LookbackWindow,
  VcsSource,
} from "../core/types.js";
import { batchGetFileContent } from "./batch.js";
import { createGitRunner, type GitRunner } from "./runner.js";

/** Object id of the empty tree; root commits are diffed against it. */
export const EMPTY_TREE = "4b825dc642cb6eb9a060e54bf8d69288fbee4904";

const FIELD_SEP = "\x1f";
const RECORD_SEP = "\x1e";
const LOG_FORMAT = ["%H", "%h", "%an", "%ct", "%P", "%s"].join("%x1f") + "%x1e";

/**
 * Parse `git log --format=<LOG_FORMAT>` output.
 * Order indexes follow the listing order (newest first for git log).
 */
export function parseCommitLog(output: string): CommitInfo[] {
  const commits: CommitInfo[] = [];

  for (const record of output.split(RECORD_SEP)) {
    const trimmed = record.replace(/^\n+/, "");
    if (!trimmed.trim()) continue;

    const [id, shortId, author, timestamp, parents, message] =
      trimmed.split(FIELD_SEP);
    if (!id || !shortId || timestamp === undefined) continue;

    const seconds = parseInt(timestamp, 10);
    if (Number.isNaN(seconds)) continue;

    commits.push({
      id,
      shortId,
      author: author ?? "",
      timestamp: seconds,
      message: (message ?? "").trimEnd(),
      parents: (parents ?? "").split(" ").filter(Boolean),
      orderIndex: commits.length,
    });
  }

  return commits;
}

export interface GitBackendOptions {
  cwd?: string;
  /** Injected runner (tests) */
  run?: GitRunner;
}

export class GitBackend implements VcsSource {
  readonly cwd: string;
  private readonly run: GitRunner;

  constructor(options: GitBackendOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.run = options.run ?? createGitRunner(this.cwd);
  }

  /**
   * Check if the working directory is inside a git repository.
   */
  async isGitRepo(): Promise<boolean> {
    try {
      const result = await this.run(["rev-parse", "--is-inside-work-tree"]);
      return result.exitCode === 0 && result.stdout.trim() === "true";
    } catch {
      return false;
    }
  }

  /**
   * Path of the working directory below the repository root, with a
   * trailing slash; empty at the root.
   */
  async getPrefix(): Promise<string> {
    const result = await this.run(["rev-parse", "--show-prefix"]);
    if (result.exitCode !== 0) {
      throw new GitCommandError("git rev-parse --show-prefix", result.stderr);
    }
    return result.stdout.trim();
  }

  /**
   * Diff paths and HEAD reads are relative to the repository root, so the
   * backend must sit exactly there.
   */
  async verify(): Promise<void> {
    if (!(await this.isGitRepo())) {
      throw new NotAGitRepoError(this.cwd);
    }
    const prefix = await this.getPrefix();
    if (prefix !== "") {
      throw new NotAGitRepoError(
        this.cwd,
        `This is the subdirectory ${prefix} of a repository; point the analysis at its root.`
      );
    }
  }

  /**
   * Whether HEAD resolves (false in a repository without commits).
   */
  async hasHead(): Promise<boolean> {
    const result = await this.run(["rev-parse", "--verify", "--quiet", "HEAD"]);
    return result.exitCode === 0;
  }

  async listCommits(window: LookbackWindow): Promise<CommitInfo[]> {
    if (!(await this.hasHead())) return [];

    const args = [
      "log",
      `--since=${new Date(window.since * 1000).toISOString()}`,
      `--until=${new Date(window.until * 1000).toISOString()}`,
      `--format=${LOG_FORMAT}`,
      "HEAD",
    ];
    const result = await this.run(args);
    if (result.exitCode !== 0) {
      throw new GitCommandError("git log", result.stderr);
    }
    return parseCommitLog(result.stdout);
  }

  /**
   * Unified diff of `commit` against its first parent, or the empty tree for
   * a root commit. Zero context lines: only +/- lines matter.
   */
  async getCommitDiff(
    commit: CommitInfo,
    options: DiffRequestOptions = {}
  ): Promise<string> {
    const base = commit.parents[0] ?? EMPTY_TREE;
    const args = [
      "diff",
      "--no-color",
      "--no-ext-diff",
      "--no-textconv",
      "--src-prefix=a/",
      "--dst-prefix=b/",
      "-M",
      "--unified=0",
      base,
      commit.id,
    ];

    const result = await this.run(args, { signal: options.signal });
    if (result.exitCode !== 0) {
      throw new BackendAccessError(
        `commit ${commit.shortId}`,
        new GitCommandError(`git diff ${base} ${commit.id}`, result.stderr).message
      );
    }
    return result.stdout;
  }

  async readHeadFiles(paths: readonly string[]): Promise<Map<string, string>> {
    return batchGetFileContent(this.run, paths, "HEAD");
  }
}

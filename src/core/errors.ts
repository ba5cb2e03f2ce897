/**
 * Custom error classes for coverage-culprit.
 */

export class CoverageCulpritError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1
  ) {
    super(message);
    this.name = "CoverageCulpritError";
  }
}

export class NotAGitRepoError extends CoverageCulpritError {
  constructor(
    path: string = process.cwd(),
    hint = "Please point the analysis at a git working tree."
  ) {
    super(`Not a git repository: ${path}\n${hint}`, 1);
    this.name = "NotAGitRepoError";
  }
}

export class GitCommandError extends CoverageCulpritError {
  constructor(
    command: string,
    public readonly stderr: string
  ) {
    super(`Git command failed: ${command}\n${stderr}`, 1);
    this.name = "GitCommandError";
  }
}

export class DiffParseError extends CoverageCulpritError {
  constructor(
    public readonly path: string,
    public readonly header: string
  ) {
    super(`Malformed hunk header in ${path}: ${header}`, 1);
    this.name = "DiffParseError";
  }
}

export class BackendAccessError extends CoverageCulpritError {
  constructor(
    public readonly subject: string,
    detail: string
  ) {
    super(`Cannot read ${subject}: ${detail}`, 1);
    this.name = "BackendAccessError";
  }
}

export class TaskTimeoutError extends CoverageCulpritError {
  constructor(
    public readonly commitId: string,
    public readonly timeoutMs: number
  ) {
    super(`Processing commit ${commitId} exceeded ${timeoutMs}ms`, 1);
    this.name = "TaskTimeoutError";
  }
}

export class CoverageReportError extends CoverageCulpritError {
  constructor(path: string, detail: string) {
    super(`Cannot read coverage report ${path}: ${detail}`, 1);
    this.name = "CoverageReportError";
  }
}

export class InvalidOptionError extends CoverageCulpritError {
  constructor(option: string, value: unknown) {
    super(`Invalid value for ${option}: ${String(value)}\n` +
      "Expected a positive integer.", 2);
    this.name = "InvalidOptionError";
  }
}

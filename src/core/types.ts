/**
 * Core types for coverage-culprit change extraction and blame analysis.
 */

// ============================================================================
// Coverage Input
// ============================================================================

/**
 * Uncovered lines per repository-relative file path.
 * Line lists are 1-based, ascending and free of duplicates.
 */
export type CoverageGapSet = ReadonlyMap<string, readonly number[]>;

export type CoverageFormat = "lcov" | "cobertura";

// ============================================================================
// Version Control Types
// ============================================================================

export interface CommitInfo {
  /** Full object id */
  id: string;
  shortId: string;
  author: string;
  /** Commit timestamp in epoch seconds */
  timestamp: number;
  /** First line of the commit message */
  message: string;
  /** Parent ids; the first one is the comparison base */
  parents: string[];
  /** Position in the enumeration (0 = first listed) */
  orderIndex: number;
}

export interface LookbackWindow {
  /** Inclusive lower bound, epoch seconds */
  since: number;
  /** Inclusive upper bound, epoch seconds */
  until: number;
}

export interface DiffRequestOptions {
  signal?: AbortSignal;
}

/**
 * Read access to a version-control backend.
 */
export interface VcsSource {
  /** Fails when the backend cannot be reached at all. */
  verify(): Promise<void>;
  listCommits(window: LookbackWindow): Promise<CommitInfo[]>;
  getCommitDiff(commit: CommitInfo, options?: DiffRequestOptions): Promise<string>;
  /** Content at HEAD; paths missing at HEAD are absent from the result. */
  readHeadFiles(paths: readonly string[]): Promise<Map<string, string>>;
}

// ============================================================================
// Diff Extraction
// ============================================================================

export interface ChangedFile {
  /** Post-change path */
  path: string;
  /** Added or modified line numbers in the post-change file, ascending */
  lines: number[];
}

export type DiffWarningKind = "malformed-hunk" | "truncated-hunk";

export interface DiffWarning {
  kind: DiffWarningKind;
  path: string;
  message: string;
}

export interface DiffExtraction {
  files: ChangedFile[];
  warnings: DiffWarning[];
}

export interface LineChange {
  readonly file: string;
  readonly line: number;
  readonly commit: Readonly<CommitInfo>;
}

/**
 * Immutable result of processing one commit.
 */
export interface CommitBatch {
  readonly commit: Readonly<CommitInfo>;
  readonly changes: readonly LineChange[];
  readonly warnings: readonly DiffWarning[];
}

// ============================================================================
// Scan Types
// ============================================================================

export type TaskFailureKind = "timeout" | "backend" | "unknown";

export interface TaskFailure {
  commitId: string;
  shortId: string;
  kind: TaskFailureKind;
  message: string;
}

export interface ScanProgress {
  processed: number;
  total: number;
  failed: number;
  /** Commit whose task just settled */
  commitId: string;
}

export interface ScanResult {
  /** Batches in completion order */
  batches: CommitBatch[];
  failures: TaskFailure[];
  commitsTotal: number;
}

// ============================================================================
// Intersection and Grouping
// ============================================================================

export interface UncoveredChangedLine {
  file: string;
  line: number;
  change: LineChange;
}

export interface BlameGroup {
  file: string;
  startLine: number;
  endLine: number;
  /** Culprit line numbers inside [startLine, endLine] */
  lines: number[];
  contextBefore: string[];
  culpritText: string[];
  contextAfter: string[];
  /** Most recent change among the group's lines */
  representative: LineChange;
  /** Distinct commits touching the group, most recent first */
  commits: CommitInfo[];
}

export interface FileAnalysis {
  file: string;
  uncoveredLines: number;
  culpritLines: number;
  culpritPercentage: number;
  groups: BlameGroup[];
}

export interface AnalysisParameters {
  days: number;
  workers: number;
  context: number;
  since: string;
  until: string;
}

export interface ScanSummary {
  commitsScanned: number;
  commitsFailed: number;
  failures: TaskFailure[];
  warnings: Array<DiffWarning & { commitId: string }>;
  /** Files with culprits that no longer exist at HEAD */
  missingAtHead: string[];
}

export interface Analysis {
  analyzedAt: string;
  totalUncoveredLines: number;
  totalCulpritLines: number;
  culpritPercentage: number;
  files: FileAnalysis[];
  parameters: AnalysisParameters;
  scan: ScanSummary;
}

// ============================================================================
// Pipeline Types
// ============================================================================

export type AnalysisProgress =
  | ({ stage: "scan" } & ScanProgress)
  | { stage: "group"; filesWithCulprits: number };

export interface AnalysisOptions {
  days: number;
  workers: number;
  context: number;
  taskTimeoutMs: number;
  include: string[];
  exclude: string[];
  now: Date;
}

export type RenderFormat = "terminal" | "json";

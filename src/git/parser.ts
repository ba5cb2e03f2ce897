/**
 * Unified diff parsing: which post-change line numbers did a commit add or modify?
 *
 * The parser is a small state machine driven line by line:
 *
 *   HEADER ──@@──► HUNK ──(old and new counts exhausted)──► HEADER
 *     ▲                                                      │
 *     └──────────────────── diff --git ──────────────────────┘
 *
 * Hunk bodies are consumed by their declared lengths, so content lines that
 * happen to look like headers ("--- x", "+++ y") are still read as content.
 */

import { DiffParseError } from "../core/errors.js";
import type {
  ChangedFile,
  CommitBatch,
  CommitInfo,
  DiffExtraction,
  DiffWarning,
  LineChange,
} from "../core/types.js";

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

interface FileState {
  path: string | null;
  deleted: boolean;
  binary: boolean;
  malformed: boolean;
  sawHunk: boolean;
  lines: number[];
}

interface HunkState {
  cursor: number;
  oldRemaining: number;
  newRemaining: number;
}

function newFileState(path: string | null = null): FileState {
  return {
    path,
    deleted: false,
    binary: false,
    malformed: false,
    sawHunk: false,
    lines: [],
  };
}

/**
 * Undo git's C-style quoting of unusual path names ("a/t\303\251st.ts").
 */
export function unquoteGitPath(raw: string): string {
  if (!raw.startsWith('"') || !raw.endsWith('"') || raw.length < 2) {
    return raw;
  }

  const body = raw.slice(1, -1);
  const bytes: number[] = [];
  const escapes: Record<string, number> = {
    n: 0x0a,
    t: 0x09,
    r: 0x0d,
    '"': 0x22,
    "\\": 0x5c,
    a: 0x07,
    b: 0x08,
    f: 0x0c,
    v: 0x0b,
  };

  for (let i = 0; i < body.length; i++) {
    const ch = body.charAt(i);
    if (ch !== "\\") {
      bytes.push(...Buffer.from(ch, "utf-8"));
      continue;
    }

    const next = body.charAt(i + 1);
    const octal = /^[0-7]{3}/.exec(body.slice(i + 1, i + 4));
    if (octal) {
      bytes.push(parseInt(octal[0], 8));
      i += 3;
    } else if (next in escapes) {
      bytes.push(escapes[next] ?? 0);
      i += 1;
    } else {
      bytes.push(0x5c);
    }
  }

  return Buffer.from(bytes).toString("utf-8");
}

/**
 * Parse the path from a "--- " / "+++ " header.
 * Returns null for /dev/null.
 */
export function parseHeaderPath(raw: string): string | null {
  // git appends a tab after names containing spaces
  const tab = raw.indexOf("\t");
  const trimmed = unquoteGitPath(tab === -1 ? raw.trimEnd() : raw.slice(0, tab));
  if (trimmed === "/dev/null") return null;
  if (trimmed.startsWith("a/") || trimmed.startsWith("b/")) {
    return trimmed.slice(2);
  }
  return trimmed;
}

/**
 * Best-effort post-change path from "diff --git a/x b/y".
 * Used when no "+++" header follows (binary or rename-only entries).
 */
function parseDiffGitPath(rest: string): string | null {
  if (rest.endsWith('"')) {
    const open = rest.lastIndexOf(' "');
    return open === -1 ? null : parseHeaderPath(rest.slice(open + 1));
  }
  const idx = rest.lastIndexOf(" b/");
  return idx === -1 ? null : rest.slice(idx + 3);
}

/**
 * Extract added/modified line numbers per file from unified diff text.
 *
 * Binary, deleted and rename-only entries yield nothing. A file with a
 * malformed hunk header is skipped and reported in `warnings`; other files
 * in the same diff are unaffected.
 */
export function extractChangedLines(diffText: string): DiffExtraction {
  const byPath = new Map<string, Set<number>>();
  const warnings: DiffWarning[] = [];

  let file: FileState | null = null;
  let hunk: HunkState | null = null;

  const finishFile = (): void => {
    if (!file) return;
    const { path, deleted, binary, malformed, lines } = file;
    if (path && !deleted && !binary && !malformed && lines.length > 0) {
      let set = byPath.get(path);
      if (!set) {
        set = new Set();
        byPath.set(path, set);
      }
      for (const line of lines) set.add(line);
    }
    file = null;
    hunk = null;
  };

  const rawLines = diffText.split("\n");
  const lastIndex = rawLines.length - 1;

  const warnTruncated = (path: string | null): void => {
    warnings.push({
      kind: "truncated-hunk",
      path: path ?? "(unknown)",
      message: `Hunk ended early in ${path ?? "(unknown)"}`,
    });
  };

  for (const [index, rawLine] of rawLines.entries()) {
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;

    if (hunk && file) {
      const marker = line.charAt(0);
      let consumed = true;

      if (marker === "+") {
        file.lines.push(hunk.cursor);
        hunk.cursor++;
        hunk.newRemaining--;
      } else if (marker === "-") {
        hunk.oldRemaining--;
      } else if (marker === " " || (line === "" && index < lastIndex)) {
        // A blank context line; the split after a final newline is not one
        hunk.cursor++;
        hunk.oldRemaining--;
        hunk.newRemaining--;
      } else if (marker === "\\") {
        // "\ No newline at end of file"
      } else {
        consumed = false;
      }

      if (consumed) {
        if (hunk.oldRemaining <= 0 && hunk.newRemaining <= 0) {
          hunk = null;
        }
        continue;
      }

      // Body ended before its declared length
      warnTruncated(file.path);
      hunk = null;
    }

    if (line.startsWith("diff --git ")) {
      finishFile();
      file = newFileState(parseDiffGitPath(line.slice("diff --git ".length)));
      continue;
    }

    // Plain unified diffs have no "diff --git" line
    if (line.startsWith("--- ")) {
      if (!file || file.sawHunk) {
        finishFile();
        file = newFileState();
      }
      continue;
    }

    if (!file || file.malformed) continue;

    if (line.startsWith("+++ ")) {
      const path = parseHeaderPath(line.slice(4));
      if (path === null) {
        file.deleted = true;
      } else {
        file.path = path;
      }
    } else if (line.startsWith("deleted file mode")) {
      file.deleted = true;
    } else if (line.startsWith("Binary files ") || line.startsWith("GIT binary patch")) {
      file.binary = true;
    } else if (line.startsWith("@@")) {
      file.sawHunk = true;
      const match = HUNK_HEADER.exec(line);
      if (!match) {
        const path = file.path ?? "(unknown)";
        file.malformed = true;
        warnings.push({
          kind: "malformed-hunk",
          path,
          message: new DiffParseError(path, line).message,
        });
        continue;
      }

      const oldLen = match[2] === undefined ? 1 : parseInt(match[2], 10);
      const newStart = parseInt(match[3] ?? "0", 10);
      const newLen = match[4] === undefined ? 1 : parseInt(match[4], 10);

      if (oldLen > 0 || newLen > 0) {
        hunk = {
          cursor: newStart,
          oldRemaining: oldLen,
          newRemaining: newLen,
        };
      }
    }
  }

  if (hunk && file) warnTruncated(file.path);
  finishFile();

  const files: ChangedFile[] = [...byPath.entries()]
    .map(([path, set]) => ({
      path,
      lines: [...set].sort((a, b) => a - b),
    }))
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

  return { files, warnings };
}

/**
 * Expand an extraction into one LineChange per changed line.
 */
export function toLineChanges(
  commit: Readonly<CommitInfo>,
  extraction: DiffExtraction
): LineChange[] {
  const changes: LineChange[] = [];
  for (const changed of extraction.files) {
    for (const line of changed.lines) {
      changes.push(Object.freeze({ file: changed.path, line, commit }));
    }
  }
  return changes;
}

/**
 * Turn one commit's diff into an immutable batch for the merge step.
 */
export function buildCommitBatch(
  commit: CommitInfo,
  diffText: string
): CommitBatch {
  const frozenCommit = Object.freeze({ ...commit, parents: [...commit.parents] });
  const extraction = extractChangedLines(diffText);
  return Object.freeze({
    commit: frozenCommit,
    changes: Object.freeze(toLineChanges(frozenCommit, extraction)),
    warnings: Object.freeze(extraction.warnings),
  });
}

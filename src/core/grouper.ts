/**
 * Grouper: cluster culprit lines of one file into blame groups.
 */

import { compareRecency, mostRecentChange } from "./sorting.js";
import type {
  BlameGroup,
  CommitInfo,
  LineChange,
  UncoveredChangedLine,
} from "./types.js";

export const DEFAULT_CONTEXT_LINES = 5;

/**
 * Split HEAD text into lines. A trailing newline does not add an empty line.
 */
export function splitLines(content: string): string[] {
  if (content === "") return [];
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Lines `from..to` (1-based, inclusive), limited to what exists.
 */
function sliceLines(fileLines: readonly string[], from: number, to: number): string[] {
  const start = Math.max(1, from);
  const end = Math.min(fileLines.length, to);
  if (end < start) return [];
  return fileLines.slice(start - 1, end);
}

/**
 * Partition ascending line numbers into runs where consecutive members are
 * at most `maxDistance` apart.
 */
export function partitionLines(
  sorted: readonly number[],
  maxDistance: number
): number[][] {
  const runs: number[][] = [];
  let current: number[] = [];

  for (const line of sorted) {
    const last = current[current.length - 1];
    if (last !== undefined && line - last > maxDistance) {
      runs.push(current);
      current = [];
    }
    current.push(line);
  }
  if (current.length > 0) runs.push(current);

  return runs;
}

function distinctCommits(changes: readonly LineChange[]): CommitInfo[] {
  const byId = new Map<string, CommitInfo>();
  for (const change of changes) {
    byId.set(change.commit.id, change.commit);
  }
  return [...byId.values()].sort(compareRecency);
}

function buildGroup(
  file: string,
  members: readonly UncoveredChangedLine[],
  fileLines: readonly string[],
  context: number
): BlameGroup | null {
  const first = members[0];
  const last = members[members.length - 1];
  if (!first || !last) return null;

  const changes = members.map((m) => m.change);
  const representative = mostRecentChange(changes);
  if (!representative) return null;

  const startLine = first.line;
  const endLine = last.line;

  return {
    file,
    startLine,
    endLine,
    lines: members.map((m) => m.line),
    contextBefore: sliceLines(fileLines, startLine - context, startLine - 1),
    culpritText: sliceLines(fileLines, startLine, endLine),
    contextAfter: sliceLines(fileLines, endLine + 1, endLine + context),
    representative,
    commits: distinctCommits(changes),
  };
}

/**
 * Group one file's culprit lines.
 *
 * A line joins the current group when it is at most `2 × context` lines
 * after the group's last line. Context text comes from the HEAD content in
 * `headContent` and is clamped to its length; groups past the end of a file
 * that has since shrunk are still emitted with whatever text exists.
 */
export function groupFileLines(
  file: string,
  culprits: readonly UncoveredChangedLine[],
  headContent: string,
  context: number = DEFAULT_CONTEXT_LINES
): BlameGroup[] {
  const byLine = new Map<number, UncoveredChangedLine>();
  for (const culprit of culprits) byLine.set(culprit.line, culprit);
  const sorted = [...byLine.keys()].sort((a, b) => a - b);

  const fileLines = splitLines(headContent);
  const groups: BlameGroup[] = [];

  for (const run of partitionLines(sorted, 2 * context)) {
    const members = run.flatMap((line) => {
      const member = byLine.get(line);
      return member ? [member] : [];
    });
    const group = buildGroup(file, members, fileLines, context);
    if (group) groups.push(group);
  }

  return groups;
}

/**
 * Tests for intersecting coverage with changes and grouping the result.
 */

import { describe, expect, it } from "vitest";
import { ChangeIndex } from "../src/core/change-index.js";
import {
  groupFileLines,
  partitionLines,
  splitLines,
} from "../src/core/grouper.js";
import { intersectCoverage } from "../src/core/intersect.js";
import type { CommitInfo, UncoveredChangedLine } from "../src/core/types.js";
import { createBatch, createCommit } from "./fixtures/index.js";

const oldCommit = createCommit("0ld0000000", 9);
const newCommit = createCommit("new0000000", 1);

function headOf(count: number): string {
  return Array.from({ length: count }, (_, i) => `line ${i + 1}`).join("\n") + "\n";
}

function culprits(
  file: string,
  entries: Array<[number, CommitInfo]>
): UncoveredChangedLine[] {
  return entries.map(([line, commit]) => ({
    file,
    line,
    change: { file, line, commit },
  }));
}

describe("intersectCoverage", () => {
  const index = ChangeIndex.fromBatches([
    createBatch(oldCommit, { "a.ts": [1, 2, 3], "b.ts": [5], "only-changed.ts": [1] }),
    createBatch(newCommit, { "a.ts": [3] }),
  ]);

  it("keeps gap lines that were recently changed", () => {
    const gaps = new Map([
      ["a.ts", [3, 2, 9]],
      ["b.ts", [6]],
      ["untouched.ts", [1]],
    ]);

    const result = intersectCoverage(gaps, index);

    expect([...result.keys()]).toEqual(["a.ts"]);
    expect(result.get("a.ts")?.map((c) => [c.line, c.change.commit.id])).toEqual([
      [2, oldCommit.id],
      [3, newCommit.id],
    ]);
  });

  it("returns an empty map when nothing overlaps", () => {
    expect(intersectCoverage(new Map([["z.ts", [1]]]), index).size).toBe(0);
    expect(intersectCoverage(new Map(), index).size).toBe(0);
  });
});

describe("splitLines", () => {
  it("ignores one trailing newline", () => {
    expect(splitLines("a\nb\n")).toEqual(["a", "b"]);
    expect(splitLines("a\r\nb")).toEqual(["a", "b"]);
    expect(splitLines("")).toEqual([]);
  });
});

describe("partitionLines", () => {
  it("splits where the gap exceeds the distance", () => {
    expect(partitionLines([1, 3, 14, 15, 40], 10)).toEqual([[1, 3], [14, 15], [40]]);
    expect(partitionLines([], 10)).toEqual([]);
  });
});

describe("groupFileLines", () => {
  it("merges lines exactly twice the context apart", () => {
    const groups = groupFileLines(
      "a.ts",
      culprits("a.ts", [[10, oldCommit], [20, oldCommit]]),
      headOf(40),
      5
    );

    expect(groups).toHaveLength(1);
    expect(groups[0]?.startLine).toBe(10);
    expect(groups[0]?.endLine).toBe(20);
    expect(groups[0]?.lines).toEqual([10, 20]);
    expect(groups[0]?.culpritText).toHaveLength(11);
  });

  it("splits lines one further apart", () => {
    const groups = groupFileLines(
      "a.ts",
      culprits("a.ts", [[10, oldCommit], [21, oldCommit]]),
      headOf(40),
      5
    );

    expect(groups.map((g) => [g.startLine, g.endLine])).toEqual([
      [10, 10],
      [21, 21],
    ]);
  });

  it("surrounds each group with context lines", () => {
    const [group] = groupFileLines("a.ts", culprits("a.ts", [[10, oldCommit]]), headOf(40), 2);

    expect(group?.contextBefore).toEqual(["line 8", "line 9"]);
    expect(group?.culpritText).toEqual(["line 10"]);
    expect(group?.contextAfter).toEqual(["line 11", "line 12"]);
  });

  it("clamps context at both ends of the file", () => {
    const groups = groupFileLines(
      "a.ts",
      culprits("a.ts", [[2, oldCommit], [30, oldCommit]]),
      headOf(31),
      5
    );

    expect(groups[0]?.contextBefore).toEqual(["line 1"]);
    expect(groups[1]?.contextAfter).toEqual(["line 31"]);
  });

  it("keeps groups that lie past the end of a shrunken file", () => {
    const [group] = groupFileLines("a.ts", culprits("a.ts", [[50, oldCommit]]), headOf(47), 5);

    expect(group?.startLine).toBe(50);
    expect(group?.contextBefore).toEqual(["line 45", "line 46", "line 47"]);
    expect(group?.culpritText).toEqual([]);
    expect(group?.contextAfter).toEqual([]);
  });

  it("represents a group by its most recent change and lists every commit", () => {
    const [group] = groupFileLines(
      "a.ts",
      culprits("a.ts", [[4, oldCommit], [5, newCommit], [6, oldCommit]]),
      headOf(10),
      1
    );

    expect(group?.representative.commit.id).toBe(newCommit.id);
    expect(group?.representative.line).toBe(5);
    expect(group?.commits.map((c) => c.id)).toEqual([newCommit.id, oldCommit.id]);
  });

  it("returns no groups for no culprits", () => {
    expect(groupFileLines("a.ts", [], headOf(3), 5)).toEqual([]);
  });
});

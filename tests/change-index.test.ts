/**
 * Tests for the most-recent-change index and the recency order.
 */

import { describe, expect, it } from "vitest";
import { ChangeIndex } from "../src/core/change-index.js";
import {
  compareRecency,
  comparePaths,
  mostRecentChange,
  normalizePath,
} from "../src/core/sorting.js";
import { createBatch, createCommit } from "./fixtures/index.js";

const older = createCommit("1111111111", 10, { orderIndex: 1 });
const newer = createCommit("2222222222", 2, { orderIndex: 0 });

describe("compareRecency", () => {
  it("puts later timestamps first", () => {
    expect(compareRecency(newer, older)).toBeLessThan(0);
    expect(compareRecency(older, newer)).toBeGreaterThan(0);
  });

  it("breaks timestamp ties by enumeration order", () => {
    const listedFirst = createCommit("aaaa", 1, { orderIndex: 0 });
    const listedSecond = createCommit("bbbb", 1, { orderIndex: 1 });

    expect(compareRecency(listedFirst, listedSecond)).toBeLessThan(0);
  });

  it("falls back to the larger id", () => {
    const a = createCommit("aaaa", 1, { orderIndex: 3 });
    const b = createCommit("bbbb", 1, { orderIndex: 3 });

    expect(compareRecency(b, a)).toBeLessThan(0);
    expect(compareRecency(a, a)).toBe(0);
  });
});

describe("ChangeIndex", () => {
  it("keeps the most recent commit for a line", () => {
    const index = ChangeIndex.fromBatches([
      createBatch(older, { "a.ts": [1, 2, 3] }),
      createBatch(newer, { "a.ts": [2] }),
    ]);

    expect(index.get("a.ts", 1)?.commit.id).toBe(older.id);
    expect(index.get("a.ts", 2)?.commit.id).toBe(newer.id);
    expect(index.get("a.ts", 3)?.commit.id).toBe(older.id);
    expect(index.size).toBe(3);
  });

  it("does not let an older batch overwrite a newer one", () => {
    const index = new ChangeIndex();

    expect(index.merge(createBatch(newer, { "a.ts": [5] }))).toBe(1);
    expect(index.merge(createBatch(older, { "a.ts": [5, 6] }))).toBe(1);
    expect(index.get("a.ts", 5)?.commit.id).toBe(newer.id);
    expect(index.get("a.ts", 6)?.commit.id).toBe(older.id);
  });

  it("gives the same attribution for every merge order", () => {
    const tiedA = createCommit("aaaa", 5, { orderIndex: 2 });
    const tiedB = createCommit("bbbb", 5, { orderIndex: 2 });
    const batches = [
      createBatch(older, { "a.ts": [1, 2], "b.ts": [7] }),
      createBatch(newer, { "a.ts": [2, 3] }),
      createBatch(tiedA, { "b.ts": [7, 8] }),
      createBatch(tiedB, { "b.ts": [8] }),
    ];

    const expected = ChangeIndex.fromBatches(batches).snapshot();
    const orders = [
      [3, 2, 1, 0],
      [1, 3, 0, 2],
      [2, 0, 3, 1],
    ];
    for (const order of orders) {
      const shuffled = order.flatMap((i) => {
        const batch = batches[i];
        return batch ? [batch] : [];
      });
      expect(ChangeIndex.fromBatches(shuffled).snapshot()).toEqual(expected);
    }

    expect(expected).toEqual([
      { file: "a.ts", line: 1, commitId: older.id },
      { file: "a.ts", line: 2, commitId: newer.id },
      { file: "a.ts", line: 3, commitId: newer.id },
      { file: "b.ts", line: 7, commitId: "aaaa" },
      { file: "b.ts", line: 8, commitId: "bbbb" },
    ]);
  });

  it("lists files and lines in sorted order", () => {
    const index = ChangeIndex.fromBatches([
      createBatch(older, { "z.ts": [9, 3], "a.ts": [4] }),
    ]);

    expect(index.files()).toEqual(["a.ts", "z.ts"]);
    expect(index.linesOf("z.ts")).toEqual([3, 9]);
    expect(index.linesOf("missing.ts")).toEqual([]);
    expect(index.has("z.ts", 3)).toBe(true);
    expect(index.has("z.ts", 4)).toBe(false);
  });
});

describe("mostRecentChange", () => {
  it("returns undefined for an empty list", () => {
    expect(mostRecentChange([])).toBeUndefined();
  });

  it("picks the most recent change", () => {
    const changes = [
      { file: "a.ts", line: 1, commit: older },
      { file: "a.ts", line: 2, commit: newer },
    ];

    expect(mostRecentChange(changes)?.line).toBe(2);
  });
});

describe("path helpers", () => {
  it("normalizes separators and leading ./", () => {
    expect(normalizePath(".\\src\\a.ts")).toBe("src/a.ts");
    expect(normalizePath("././lib/b.ts")).toBe("lib/b.ts");
  });

  it("compares by code unit", () => {
    expect(["b", "B", "a"].sort(comparePaths)).toEqual(["B", "a", "b"]);
  });
});

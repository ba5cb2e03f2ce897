/**
 * Tests for commit scanning: window filtering, failure isolation and timeouts.
 */

import { getEventListeners } from "node:events";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BackendAccessError } from "../src/core/errors.js";
import { resetLogger } from "../src/core/logger.js";
import { lookbackWindow, scanCommits } from "../src/core/scanner.js";
import type { ScanProgress } from "../src/core/types.js";
import {
  DAY,
  FakeVcsSource,
  NOW,
  NOW_SECONDS,
  createCommit,
  newFileDiff,
} from "./fixtures/index.js";

const window = lookbackWindow(NOW, 30);

function fileCommit(id: string, daysAgo: number, path: string) {
  return { info: createCommit(id, daysAgo), diff: newFileDiff(path, ["x", "y"]) };
}

describe("lookbackWindow", () => {
  it("spans the given number of days ending now", () => {
    expect(lookbackWindow(NOW, 7)).toEqual({
      since: NOW_SECONDS - 7 * DAY,
      until: NOW_SECONDS,
    });
  });
});

describe("scanCommits", () => {
  beforeEach(() => {
    resetLogger();
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns nothing for an empty window", async () => {
    const source = new FakeVcsSource({ commits: [] });

    const result = await scanCommits(source, window, { workers: 4, taskTimeoutMs: 1000 });

    expect(result).toEqual({ batches: [], failures: [], commitsTotal: 0 });
  });

  it("drops commits outside the window", async () => {
    const source = new FakeVcsSource({
      commits: [
        fileCommit("inside0001", 29, "a.ts"),
        fileCommit("outside001", 31, "b.ts"),
      ],
    });

    const result = await scanCommits(source, window, { workers: 2, taskTimeoutMs: 1000 });

    expect(result.commitsTotal).toBe(1);
    expect(source.requested).toEqual(["inside0001"]);
    expect(result.batches.map((b) => b.commit.id)).toEqual(["inside0001"]);
  });

  it("keeps at most `workers` diff requests in flight", async () => {
    const source = new FakeVcsSource({
      commits: Array.from({ length: 9 }, (_, i) => ({
        ...fileCommit(`commit000${i}`, i + 1, `f${i}.ts`),
        delayMs: 5,
      })),
    });

    const result = await scanCommits(source, window, { workers: 2, taskTimeoutMs: 1000 });

    expect(source.maxInFlight).toBe(2);
    expect(result.batches).toHaveLength(9);
  });

  it("records a failing commit and keeps the others", async () => {
    const source = new FakeVcsSource({
      commits: [
        fileCommit("good000001", 1, "a.ts"),
        {
          info: createCommit("broken0001", 2),
          diff: new BackendAccessError("commit broken0", "object missing"),
        },
        fileCommit("good000002", 3, "b.ts"),
      ],
    });

    const result = await scanCommits(source, window, { workers: 3, taskTimeoutMs: 1000 });

    expect(result.batches.map((b) => b.commit.id).sort()).toEqual(["good000001", "good000002"]);
    expect(result.failures).toEqual([
      {
        commitId: "broken0001",
        shortId: "broken0",
        kind: "backend",
        message: "Cannot read commit broken0: object missing",
      },
    ]);
    expect(console.error).toHaveBeenCalledWith(
      "warning: Skipping commit broken0 (backend): Cannot read commit broken0: object missing"
    );
  });

  it("classifies unexpected errors as unknown", async () => {
    const source = new FakeVcsSource({
      commits: [{ info: createCommit("weird00001", 1), diff: new Error("surprise") }],
    });

    const result = await scanCommits(source, window, { workers: 1, taskTimeoutMs: 1000 });

    expect(result.failures[0]?.kind).toBe("unknown");
    expect(result.failures[0]?.message).toBe("surprise");
  });

  it("times out a hung commit, aborts it and finishes the rest", async () => {
    const source = new FakeVcsSource({
      commits: [
        { info: createCommit("hung000001", 1), diff: "", hang: true },
        fileCommit("quick00001", 2, "a.ts"),
      ],
    });

    const result = await scanCommits(source, window, { workers: 2, taskTimeoutMs: 20 });

    expect(result.batches.map((b) => b.commit.id)).toEqual(["quick00001"]);
    expect(result.failures).toEqual([
      {
        commitId: "hung000001",
        shortId: "hung000",
        kind: "timeout",
        message: "Processing commit hung000001 exceeded 20ms",
      },
    ]);
    expect(source.aborted).toEqual(["hung000001"]);
    expect(source.inFlight).toBe(0);
  });

  it("reports progress once per settled commit", async () => {
    const source = new FakeVcsSource({
      commits: [
        fileCommit("first00001", 1, "a.ts"),
        { info: createCommit("failing001", 2), diff: new Error("nope") },
        fileCommit("third00001", 3, "c.ts"),
      ],
    });
    const events: ScanProgress[] = [];

    await scanCommits(source, window, {
      workers: 1,
      taskTimeoutMs: 1000,
      onProgress: (p) => events.push(p),
    });

    expect(events).toEqual([
      { processed: 1, total: 3, failed: 0, commitId: "first00001" },
      { processed: 2, total: 3, failed: 1, commitId: "failing001" },
      { processed: 3, total: 3, failed: 1, commitId: "third00001" },
    ]);
  });

  it("propagates a failure to list commits", async () => {
    const source = new FakeVcsSource({ commits: [] });
    source.listCommits = async () => {
      throw new Error("log failed");
    };

    await expect(
      scanCommits(source, window, { workers: 1, taskTimeoutMs: 1000 })
    ).rejects.toThrow("log failed");
  });
});

describe("delayed diff requests", () => {
  it("detach from the abort signal once they finish", async () => {
    const source = new FakeVcsSource({
      commits: [{ ...fileCommit("slow000001", 1, "a.ts"), delayMs: 1 }],
    });
    const controller = new AbortController();

    await source.getCommitDiff(createCommit("slow000001", 1), { signal: controller.signal });

    expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
  });
});

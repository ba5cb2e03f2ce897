/**
 * Tests for the analyze command: report loading, rendering and output files.
 */

import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { executeAnalyze, type AnalyzeCommandOptions } from "../src/commands/analyze/index.js";
import { InvalidOptionError } from "../src/core/errors.js";
import { resetLogger } from "../src/core/logger.js";
import { FakeVcsSource, createCommit, newFileDiff } from "./fixtures/index.js";

const LCOV = fileURLToPath(new URL("./fixtures/coverage/lcov.info", import.meta.url));

const MATH_HEAD = "export const one = 1;\nexport const two = 2;\nexport const three = 3;\n";

function mathSource(): FakeVcsSource {
  return new FakeVcsSource({
    commits: [
      {
        info: createCommit("5eed000001", 0, {
          author: "Dana",
          message: "Add math",
          // the command analyzes against the real clock
          timestamp: Math.floor(Date.now() / 1000) - 60,
        }),
        diff: newFileDiff("src/math.ts", MATH_HEAD.trimEnd().split("\n")),
      },
    ],
    head: { "src/math.ts": MATH_HEAD },
  });
}

function baseOptions(overrides: Partial<AnalyzeCommandOptions> = {}): AnalyzeCommandOptions {
  return {
    coverage: LCOV,
    repo: "/repo",
    coverageFormat: "auto",
    format: "json",
    top: 10,
    source: mathSource(),
    ...overrides,
  };
}

describe("executeAnalyze", () => {
  let workDir: string | undefined;

  beforeEach(() => {
    resetLogger();
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    if (workDir) {
      await rm(workDir, { recursive: true, force: true });
      workDir = undefined;
    }
  });

  it("attributes report gaps to the commit that added them", async () => {
    const { analysis, rendered } = await executeAnalyze(baseOptions());

    expect(analysis.totalUncoveredLines).toBe(3);
    expect(analysis.totalCulpritLines).toBe(2);
    expect(analysis.files.map((f) => [f.file, f.groups[0]?.lines])).toEqual([
      ["src/math.ts", [2, 3]],
    ]);
    expect(JSON.parse(rendered)).toEqual(analysis);
  });

  it("writes the report to the output file", async () => {
    workDir = await mkdtemp(join(tmpdir(), "coverage-culprit-"));
    const output = join(workDir, "report.json");

    const { rendered } = await executeAnalyze(baseOptions({ output }));

    expect(await readFile(output, "utf-8")).toBe(rendered + "\n");
  });

  it("renders the terminal report", async () => {
    const { rendered } = await executeAnalyze(baseOptions({ format: "terminal" }));

    expect(rendered).toContain("Top culprits");
  });

  it("rejects invalid numeric options before reading history", async () => {
    const source = mathSource();

    await expect(
      executeAnalyze(baseOptions({ source, workers: "zero" }))
    ).rejects.toBeInstanceOf(InvalidOptionError);
    expect(source.requested).toEqual([]);
  });
});

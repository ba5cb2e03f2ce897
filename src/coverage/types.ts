/**
 * Shared shapes for coverage readers.
 */

export interface ParsedCoverage {
  /** Uncovered lines keyed by the path as written in the report */
  gaps: Map<string, number[]>;
  /** Source roots declared by the report (Cobertura <source>) */
  sourceRoots: string[];
}

/**
 * Accumulates hit/miss observations; a line hit anywhere counts as covered.
 */
export class LineTally {
  private readonly covered = new Map<string, Set<number>>();
  private readonly missed = new Map<string, Set<number>>();

  record(file: string, line: number, hit: boolean): void {
    const target = hit ? this.covered : this.missed;
    let set = target.get(file);
    if (!set) {
      set = new Set();
      target.set(file, set);
    }
    set.add(line);
  }

  /** Files with at least one line that was never hit. */
  gaps(): Map<string, number[]> {
    const result = new Map<string, number[]>();
    for (const [file, missed] of this.missed) {
      const covered = this.covered.get(file);
      const lines = [...missed]
        .filter((line) => !covered?.has(line))
        .sort((a, b) => a - b);
      if (lines.length > 0) result.set(file, lines);
    }
    return result;
  }
}

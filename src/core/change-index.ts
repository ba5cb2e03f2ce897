/**
 * ChangeIndex: (file, line) → the most recent commit that touched it.
 *
 * Only `merge` writes to the index. Workers hand over immutable CommitBatches
 * and a single reducer folds them in, so no locking is involved and the result
 * does not depend on which batch arrives first.
 */

import { isMoreRecent } from "./sorting.js";
import type { CommitBatch, LineChange } from "./types.js";

export class ChangeIndex {
  private readonly byFile = new Map<string, Map<number, LineChange>>();
  private entries = 0;

  /**
   * Fold batches into a fresh index.
   */
  static fromBatches(batches: Iterable<CommitBatch>): ChangeIndex {
    const index = new ChangeIndex();
    for (const batch of batches) {
      index.merge(batch);
    }
    return index;
  }

  /**
   * Apply one batch. An existing entry is replaced only when the incoming
   * commit is strictly more recent.
   *
   * @returns number of keys added or replaced
   */
  merge(batch: CommitBatch): number {
    let updated = 0;
    for (const change of batch.changes) {
      if (this.offer(change)) updated++;
    }
    return updated;
  }

  /**
   * Apply a single change under the recency rule.
   */
  offer(change: LineChange): boolean {
    let lines = this.byFile.get(change.file);
    if (!lines) {
      lines = new Map();
      this.byFile.set(change.file, lines);
    }

    const existing = lines.get(change.line);
    if (!existing) {
      lines.set(change.line, change);
      this.entries++;
      return true;
    }

    if (isMoreRecent(change.commit, existing.commit)) {
      lines.set(change.line, change);
      return true;
    }
    return false;
  }

  get(file: string, line: number): LineChange | undefined {
    return this.byFile.get(file)?.get(line);
  }

  has(file: string, line: number): boolean {
    return this.byFile.get(file)?.has(line) ?? false;
  }

  /** Number of (file, line) keys. */
  get size(): number {
    return this.entries;
  }

  /** Indexed files, sorted. */
  files(): string[] {
    return [...this.byFile.keys()].sort();
  }

  /** Indexed line numbers of a file, ascending. */
  linesOf(file: string): number[] {
    const lines = this.byFile.get(file);
    return lines ? [...lines.keys()].sort((a, b) => a - b) : [];
  }

  /**
   * Flatten to a list ordered by file then line.
   * Two indexes with equal snapshots attribute every line the same way.
   */
  snapshot(): Array<{ file: string; line: number; commitId: string }> {
    const result: Array<{ file: string; line: number; commitId: string }> = [];
    for (const file of this.files()) {
      for (const line of this.linesOf(file)) {
        const change = this.get(file, line);
        if (change) {
          result.push({ file, line, commitId: change.commit.id });
        }
      }
    }
    return result;
  }
}

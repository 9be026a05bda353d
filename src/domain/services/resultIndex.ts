/**
 * Result Index
 *
 * In-memory collection of per-file cast reports, keyed by path.
 * Written during the scan phase, then frozen and only read.
 *
 * Iteration is always in lexicographic path order so that summaries,
 * file ordinals and search output are stable across runs.
 */

import type { CastKind } from "../entities/castKind";
import type { FileReport, Occurrence } from "../entities/occurrence";

/**
 * An occurrence together with the file it was found in.
 */
export interface LocatedOccurrence {
  readonly path: string;
  readonly occurrence: Occurrence;
}

export class ResultIndex {
  private reports = new Map<string, FileReport>();
  private frozen = false;

  /**
   * Add a file's report. Reports with no occurrences are ignored.
   * The index keeps a frozen copy, so later changes to `report` do not reach it.
   * @throws Error if the index has been frozen
   */
  insert(path: string, report: FileReport): void {
    if (this.frozen) {
      throw new Error("ResultIndex is frozen; cannot insert after the scan phase");
    }
    if (report.occurrences.length === 0) return;

    this.reports.set(
      path,
      Object.freeze({
        path: report.path,
        occurrences: Object.freeze(
          report.occurrences.map((occ) => Object.freeze({ ...occ }))
        ),
      })
    );
  }

  /**
   * Mark the end of the scan phase.
   */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** Number of files with at least one occurrence */
  get size(): number {
    return this.reports.size;
  }

  has(path: string): boolean {
    return this.reports.has(path);
  }

  get(path: string): FileReport | undefined {
    return this.reports.get(path);
  }

  /**
   * Indexed paths in lexicographic order.
   * Position i holds the file shown as ordinal i + 1 in the console.
   */
  paths(): string[] {
    return [...this.reports.keys()].sort();
  }

  /**
   * (path, report) pairs in lexicographic path order.
   */
  *iterateAll(): IterableIterator<[string, FileReport]> {
    for (const path of this.paths()) {
      const report = this.reports.get(path);
      if (report) yield [path, report];
    }
  }

  /**
   * Per-kind counts for one file. Kinds absent from the file are omitted.
   * Unknown paths give an empty map.
   */
  countsByKind(path: string): Map<CastKind, number> {
    const counts = new Map<CastKind, number>();
    const report = this.reports.get(path);
    if (!report) return counts;

    for (const occ of report.occurrences) {
      counts.set(occ.kind, (counts.get(occ.kind) ?? 0) + 1);
    }
    return counts;
  }

  /**
   * Every occurrence of one kind: files in path order, scan order within a file.
   */
  occurrencesOfKind(kind: CastKind): LocatedOccurrence[] {
    const results: LocatedOccurrence[] = [];
    for (const [path, report] of this.iterateAll()) {
      for (const occurrence of report.occurrences) {
        if (occurrence.kind === kind) {
          results.push({ path, occurrence });
        }
      }
    }
    return results;
  }

  totalOccurrences(): number {
    let total = 0;
    for (const report of this.reports.values()) {
      total += report.occurrences.length;
    }
    return total;
  }
}

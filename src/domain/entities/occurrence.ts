/**
 * Occurrence Entity
 *
 * A single matched cast usage and the per-file report that groups them.
 */

import type { CastKind } from "./castKind";

/**
 * One cast found on one line.
 */
export interface Occurrence {
  /** Which cast operator matched */
  readonly kind: CastKind;

  /** The full source line, without its terminator */
  readonly rawLine: string;

  /** 1-based line number */
  readonly lineNumber: number;

  /** Numbered lines around the match (see extractContext) */
  readonly contextBlock: string;
}

/**
 * All occurrences found in one file, in scan order.
 * Only built for files with at least one occurrence; read-only once indexed.
 */
export interface FileReport {
  /** Path as produced by the directory walk */
  readonly path: string;

  /** Top-to-bottom, and in declared cast order within a line */
  readonly occurrences: readonly Occurrence[];
}

/**
 * Counters gathered during the scan phase.
 */
export interface ScanStats {
  /** Files with a tracked extension found by the walk */
  filesDiscovered: number;

  /** Files read successfully */
  filesScanned: number;

  /** Files that could not be read */
  filesFailed: number;

  /** Files that produced a report */
  filesWithCasts: number;

  /** Sum of occurrences over all reports */
  totalOccurrences: number;

  /** Whether the walk stopped early on a traversal error */
  traversalAborted: boolean;
}

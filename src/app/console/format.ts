/**
 * Console Formatting
 *
 * Renders menu screens and query results as plain text.
 * Every function is pure: it returns the text and leaves writing to the caller.
 */

import { CAST_KINDS, type CastKind } from "../../domain/entities";
import type { ResultIndex } from "../../domain/services";

export const MENU_TEXT =
  "\n=== Cast Analyzer Menu ===\n" +
  "1. Show summary of all files\n" +
  "2. Show detailed analysis for a specific file\n" +
  "3. Search by cast type\n" +
  "4. Exit\n";

export const MENU_PROMPT = "Enter your choice (1-4): ";
export const FILE_PROMPT = "Enter file number: ";
export const KIND_PROMPT = "Enter cast type number: ";

/**
 * Summary of every indexed file: total count, then per-kind counts with
 * kinds in alphabetical order.
 */
export function formatSummary(index: ResultIndex): string {
  let output = "\n=== Summary of Cast Usage ===\n";

  if (index.size === 0) {
    return output + "\nNo casts found.\n";
  }

  for (const [path, report] of index.iterateAll()) {
    output += `\nFile: ${path}\n`;
    output += `Total casts found: ${report.occurrences.length}\n`;

    const counts = [...index.countsByKind(path)].sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0
    );
    for (const [kind, count] of counts) {
      output += `  ${kind}: ${count}\n`;
    }
  }

  return output;
}

/**
 * Numbered file list; ordinals follow summary order.
 */
export function formatFileList(index: ResultIndex): string {
  let output = "\nAvailable files:\n";
  index.paths().forEach((path, i) => {
    output += `${i + 1}. ${path}\n`;
  });
  return output;
}

/**
 * Every occurrence in one file, in scan order.
 * Unknown paths render the header alone.
 */
export function formatFileDetails(index: ResultIndex, path: string): string {
  let output = `\nDetailed analysis for: ${path}\n`;
  const report = index.get(path);
  if (!report) return output;

  for (const occ of report.occurrences) {
    output += `\n=== ${occ.kind} at line ${occ.lineNumber} ===\n`;
    output += `Context:\n${occ.contextBlock}\n`;
  }
  return output;
}

/**
 * The cast kinds with their fixed menu ordinals.
 */
export function formatKindList(): string {
  let output = "\nAvailable cast types:\n";
  CAST_KINDS.forEach(({ kind }, i) => {
    output += `${i + 1}. ${kind}\n`;
  });
  return output;
}

/**
 * Every occurrence of one kind across the index.
 * No matches renders the header alone.
 */
export function formatKindSearch(index: ResultIndex, kind: CastKind): string {
  let output = `\nOccurrences of ${kind}:\n`;
  for (const { path, occurrence } of index.occurrencesOfKind(kind)) {
    output += `\nFile: ${path}\n`;
    output += `Line ${occurrence.lineNumber}:\n`;
    output += `${occurrence.contextBlock}\n`;
  }
  return output;
}

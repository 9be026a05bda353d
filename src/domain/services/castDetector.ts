/**
 * Cast Detection Service
 *
 * Line-by-line heuristic matching of the four C++ cast operators.
 * This is a pure domain service - it works on file content, not paths.
 *
 * Matching is purely textual: casts inside comments, string literals
 * and disabled preprocessor blocks are reported like any other.
 */

import { CAST_KINDS } from "../entities/castKind";
import type { Occurrence } from "../entities/occurrence";
import { DEFAULT_CONTEXT_RADIUS } from "../entities/config";
import { extractContext } from "./contextExtractor";

/**
 * Options for cast detection.
 */
export interface DetectOptions {
  /** Context lines on each side of a match (default: 2) */
  contextRadius?: number;
}

/**
 * Split file content into lines.
 *
 * Lines end at `\n`; a trailing `\r` is dropped. A terminator at the very
 * end of the content does not start an extra empty line.
 */
export function splitLines(content: string): string[] {
  if (content.length === 0) return [];

  const lines = content.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

/**
 * Find cast occurrences in file content.
 *
 * Each line is tested against every cast kind in declared order. A line
 * yields at most one occurrence per kind: two static_casts on one line
 * count once, while a static_cast and a const_cast count twice.
 *
 * @param content - Full text of a source file
 * @param options - Detection options
 * @returns Occurrences in scan order
 */
export function detectCasts(
  content: string,
  options: DetectOptions = {}
): Occurrence[] {
  const { contextRadius = DEFAULT_CONTEXT_RADIUS } = options;
  const lines = splitLines(content);
  const occurrences: Occurrence[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    for (const { kind, pattern } of CAST_KINDS) {
      if (!pattern.test(line)) continue;

      occurrences.push({
        kind,
        rawLine: line,
        lineNumber: i + 1, // 1-indexed
        contextBlock: extractContext(lines, i, contextRadius),
      });
    }
  }

  return occurrences;
}

/**
 * Context Extraction Service
 *
 * Renders the lines surrounding a match as a numbered block.
 * Pure function, no I/O.
 */

import { DEFAULT_CONTEXT_RADIUS } from "../entities/config";

/**
 * Render a window of lines around centerIndex.
 *
 * The window is [centerIndex - radius, centerIndex + radius], clamped to
 * the file, so matches near the start or end produce a shorter block.
 * Each line is rendered as `"<lineNumber>: <text>\n"` with 1-based numbers.
 *
 * @param lines - All lines of the file
 * @param centerIndex - 0-based index of the matched line
 * @param radius - Lines to include on each side
 *
 * @example
 * ```typescript
 * extractContext(["a", "b", "c"], 0, 1);
 * // "1: a\n2: b\n"
 * ```
 */
export function extractContext(
  lines: readonly string[],
  centerIndex: number,
  radius: number = DEFAULT_CONTEXT_RADIUS
): string {
  const start = Math.max(0, centerIndex - radius);
  const end = Math.min(lines.length, centerIndex + radius + 1);

  let context = "";
  for (let i = start; i < end; i++) {
    context += `${i + 1}: ${lines[i]}\n`;
  }
  return context;
}

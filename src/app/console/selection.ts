/**
 * Menu selection parsing.
 */

import { InvalidSelectionError } from "../../domain/entities";

/**
 * Parse a 1-based menu selection.
 *
 * The trimmed input must be a plain decimal integer in [1, max].
 *
 * @param input - Raw input line
 * @param max - Highest valid ordinal
 * @param message - Message carried by the error on rejection
 * @throws InvalidSelectionError for non-numeric or out-of-range input
 */
export function parseSelection(
  input: string,
  max: number,
  message: string
): number {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidSelectionError(message, input);
  }

  const value = parseInt(trimmed, 10);
  if (value < 1 || value > max) {
    throw new InvalidSelectionError(message, input);
  }
  return value;
}

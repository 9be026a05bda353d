/**
 * Scan File Use Case
 *
 * Reads one source file and turns its cast occurrences into a report.
 */

import type { FileSystem, Logger } from "../ports";
import type { FileReport } from "../entities/occurrence";
import { FileOpenError } from "../entities/errors";
import { detectCasts, type DetectOptions } from "../services/castDetector";

/**
 * Outcome of scanning a single file.
 */
export type ScanOutcome =
  | { status: "scanned"; report: FileReport }
  | { status: "failed"; error: FileOpenError };

/**
 * Scan one file for casts.
 *
 * A file that cannot be read is logged and reported as failed; there is
 * no retry. A readable file always yields a report, which may be empty.
 *
 * @param fs - FileSystem implementation (injected dependency)
 * @param filepath - File to scan
 * @param logger - Receives the open failure, if any
 * @param options - Detection options
 */
export async function scanFile(
  fs: FileSystem,
  filepath: string,
  logger: Logger,
  options: DetectOptions = {}
): Promise<ScanOutcome> {
  let content: string;
  try {
    content = await fs.readFile(filepath);
  } catch (cause) {
    const error = new FileOpenError(filepath, cause);
    logger.clearProgress();
    logger.error(error.message);
    return { status: "failed", error };
  }

  return {
    status: "scanned",
    report: { path: filepath, occurrences: detectCasts(content, options) },
  };
}

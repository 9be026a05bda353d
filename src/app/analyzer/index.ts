/**
 * Analyzer
 *
 * Library entry for the scan phase. Wires the Node filesystem adapter
 * and a logger into the analyzeDirectory use case.
 */

import type { AnalyzerConfig, ScanStats } from "../../domain/entities";
import type { FileSystem, Logger } from "../../domain/ports";
import { analyzeDirectory, type AnalyzeResult } from "../../domain/usecases";
import { nodeFileSystem } from "../../infrastructure/filesystem";
import { resolveConfig } from "../../infrastructure/config";
import { createLogger } from "../../infrastructure/logger";

export type { AnalyzeResult } from "../../domain/usecases";

/**
 * Options for analyze().
 */
export interface AnalyzeOptions {
  /** Overrides merged over the default configuration */
  config?: Partial<AnalyzerConfig>;

  /** Logger for progress and failures (default: console logger) */
  logger?: Logger;

  /** Filesystem adapter (default: Node.js) */
  fileSystem?: FileSystem;

  /** Report a progress line per file through the logger */
  showProgress?: boolean;
}

/**
 * Scan a directory tree for C++ casts and return the frozen index.
 *
 * Unreadable directories and files are logged and skipped; the promise
 * only rejects for an invalid configuration.
 *
 * @param rootDir - Directory to scan
 * @param options - Analyzer options
 */
export async function analyze(
  rootDir: string,
  options: AnalyzeOptions = {}
): Promise<AnalyzeResult> {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? createLogger();
  const fileSystem = options.fileSystem ?? nodeFileSystem;

  logger.debug(
    `Scanning ${rootDir} for ${config.extensions.join(", ")} files`
  );

  const result = await analyzeDirectory(
    { fileSystem, logger },
    {
      rootDir,
      config,
      onProgress: options.showProgress
        ? ({ current, total, message }) =>
            logger.progress(`Scanning ${current}/${total}: ${message ?? ""}`)
        : undefined,
    }
  );

  logger.clearProgress();
  return result;
}

/**
 * One-line description of a finished scan.
 */
export function formatScanStats(stats: ScanStats): string {
  let line = `Analyzed ${stats.filesScanned} files: ${stats.totalOccurrences} casts in ${stats.filesWithCasts} files`;
  if (stats.filesFailed > 0) {
    line += ` (${stats.filesFailed} unreadable)`;
  }
  if (stats.traversalAborted) {
    line += " (directory walk stopped early)";
  }
  return line;
}

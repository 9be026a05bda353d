/**
 * Analyze Directory Use Case
 *
 * Runs the scan phase: walk the tree, scan each file in turn, and
 * collect non-empty reports into a frozen ResultIndex.
 */

import type { FileSystem, Logger, ProgressInfo } from "../ports";
import type { AnalyzerConfig } from "../entities/config";
import type { ScanStats } from "../entities/occurrence";
import { ResultIndex } from "../services/resultIndex";
import { discoverFiles } from "./discoverFiles";
import { scanFile } from "./scanFile";

/**
 * Dependencies injected into the use case.
 */
export interface AnalyzeDirectoryDependencies {
  fileSystem: FileSystem;
  logger: Logger;
}

/**
 * Options for the scan phase.
 */
export interface AnalyzeDirectoryOptions {
  /** Directory to scan */
  rootDir: string;

  /** Validated analyzer configuration */
  config: AnalyzerConfig;

  /** Called before each file is read */
  onProgress?: (info: ProgressInfo) => void;
}

/**
 * Result of the scan phase.
 */
export interface AnalyzeResult {
  index: ResultIndex;
  stats: ScanStats;
}

/**
 * Scan every tracked file under rootDir.
 *
 * Files are read one at a time. Neither a traversal error nor a file
 * that cannot be opened stops the scan; both are logged and counted.
 */
export async function analyzeDirectory(
  deps: AnalyzeDirectoryDependencies,
  options: AnalyzeDirectoryOptions
): Promise<AnalyzeResult> {
  const { fileSystem, logger } = deps;
  const { rootDir, config, onProgress } = options;

  const discovery = discoverFiles(
    fileSystem,
    rootDir,
    config.extensions,
    logger
  );
  const files = discovery.files;

  const index = new ResultIndex();
  const stats: ScanStats = {
    filesDiscovered: files.length,
    filesScanned: 0,
    filesFailed: 0,
    filesWithCasts: 0,
    totalOccurrences: 0,
    traversalAborted: discovery.error !== undefined,
  };

  for (let i = 0; i < files.length; i++) {
    const filepath = files[i];
    onProgress?.({ current: i + 1, total: files.length, message: filepath });

    const outcome = await scanFile(fileSystem, filepath, logger, {
      contextRadius: config.contextRadius,
    });

    if (outcome.status === "failed") {
      stats.filesFailed++;
      continue;
    }

    stats.filesScanned++;
    const { report } = outcome;
    if (report.occurrences.length > 0) {
      index.insert(filepath, report);
      stats.filesWithCasts++;
      stats.totalOccurrences += report.occurrences.length;
      logger.debug(`  ${filepath}: ${report.occurrences.length} casts`);
    }
  }

  return { index: index.freeze(), stats };
}

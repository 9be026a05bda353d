/**
 * Discover Files Use Case
 *
 * Lists the source files under a root directory that the analyzer should scan.
 */

import type { FileSystem, Logger } from "../ports";
import { TraversalError } from "../entities/errors";

/**
 * Result of file discovery.
 */
export interface DiscoveryResult {
  /** Accepted paths, in walk order */
  files: string[];

  /** Present when the walk aborted; `files` holds what was found before it */
  error?: TraversalError;
}

/**
 * Check whether a path carries one of the tracked extensions.
 * The comparison is exact: '.CPP' does not match '.cpp'.
 */
export function hasTrackedExtension(
  fs: FileSystem,
  filepath: string,
  extensions: ReadonlySet<string>
): boolean {
  return extensions.has(fs.extname(filepath));
}

/**
 * Recursively find files with a tracked extension under rootDir.
 *
 * A directory that cannot be read stops the walk. The failure is logged
 * and returned, and files already found are kept.
 *
 * @param fs - FileSystem implementation (injected dependency)
 * @param rootDir - Directory to walk
 * @param extensions - Extensions to accept (with leading dot)
 * @param logger - Receives the traversal error, if any
 */
export function discoverFiles(
  fs: FileSystem,
  rootDir: string,
  extensions: readonly string[],
  logger: Logger
): DiscoveryResult {
  const tracked = new Set(extensions);
  const walk = fs.walk(rootDir, (filepath) =>
    hasTrackedExtension(fs, filepath, tracked)
  );

  if (walk.error === undefined) {
    return { files: walk.files };
  }

  const error = new TraversalError(rootDir, walk.error);
  logger.clearProgress();
  logger.error(error.message);
  return { files: walk.files, error };
}

/**
 * FileSystem Port
 *
 * Abstract interface for the filesystem operations the analyzer needs.
 * This keeps the scan use case independent of Node's fs module.
 */

/**
 * Outcome of walking a directory tree.
 */
export interface DirectoryWalk {
  /** Accepted file paths, in the order the walk reached them */
  files: string[];

  /**
   * Set when the walk stopped early. `files` still holds
   * everything accepted before the failure.
   */
  error?: unknown;
}

/**
 * Abstract filesystem interface.
 */
export interface FileSystem {
  /**
   * Read a file's content as UTF-8 string
   */
  readFile(filepath: string): Promise<string>;

  /**
   * Recursively list regular files under rootDir.
   * @param rootDir - Directory to start from
   * @param accept - Called with each file path; only accepted paths are returned
   */
  walk(rootDir: string, accept: (filepath: string) => boolean): DirectoryWalk;

  /**
   * Get file extension (including the leading dot)
   */
  extname(filepath: string): string;
}

/**
 * Config Entity
 *
 * Configuration for scanning a directory tree.
 */

/**
 * Analyzer configuration.
 */
export interface AnalyzerConfig {
  /** File extensions to scan, compared exactly (e.g. '.cpp', not 'CPP') */
  extensions: string[];

  /** Lines of context kept on each side of a match */
  contextRadius: number;
}

/**
 * Default file extensions to scan.
 */
export const DEFAULT_EXTENSIONS = [".cpp", ".h", ".hpp"];

/**
 * Default number of context lines before and after a match.
 */
export const DEFAULT_CONTEXT_RADIUS = 2;

/**
 * Create a default configuration.
 */
export function createDefaultConfig(): AnalyzerConfig {
  return {
    extensions: [...DEFAULT_EXTENSIONS],
    contextRadius: DEFAULT_CONTEXT_RADIUS,
  };
}

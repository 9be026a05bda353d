/**
 * Logger Port
 *
 * Abstract interface for progress and diagnostic messages.
 * Lets the scan use case report failures without knowing where the
 * output ends up (terminal, test buffer, nowhere).
 */

/**
 * Progress information for long-running operations
 */
export interface ProgressInfo {
  /** Current item being processed */
  current: number;
  /** Total number of items */
  total: number;
  /** Optional descriptive message */
  message?: string;
}

/**
 * Abstract logger interface.
 */
export interface Logger {
  /**
   * Log an info message (general progress updates)
   */
  info(message: string): void;

  /**
   * Log a warning message
   */
  warn(message: string): void;

  /**
   * Log an error message. Traversal and file-open failures land here.
   */
  error(message: string): void;

  /**
   * Log a debug message (only shown in verbose mode)
   */
  debug(message: string): void;

  /**
   * Log a progress update that can replace the current line.
   * In non-terminal environments this may just log normally.
   */
  progress(message: string): void;

  /**
   * Clear any inline progress output.
   * Call this before switching from progress() to info/warn/error.
   */
  clearProgress(): void;
}

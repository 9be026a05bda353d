/**
 * Error classes raised by the analyzer.
 * Each carries a stable code so callers can branch without matching messages.
 */

export type AnalyzerErrorCode =
  | "TRAVERSAL_ERROR"
  | "FILE_OPEN_ERROR"
  | "INVALID_SELECTION"
  | "CONFIG_ERROR";

/**
 * Base class for analyzer errors
 */
export class AnalyzerError extends Error {
  readonly code: AnalyzerErrorCode;

  constructor(message: string, code: AnalyzerErrorCode, cause?: unknown) {
    super(message, { cause });
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The root directory or one of its subdirectories could not be read.
 * The walk stops here; paths found before it are still scanned.
 */
export class TraversalError extends AnalyzerError {
  readonly rootDir: string;

  constructor(rootDir: string, cause?: unknown) {
    super(`Filesystem error: ${describeCause(cause)}`, "TRAVERSAL_ERROR", cause);
    this.rootDir = rootDir;
  }
}

/**
 * A candidate file could not be opened. It is left out of the index.
 */
export class FileOpenError extends AnalyzerError {
  readonly filepath: string;

  constructor(filepath: string, cause?: unknown) {
    super(`Failed to open file: ${filepath}`, "FILE_OPEN_ERROR", cause);
    this.filepath = filepath;
  }
}

/**
 * Menu input that is not a number or is out of range.
 */
export class InvalidSelectionError extends AnalyzerError {
  readonly input: string;

  constructor(message: string, input: string) {
    super(message, "INVALID_SELECTION");
    this.input = input;
  }
}

/**
 * Configuration rejected by validateConfig.
 */
export class ConfigError extends AnalyzerError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/**
 * Domain Entities
 *
 * Core data structures with no external dependencies.
 */

// Cast kinds - what the scanner looks for
export type { CastKind, CastDescriptor } from "./castKind";
export { CAST_KINDS } from "./castKind";

// Occurrences and per-file reports
export type { Occurrence, FileReport, ScanStats } from "./occurrence";

// Config - Analyzer configuration
export type { AnalyzerConfig } from "./config";
export {
  DEFAULT_EXTENSIONS,
  DEFAULT_CONTEXT_RADIUS,
  createDefaultConfig,
} from "./config";

// Errors
export type { AnalyzerErrorCode } from "./errors";
export {
  AnalyzerError,
  TraversalError,
  FileOpenError,
  InvalidSelectionError,
  ConfigError,
} from "./errors";

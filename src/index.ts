/**
 * castscan - heuristic finder for C++ cast operators
 *
 * Scans a directory tree for static_cast, dynamic_cast, const_cast and
 * reinterpret_cast, and indexes each match with its surrounding lines.
 * Matching is line-based and textual, not a C++ parser: casts inside
 * comments and string literals are reported too.
 *
 * @example
 * ```ts
 * import castscan, { formatSummary } from 'castscan';
 *
 * const { index, stats } = await castscan.analyze('/path/to/project');
 * console.log(formatSummary(index));
 * ```
 *
 * @example With options
 * ```ts
 * import castscan, { createSilentLogger } from 'castscan';
 *
 * await castscan.analyze('/path/to/project', {
 *   logger: createSilentLogger(),
 *   config: { extensions: ['.cc', '.hh'], contextRadius: 3 },
 * });
 * ```
 */

import { analyze, formatScanStats } from "./app/analyzer";

export { analyze, formatScanStats };
export type { AnalyzeOptions, AnalyzeResult } from "./app/analyzer";

// Query console and formatting
export {
  QueryConsole,
  MENU_COMMANDS,
  formatSummary,
  formatFileList,
  formatFileDetails,
  formatKindList,
  formatKindSearch,
  parseSelection,
} from "./app/console";
export type { MenuCommand, QueryConsoleOptions, ExitReason } from "./app/console";

// Domain
export {
  CAST_KINDS,
  createDefaultConfig,
  DEFAULT_EXTENSIONS,
  DEFAULT_CONTEXT_RADIUS,
  AnalyzerError,
  TraversalError,
  FileOpenError,
  InvalidSelectionError,
  ConfigError,
  ResultIndex,
  detectCasts,
  extractContext,
  validateConfig,
} from "./domain";
export type {
  CastKind,
  CastDescriptor,
  Occurrence,
  FileReport,
  ScanStats,
  AnalyzerConfig,
  LocatedOccurrence,
  Logger,
  FileSystem,
  DirectoryWalk,
  Prompt,
  OutputSink,
} from "./domain";

// Infrastructure
export {
  ConsoleLogger,
  InlineProgressLogger,
  SilentLogger,
  createLogger,
  createInlineLogger,
  createSilentLogger,
  NodeFileSystem,
  ReadlinePrompt,
} from "./infrastructure";

const castscan = {
  analyze,
};

export default castscan;

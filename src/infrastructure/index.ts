/**
 * Infrastructure Layer
 *
 * Contains adapters that implement domain ports.
 * These connect the domain to external systems (filesystem, terminal, console).
 */

// FileSystem
export { NodeFileSystem, nodeFileSystem } from "./filesystem";

// Config
export { resolveConfig } from "./config";

// Logger
export {
  ConsoleLogger,
  InlineProgressLogger,
  SilentLogger,
  createLogger,
  createInlineLogger,
  createSilentLogger,
  type LoggerOptions,
  type TextStream,
} from "./logger";

// Terminal
export { ReadlinePrompt, createTerminalPrompt } from "./terminal";

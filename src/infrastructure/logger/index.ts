/**
 * Logger Infrastructure
 *
 * Implements the Logger port with various logging strategies.
 */

export {
  ConsoleLogger,
  InlineProgressLogger,
  SilentLogger,
  createLogger,
  createInlineLogger,
  createSilentLogger,
  type LoggerOptions,
  type TextStream,
} from "./loggers";

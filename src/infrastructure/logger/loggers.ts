/**
 * Logger Implementations
 *
 * - ConsoleLogger: one line per message (default for library use)
 * - InlineProgressLogger: progress overwrites the current line (for the CLI)
 * - SilentLogger: no output (for tests and quiet callers)
 *
 * Info and debug go to the output stream; warnings and errors go to the
 * error stream, so scan failures end up on stderr.
 */

import type { Logger } from "../../domain/ports";

/**
 * Minimal writable stream, satisfied by process.stdout and process.stderr.
 */
export interface TextStream {
  write(chunk: string): unknown;
}

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Show debug messages */
  verbose?: boolean;
  /** Destination for info, debug and progress (default: process.stdout) */
  stdout?: TextStream;
  /** Destination for warnings and errors (default: process.stderr) */
  stderr?: TextStream;
}

/**
 * Standard line logger.
 * Progress messages are written as ordinary lines.
 */
export class ConsoleLogger implements Logger {
  protected readonly verbose: boolean;
  protected readonly stdout: TextStream;
  protected readonly stderr: TextStream;

  constructor(options?: LoggerOptions) {
    this.verbose = options?.verbose ?? false;
    this.stdout = options?.stdout ?? process.stdout;
    this.stderr = options?.stderr ?? process.stderr;
  }

  info(message: string): void {
    this.stdout.write(`${message}\n`);
  }

  warn(message: string): void {
    this.stderr.write(`${message}\n`);
  }

  error(message: string): void {
    this.stderr.write(`${message}\n`);
  }

  debug(message: string): void {
    if (this.verbose) {
      this.stdout.write(`${message}\n`);
    }
  }

  progress(message: string): void {
    this.stdout.write(`${message}\n`);
  }

  clearProgress(): void {
    // Nothing is left on the line
  }
}

/**
 * CLI logger with inline progress replacement.
 * Uses carriage return to overwrite progress lines in place.
 */
export class InlineProgressLogger extends ConsoleLogger {
  private lastProgressLength = 0;

  info(message: string): void {
    this.clearProgress();
    super.info(message);
  }

  warn(message: string): void {
    this.clearProgress();
    super.warn(message);
  }

  error(message: string): void {
    this.clearProgress();
    super.error(message);
  }

  debug(message: string): void {
    if (this.verbose) {
      this.clearProgress();
      super.debug(message);
    }
  }

  progress(message: string): void {
    // Pad with spaces to clear leftover characters from the previous update
    const padding = Math.max(0, this.lastProgressLength - message.length);
    this.stdout.write(`\r${message}${" ".repeat(padding)}`);
    this.lastProgressLength = message.length;
  }

  clearProgress(): void {
    if (this.lastProgressLength > 0) {
      this.stdout.write("\r" + " ".repeat(this.lastProgressLength) + "\r");
      this.lastProgressLength = 0;
    }
  }
}

/**
 * Silent logger that produces no output.
 */
export class SilentLogger implements Logger {
  info(): void {}
  warn(): void {}
  error(): void {}
  debug(): void {}
  progress(): void {}
  clearProgress(): void {}
}

/**
 * Create a standard line logger.
 */
export function createLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}

/**
 * Create an inline progress logger for CLI usage.
 */
export function createInlineLogger(options?: LoggerOptions): Logger {
  return new InlineProgressLogger(options);
}

/**
 * Create a silent logger.
 */
export function createSilentLogger(): Logger {
  return new SilentLogger();
}

/**
 * Test doubles shared across the suite.
 */

import * as path from "path";
import type {
  DirectoryWalk,
  FileSystem,
  Logger,
  Prompt,
} from "../domain/ports";

/**
 * In-memory FileSystem. Paths listed in `unreadable` are returned by the
 * walk but fail on read; `walkError` makes the walk stop after
 * `walkLimit` accepted files.
 */
export class MemoryFileSystem implements FileSystem {
  readonly reads: string[] = [];

  constructor(
    private readonly files: Record<string, string>,
    private readonly options: {
      unreadable?: string[];
      walkError?: Error;
      walkLimit?: number;
    } = {}
  ) {}

  async readFile(filepath: string): Promise<string> {
    this.reads.push(filepath);
    const content = this.files[filepath];
    if (content === undefined || this.options.unreadable?.includes(filepath)) {
      throw new Error(`ENOENT: no such file or directory, open '${filepath}'`);
    }
    return content;
  }

  walk(rootDir: string, accept: (filepath: string) => boolean): DirectoryWalk {
    const all = [...Object.keys(this.files), ...(this.options.unreadable ?? [])]
      .filter((p) => p.startsWith(rootDir))
      .filter((p, i, arr) => arr.indexOf(p) === i);

    const files: string[] = [];
    for (const filepath of all) {
      if (
        this.options.walkError &&
        files.length >= (this.options.walkLimit ?? 0)
      ) {
        return { files, error: this.options.walkError };
      }
      if (accept(filepath)) files.push(filepath);
    }
    return { files };
  }

  extname(filepath: string): string {
    return path.extname(filepath);
  }
}

/**
 * Logger that keeps every message for assertions.
 */
export class RecordingLogger implements Logger {
  readonly messages: { level: string; message: string }[] = [];

  info(message: string): void {
    this.messages.push({ level: "info", message });
  }
  warn(message: string): void {
    this.messages.push({ level: "warn", message });
  }
  error(message: string): void {
    this.messages.push({ level: "error", message });
  }
  debug(message: string): void {
    this.messages.push({ level: "debug", message });
  }
  progress(message: string): void {
    this.messages.push({ level: "progress", message });
  }
  clearProgress(): void {}

  at(level: string): string[] {
    return this.messages.filter((m) => m.level === level).map((m) => m.message);
  }
}

/**
 * Prompt that answers from a fixed script, then reports end of input.
 */
export class ScriptedPrompt implements Prompt {
  readonly questions: string[] = [];
  closed = false;
  private readonly answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string | null> {
    this.questions.push(question);
    return this.answers.shift() ?? null;
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Collects written text.
 */
export function createOutput(): { write: (text: string) => void; text: () => string } {
  const chunks: string[] = [];
  return {
    write: (text) => {
      chunks.push(text);
    },
    text: () => chunks.join(""),
  };
}

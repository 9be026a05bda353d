/**
 * Readline Prompt Adapter
 *
 * Implements the Prompt port over a readable stream using Node's readline.
 * Lines that arrive before they are asked for (piped input) are buffered.
 */

import * as readline from "readline";
import type { Prompt } from "../../domain/ports";
import type { TextStream } from "../logger";

export class ReadlinePrompt implements Prompt {
  private readonly rl: readline.Interface;
  private readonly output: TextStream;
  private readonly buffered: string[] = [];
  private pending: ((line: string | null) => void) | null = null;
  private ended = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: TextStream = process.stdout
  ) {
    this.output = output;
    this.rl = readline.createInterface({ input, terminal: false });

    this.rl.on("line", (line) => {
      const resolve = this.pending;
      if (resolve) {
        this.pending = null;
        resolve(line);
      } else {
        this.buffered.push(line);
      }
    });

    this.rl.on("close", () => {
      this.ended = true;
      const resolve = this.pending;
      if (resolve) {
        this.pending = null;
        resolve(null);
      }
    });
  }

  ask(question: string): Promise<string | null> {
    this.output.write(question);

    const next = this.buffered.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.ended) return Promise.resolve(null);

    return new Promise((resolve) => {
      this.pending = resolve;
    });
  }

  close(): void {
    this.rl.close();
  }
}

/**
 * Create a prompt bound to the process's stdin and stdout.
 */
export function createTerminalPrompt(): Prompt {
  return new ReadlinePrompt(process.stdin, process.stdout);
}

/**
 * Query Console
 *
 * Interactive menu loop over a completed ResultIndex.
 * Reads one selection per prompt and never modifies the index.
 */

import { CAST_KINDS, InvalidSelectionError } from "../../domain/entities";
import type { Prompt, OutputSink } from "../../domain/ports";
import type { ResultIndex } from "../../domain/services";
import {
  FILE_PROMPT,
  KIND_PROMPT,
  MENU_PROMPT,
  MENU_TEXT,
  formatFileDetails,
  formatFileList,
  formatKindList,
  formatKindSearch,
  formatSummary,
} from "./format";
import { parseSelection } from "./selection";

/**
 * Menu commands, in ordinal order (1-4).
 */
export type MenuCommand = "summary" | "file-detail" | "search-by-kind" | "exit";

export const MENU_COMMANDS: readonly MenuCommand[] = [
  "summary",
  "file-detail",
  "search-by-kind",
  "exit",
];

/**
 * Dependencies for a console session.
 */
export interface QueryConsoleOptions {
  /** Index built by the scan phase */
  index: ResultIndex;
  /** Source of input lines */
  prompt: Prompt;
  /** Destination of rendered text */
  write: OutputSink;
}

/**
 * How a console session ended.
 */
export type ExitReason = "exit" | "end-of-input";

export class QueryConsole {
  private readonly index: ResultIndex;
  private readonly prompt: Prompt;
  private readonly write: OutputSink;

  constructor(options: QueryConsoleOptions) {
    this.index = options.index;
    this.prompt = options.prompt;
    this.write = options.write;
  }

  /**
   * Run the menu loop until the user picks Exit or input ends.
   */
  async run(): Promise<ExitReason> {
    while (true) {
      this.write(MENU_TEXT);
      const answer = await this.prompt.ask(MENU_PROMPT);
      if (answer === null) return "end-of-input";

      let command: MenuCommand;
      try {
        const choice = parseSelection(
          answer,
          MENU_COMMANDS.length,
          "Invalid choice. Please try again."
        );
        command = MENU_COMMANDS[choice - 1];
      } catch (error) {
        this.reportInvalid(error);
        continue;
      }

      if (command === "exit") return "exit";

      const completed = await this.execute(command);
      if (!completed) return "end-of-input";
    }
  }

  /**
   * Run one non-exit command.
   * @returns false if input ended while the command was waiting for a selection
   */
  async execute(
    command: Exclude<MenuCommand, "exit">
  ): Promise<boolean> {
    switch (command) {
      case "summary":
        this.write(formatSummary(this.index));
        return true;
      case "file-detail":
        return this.showFileDetails();
      case "search-by-kind":
        return this.searchByKind();
    }
  }

  private async showFileDetails(): Promise<boolean> {
    const paths = this.index.paths();
    this.write(formatFileList(this.index));

    const answer = await this.prompt.ask(FILE_PROMPT);
    if (answer === null) return false;

    try {
      const choice = parseSelection(answer, paths.length, "Invalid file number.");
      this.write(formatFileDetails(this.index, paths[choice - 1]));
    } catch (error) {
      this.reportInvalid(error);
    }
    return true;
  }

  private async searchByKind(): Promise<boolean> {
    this.write(formatKindList());

    const answer = await this.prompt.ask(KIND_PROMPT);
    if (answer === null) return false;

    try {
      const choice = parseSelection(answer, CAST_KINDS.length, "Invalid cast type.");
      const { kind } = CAST_KINDS[choice - 1];
      this.write(formatKindSearch(this.index, kind));
    } catch (error) {
      this.reportInvalid(error);
    }
    return true;
  }

  private reportInvalid(error: unknown): void {
    if (!(error instanceof InvalidSelectionError)) throw error;
    this.write(`${error.message}\n`);
  }
}

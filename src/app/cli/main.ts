#!/usr/bin/env node
// Interactive CLI entry point for castscan

import { analyze, formatScanStats } from "../analyzer";
import { QueryConsole } from "../console";
import { createInlineLogger } from "../../infrastructure/logger";
import { createTerminalPrompt } from "../../infrastructure/terminal";

const logger = createInlineLogger();

async function main(): Promise<void> {
  const prompt = createTerminalPrompt();
  const write = (text: string) => {
    process.stdout.write(text);
  };

  write("=== C++ Cast Analyzer ===\n");
  const rootDir = await prompt.ask("Enter the directory path to analyze: ");
  if (rootDir === null) {
    prompt.close();
    return;
  }

  logger.info("Analyzing files...");
  const { index, stats } = await analyze(rootDir, {
    logger,
    showProgress: true,
  });
  logger.info(formatScanStats(stats));

  const session = new QueryConsole({ index, prompt, write });
  await session.run();
  prompt.close();
}

main().catch((error: unknown) => {
  logger.error(
    `Error: ${error instanceof Error ? error.message : String(error)}`
  );
  process.exit(1);
});

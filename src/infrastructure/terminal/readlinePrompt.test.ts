/**
 * Tests for the readline prompt adapter
 */

import { describe, test, expect } from "vitest";
import { PassThrough } from "stream";
import { ReadlinePrompt } from "./readlinePrompt";

function createOutput() {
  const chunks: string[] = [];
  return {
    write: (chunk: string) => chunks.push(chunk),
    text: () => chunks.join(""),
  };
}

describe("ReadlinePrompt", () => {
  test("answers questions line by line, then null at end of input", async () => {
    const input = new PassThrough();
    const output = createOutput();
    const prompt = new ReadlinePrompt(input, output);

    input.end("/src/project\n2\n");

    await expect(prompt.ask("Dir: ")).resolves.toBe("/src/project");
    await expect(prompt.ask("Choice: ")).resolves.toBe("2");
    await expect(prompt.ask("Choice: ")).resolves.toBeNull();
    expect(output.text()).toBe("Dir: Choice: Choice: ");

    prompt.close();
  });

  test("waits for input that arrives after the question", async () => {
    const input = new PassThrough();
    const prompt = new ReadlinePrompt(input, createOutput());

    const answer = prompt.ask("? ");
    input.write("4\n");

    await expect(answer).resolves.toBe("4");
    prompt.close();
  });

  test("resolves a pending question with null when closed", async () => {
    const input = new PassThrough();
    const prompt = new ReadlinePrompt(input, createOutput());

    const answer = prompt.ask("? ");
    prompt.close();

    await expect(answer).resolves.toBeNull();
  });
});

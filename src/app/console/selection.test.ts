import { describe, test, expect } from "vitest";
import { parseSelection } from "./selection";
import { InvalidSelectionError } from "../../domain/entities";

describe("parseSelection", () => {
  test("accepts integers in range, ignoring surrounding whitespace", () => {
    expect(parseSelection("1", 4, "bad")).toBe(1);
    expect(parseSelection(" 4 ", 4, "bad")).toBe(4);
    expect(parseSelection("03", 4, "bad")).toBe(3);
  });

  test.each(["0", "5", "", "abc", "2x", "-1", "1.5", "+2"])(
    "rejects %j",
    (input) => {
      expect(() => parseSelection(input, 4, "Invalid choice.")).toThrow(
        InvalidSelectionError
      );
    }
  );

  test("carries the caller's message and the raw input", () => {
    try {
      parseSelection("9", 2, "Invalid file number.");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidSelectionError);
      if (error instanceof InvalidSelectionError) {
        expect(error.message).toBe("Invalid file number.");
        expect(error.input).toBe("9");
        expect(error.code).toBe("INVALID_SELECTION");
      }
    }
  });

  test("rejects everything when there is nothing to select", () => {
    expect(() => parseSelection("1", 0, "Invalid file number.")).toThrow(
      "Invalid file number."
    );
  });
});

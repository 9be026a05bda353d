import { describe, test, expect } from "vitest";
import { CAST_KINDS } from "./castKind";

describe("CAST_KINDS", () => {
  test("lists the four operators in declared order", () => {
    expect(CAST_KINDS.map((d) => [d.kind, d.keyword])).toEqual([
      ["static_cast", "static_cast"],
      ["dynamic_cast", "dynamic_cast"],
      ["const_cast", "const_cast"],
      ["reinterpret_cast", "reinterpret_cast"],
    ]);
  });

  test("each pattern matches only its own keyword", () => {
    for (const { keyword, pattern } of CAST_KINDS) {
      const hits = CAST_KINDS.filter((other) =>
        other.pattern.test(`${keyword}<T>(v)`)
      ).map((other) => other.keyword);

      expect(hits).toEqual([keyword]);
      expect(pattern.test(`${keyword}(v)`)).toBe(false);
    }
  });
});

/**
 * Tests for cast detection
 *
 * Detection is a textual heuristic: these tests pin down what it
 * reports, including the matches a real parser would reject.
 */

import { describe, test, expect } from "vitest";
import { detectCasts, splitLines } from "./castDetector";

describe("splitLines", () => {
  test("splits on newlines without a trailing empty line", () => {
    expect(splitLines("a\nb\n")).toEqual(["a", "b"]);
    expect(splitLines("a\nb")).toEqual(["a", "b"]);
  });

  test("strips carriage returns", () => {
    expect(splitLines("a\r\nb\r\n")).toEqual(["a", "b"]);
  });

  test("keeps blank lines", () => {
    expect(splitLines("a\n\nb\n\n")).toEqual(["a", "", "b", ""]);
  });

  test("returns no lines for empty content", () => {
    expect(splitLines("")).toEqual([]);
  });
});

describe("detectCasts", () => {
  test("finds a static_cast with its line and context", () => {
    const lines = Array.from({ length: 10 }, (_, i) => `// line ${i + 1}`);
    lines[4] = "int x = static_cast<int>(y);";

    const occurrences = detectCasts(lines.join("\n"));

    expect(occurrences).toEqual([
      {
        kind: "static_cast",
        rawLine: "int x = static_cast<int>(y);",
        lineNumber: 5,
        contextBlock:
          "3: // line 3\n4: // line 4\n5: int x = static_cast<int>(y);\n6: // line 6\n7: // line 7\n",
      },
    ]);
  });

  test("recognises all four cast kinds", () => {
    const content = [
      "a = static_cast<int>(b);",
      "c = dynamic_cast<Derived*>(d);",
      "e = const_cast<char*>(f);",
      "g = reinterpret_cast<void*>(h);",
    ].join("\n");

    const kinds = detectCasts(content).map((o) => [o.kind, o.lineNumber]);
    expect(kinds).toEqual([
      ["static_cast", 1],
      ["dynamic_cast", 2],
      ["const_cast", 3],
      ["reinterpret_cast", 4],
    ]);
  });

  test("records one occurrence per kind per line", () => {
    const content = "return static_cast<double>(w) * static_cast<double>(h);";
    const occurrences = detectCasts(content);

    expect(occurrences).toHaveLength(1);
    expect(occurrences[0].kind).toBe("static_cast");
  });

  test("records each kind on a shared line in declared order", () => {
    const content = "f(const_cast<int*>(p), static_cast<long>(q));";
    const occurrences = detectCasts(content);

    expect(occurrences.map((o) => o.kind)).toEqual(["static_cast", "const_cast"]);
    expect(occurrences.every((o) => o.lineNumber === 1)).toBe(true);
  });

  test("allows whitespace around the template argument", () => {
    expect(detectCasts("x = static_cast <int> (y);")).toHaveLength(1);
    expect(detectCasts("x = static_cast\t<int>\t(y);")).toHaveLength(1);
  });

  test("matches nested template arguments", () => {
    const content = "auto m = static_cast<std::map<int, int>>(raw);";
    expect(detectCasts(content).map((o) => o.kind)).toEqual(["static_cast"]);
  });

  test("requires the angle brackets and the opening parenthesis", () => {
    expect(detectCasts("static_cast(y);")).toEqual([]);
    expect(detectCasts("using T = decltype(static_cast<int>);")).toEqual([]);
    expect(detectCasts("// mentions static_cast in prose")).toEqual([]);
  });

  test("does not follow a cast across lines", () => {
    const content = "x = static_cast<\n    int>(y);";
    expect(detectCasts(content)).toEqual([]);
  });

  test("reports casts inside comments and string literals", () => {
    const content = [
      "// static_cast<int>(legacy);",
      'const char* s = "reinterpret_cast<char*>(p)";',
    ].join("\n");

    expect(detectCasts(content).map((o) => [o.kind, o.lineNumber])).toEqual([
      ["static_cast", 1],
      ["reinterpret_cast", 2],
    ]);
  });

  test("does not require a word boundary before the keyword", () => {
    expect(detectCasts("my_static_cast<int>(x);").map((o) => o.kind)).toEqual([
      "static_cast",
    ]);
  });

  test("keeps line numbers within the file", () => {
    const content = "static_cast<int>(a);\n\nconst_cast<int*>(b);\n";
    const occurrences = detectCasts(content);
    const lineCount = splitLines(content).length;

    expect(occurrences.map((o) => o.lineNumber)).toEqual([1, 3]);
    for (const occ of occurrences) {
      expect(occ.lineNumber).toBeGreaterThanOrEqual(1);
      expect(occ.lineNumber).toBeLessThanOrEqual(lineCount);
    }
  });

  test("uses the configured context radius", () => {
    const content = "a\nb\nstatic_cast<int>(c);\nd\ne";
    const [occ] = detectCasts(content, { contextRadius: 0 });
    expect(occ.contextBlock).toBe("3: static_cast<int>(c);\n");
  });

  test("returns nothing for a file without casts", () => {
    expect(detectCasts("int main() {\n  return 0;\n}\n")).toEqual([]);
  });
});

import { describe, it, expect } from "vitest";
import { isBlankLine, parsePatternLine, renderRow, splitLines } from "../src/pattern_input.js";
import { defaultRules, mergeRules } from "../src/rules.js";

describe("splitLines", () => {
  it("drops the terminator and the empty tail after it", () => {
    expect(splitLines("#.#\n##\n")).toEqual([
      { text: "#.#", terminated: true },
      { text: "##", terminated: true },
    ]);
    expect(splitLines("")).toEqual([]);
  });

  it("marks a final line without a newline as unterminated", () => {
    expect(splitLines("#.#\n\n##")).toEqual([
      { text: "#.#", terminated: true },
      { text: "", terminated: true },
      { text: "##", terminated: false },
    ]);
  });

  it("flags only empty lines as blank", () => {
    expect(isBlankLine("")).toBe(true);
    expect(isBlankLine("...")).toBe(false);
  });
});

describe("parsePatternLine", () => {
  it("maps the input symbols to cells", () => {
    expect(parsePatternLine("#.#", defaultRules)).toBe("# #");
    expect(parsePatternLine("...", defaultRules)).toBe("   ");
  });

  it("rejects characters other than the two symbols", () => {
    expect(() => parsePatternLine("#x#", defaultRules)).toThrow('unexpected characters on a line: "x"');
    expect(() => parsePatternLine("##\r", defaultRules)).toThrow("unexpected characters on a line");
  });

  it("rejects lines longer than the configured limit", () => {
    const rules = mergeRules({ input: { max_line_length: 3 } });
    expect(parsePatternLine("#.#", rules)).toBe("# #");
    expect(() => parsePatternLine("#..#", rules)).toThrow("file contains lines longer than 3 characters");
  });

  it("counts the newline of a terminated line against the limit", () => {
    const rules = mergeRules({ input: { max_line_length: 3 } });
    expect(parsePatternLine("##", rules, true)).toBe("##");
    expect(() => parsePatternLine("#.#", rules, true)).toThrow("file contains lines longer than 3 characters");
  });
});

describe("renderRow", () => {
  it("maps cells back to the input symbols", () => {
    expect(renderRow("   # #   ", defaultRules)).toBe("...#.#...");
    const rules = mergeRules({ input: { empty: "-", filled: "x" } });
    expect(renderRow("  ##", rules)).toBe("--xx");
  });
});

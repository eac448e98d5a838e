import type { Verdict } from "./classifier.js";
import { isBlankLine, parsePatternLine, splitLines } from "./pattern_input.js";
import type { Rules } from "./rules.js";
import { simulate } from "./simulate.js";

// Lines are validated as they are reached: verdicts of the lines before a bad
// one are already emitted when it throws.
export function play(text: string, rules: Rules, emit: (verdict: Verdict) => void): number {
  let count = 0;
  for (const line of splitLines(text)) {
    if (isBlankLine(line.text)) continue;
    const row = parsePatternLine(line.text, rules, line.terminated);
    emit(simulate(row, { maxRounds: rules.simulation.max_rounds }).verdict);
    count++;
  }
  return count;
}

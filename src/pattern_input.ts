import { BLANK, FILLED } from "./line_buffer.js";
import type { Rules } from "./rules.js";
import { die } from "./util.js";

export type PatternLine = {
  text: string;
  terminated: boolean;
};

export function splitLines(text: string): PatternLine[] {
  if (text.length === 0) return [];
  const parts = text.split("\n");
  const lastTerminated = text.endsWith("\n");
  if (lastTerminated) parts.pop();
  return parts.map((part, i) => ({
    text: part,
    terminated: i < parts.length - 1 || lastTerminated,
  }));
}

export function isBlankLine(line: string): boolean {
  return line.length === 0;
}

// The length limit counts the line terminator, when there is one.
export function parsePatternLine(line: string, rules: Rules, terminated = false): string {
  const { empty, filled, max_line_length } = rules.input;
  if (line.length + (terminated ? 1 : 0) > max_line_length) {
    die(`file contains lines longer than ${max_line_length} characters`);
  }
  let row = "";
  for (const ch of line) {
    if (ch === empty) row += BLANK;
    else if (ch === filled) row += FILLED;
    else die(`unexpected characters on a line: "${ch}"`);
  }
  return row;
}

export function renderRow(row: string, rules: Rules): string {
  let out = "";
  for (const ch of row) out += ch === BLANK ? rules.input.empty : rules.input.filled;
  return out;
}

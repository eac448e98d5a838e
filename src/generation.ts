import { padTrimLine, strip } from "./line_buffer.js";

export type Generation = Readonly<{
  // at least 3 leading and exactly 3 trailing blanks
  content: string;
  contentStripped: string;
  length: number;
  // round that produced the row, 0 for the input row
  ordinal: number;
}>;

export function makeGeneration(content: string, ordinal: number): Generation {
  return Object.freeze({
    content,
    contentStripped: strip(content),
    length: content.length,
    ordinal,
  });
}

export function seedGeneration(row: string): Generation {
  return makeGeneration(padTrimLine(row), 0);
}

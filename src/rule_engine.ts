import { makeGeneration, type Generation } from "./generation.js";
import { BLANK, FILLED, countFilled, firstFilledIndex, lastFilledIndex, padTrimLine } from "./line_buffer.js";

const WINDOW = 5;
const REACH = 2;

// A blank cell fills when 2 or 3 cells of its 5-cell window are filled. A filled
// cell stays when 2 or 4 neighbors are, i.e. 3 or 5 counting itself.
export function nextCell(center: string, filledCount: number): string {
  if (center === BLANK) {
    return filledCount === 2 || filledCount === 3 ? FILLED : BLANK;
  }
  return filledCount === 3 || filledCount === 5 ? FILLED : BLANK;
}

export function advance(previous: Generation): Generation {
  const above = previous.content;
  const cells: string[] = new Array<string>(above.length).fill(BLANK);
  const start = firstFilledIndex(above) - 1;
  const stop = lastFilledIndex(above) + 1;

  for (let i = Math.max(0, start); i <= stop && i < above.length; i++) {
    const filled = countFilled(above, WINDOW, i - REACH);
    cells[i] = nextCell(above[i] ?? BLANK, filled);
  }

  return makeGeneration(padTrimLine(cells.join("")), previous.ordinal + 1);
}

export const BLANK = " ";
export const FILLED = "#";

// Cells of reach needed on each side of the filled region for the 5-cell window.
export const PAD = 3;

export function blanks(n: number): string {
  return n > 0 ? BLANK.repeat(n) : "";
}

export function stripLeft(line: string): string {
  let i = 0;
  while (i < line.length && line[i] === BLANK) i++;
  return line.slice(i);
}

export function stripRight(line: string): string {
  let end = line.length;
  while (end > 0 && line[end - 1] === BLANK) end--;
  return line.slice(0, end);
}

export function strip(line: string): string {
  return stripRight(stripLeft(line));
}

export function firstFilledIndex(line: string): number {
  for (let i = 0; i < line.length; i++) {
    if (line[i] !== BLANK) return i;
  }
  return line.length;
}

// An all-blank line yields line.length here too, not -1.
export function lastFilledIndex(line: string): number {
  for (let i = line.length - 1; i >= 0; i--) {
    if (line[i] !== BLANK) return i;
  }
  return line.length;
}

export function countFilled(line: string, windowLength: number, start = 0): number {
  let filled = 0;
  for (let i = start; i < start + windowLength; i++) {
    if (i < 0 || i >= line.length) continue;
    if (line[i] !== BLANK) filled++;
  }
  return filled;
}

// At least PAD leading blanks (they carry position) and exactly PAD trailing ones.
export function padTrimLine(line: string): string {
  const first = firstFilledIndex(line);
  if (first === line.length) return blanks(PAD);
  const last = lastFilledIndex(line);
  const leftPad = Math.max(0, PAD - first);
  return blanks(leftPad) + line.slice(0, last + 1) + blanks(PAD);
}

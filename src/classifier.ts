import { earlier, latest, type History } from "./history.js";

export const VERDICTS = ["vanishing", "blinking", "gliding", "other"] as const;
export type Verdict = (typeof VERDICTS)[number];

export const MAX_ROUNDS = 100;

export function classify(history: History, maxRounds = MAX_ROUNDS): Verdict | undefined {
  const last = latest(history);
  // vanishing: no filled cell left on the row
  if (last.contentStripped === "") return "vanishing";

  for (const prev of earlier(history)) {
    // blinking: same cells at the same position as some earlier row
    if (last.content === prev.content) return "blinking";
    // gliding: same shape as some earlier row, shifted
    if (last.contentStripped === prev.contentStripped) return "gliding";
  }

  if (history.generations.length >= maxRounds) return "other";
  return undefined;
}

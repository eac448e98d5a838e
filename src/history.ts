import type { Generation } from "./generation.js";
import { die } from "./util.js";

export type History = {
  readonly generations: Generation[];
};

export function newHistory(seed: Generation): History {
  const history: History = { generations: [] };
  pushGeneration(history, seed);
  return history;
}

export function pushGeneration(history: History, generation: Generation): void {
  const next = history.generations.length;
  if (generation.ordinal !== next) {
    die(`generation ${generation.ordinal} out of order: expected round ${next}`);
  }
  history.generations.push(generation);
}

export function generationAt(history: History, index: number): Generation {
  const g = history.generations[index];
  return g ?? die(`no generation at index ${index} (history has ${history.generations.length})`);
}

export function latest(history: History): Generation {
  return generationAt(history, history.generations.length - 1);
}

// Every generation before the latest, newest first.
export function* earlier(history: History): IterableIterator<Generation> {
  for (let i = history.generations.length - 2; i >= 0; i--) {
    yield generationAt(history, i);
  }
}

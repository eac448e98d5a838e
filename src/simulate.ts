#!/usr/bin/env node
import { classify, MAX_ROUNDS, type Verdict } from "./classifier.js";
import { seedGeneration, type Generation } from "./generation.js";
import { latest, newHistory, pushGeneration, type History } from "./history.js";
import { parsePatternLine, renderRow } from "./pattern_input.js";
import { advance } from "./rule_engine.js";
import { loadRules } from "./rules.js";
import { die, isMainModule, usage } from "./util.js";

export type SimulateOptions = {
  maxRounds?: number;
  onGeneration?: (generation: Generation) => void;
};

export type SimulationResult = {
  verdict: Verdict;
  history: History;
};

export function seedHistory(row: string): History {
  return newHistory(seedGeneration(row));
}

// Terminates: the classifier reports "other" once maxRounds generations exist.
export function simulate(row: string, opts: SimulateOptions = {}): SimulationResult {
  const maxRounds = opts.maxRounds ?? MAX_ROUNDS;
  if (!Number.isInteger(maxRounds) || maxRounds < 2) {
    die(`maxRounds must be an integer >= 2, got ${maxRounds}`);
  }
  const history = seedHistory(row);
  opts.onGeneration?.(latest(history));

  let verdict: Verdict | undefined;
  while (verdict === undefined) {
    const next = advance(latest(history));
    pushGeneration(history, next);
    opts.onGeneration?.(next);
    verdict = classify(history, maxRounds);
  }
  return { verdict, history };
}

if (isMainModule(import.meta.url)) {
  const [pattern, rulesPath] = process.argv.slice(2);
  if (!pattern) usage("node dist/simulate.js <pattern> [rules.yaml]");
  try {
    const rules = loadRules(rulesPath);
    const row = parsePatternLine(pattern, rules);
    const { verdict } = simulate(row, {
      maxRounds: rules.simulation.max_rounds,
      onGeneration: (g) => process.stdout.write(`${String(g.ordinal).padStart(3)} ${renderRow(g.content, rules)}\n`),
    });
    process.stdout.write(`${verdict}\n`);
  } catch (e) {
    console.error(`ERROR: ${e instanceof Error ? e.message : String(e)}`);
    process.exit(1);
  }
}

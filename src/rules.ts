import yaml from "js-yaml";
import { MAX_ROUNDS } from "./classifier.js";
import { die, readText } from "./util.js";

type RawSection = Record<string, unknown>;

export type Rules = {
  simulation: {
    max_rounds: number;
  };
  input: {
    max_line_length: number;
    empty: string;
    filled: string;
  };
};

export const defaultRules: Rules = {
  simulation: {
    max_rounds: MAX_ROUNDS,
  },
  input: {
    // Reasonable upper bound for one pattern line; raise it in the rules file if needed.
    max_line_length: 1024 * 10,
    empty: ".",
    filled: "#",
  },
};

function asNum(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}

function asSymbol(v: unknown, name: string): string | undefined {
  if (v === undefined || v === null) return undefined;
  const s = String(v);
  if (s.length !== 1) die(`input.${name} must be a single character, got "${s}"`);
  return s;
}

function isMapping(v: unknown): v is RawSection {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function section(raw: unknown, key: string): RawSection {
  if (!isMapping(raw)) return {};
  const value = raw[key];
  if (value === undefined || value === null) return {};
  return isMapping(value) ? value : die(`rules: "${key}" must be a mapping`);
}

export function mergeRules(raw: unknown): Rules {
  const sim = section(raw, "simulation");
  const inp = section(raw, "input");

  const maxRounds = asNum(sim.max_rounds) ?? defaultRules.simulation.max_rounds;
  if (!Number.isInteger(maxRounds) || maxRounds < 2) {
    die(`simulation.max_rounds must be an integer >= 2, got ${maxRounds}`);
  }
  const maxLineLength = asNum(inp.max_line_length) ?? defaultRules.input.max_line_length;
  if (!Number.isInteger(maxLineLength) || maxLineLength < 1) {
    die(`input.max_line_length must be a positive integer, got ${maxLineLength}`);
  }
  const empty = asSymbol(inp.empty, "empty") ?? defaultRules.input.empty;
  const filled = asSymbol(inp.filled, "filled") ?? defaultRules.input.filled;
  if (empty === filled) die(`input.empty and input.filled must differ, both are "${empty}"`);

  return {
    simulation: { max_rounds: maxRounds },
    input: { max_line_length: maxLineLength, empty, filled },
  };
}

export function loadRules(path?: string): Rules {
  if (!path) return defaultRules;
  return mergeRules(yaml.load(readText(path)));
}

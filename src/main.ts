#!/usr/bin/env node
import { play } from "./play.js";
import { loadRules } from "./rules.js";
import { readText, usage } from "./util.js";

async function main() {
  const [textPath, rulesPath] = process.argv.slice(2);
  if (!textPath) usage("node dist/main.js <textfile> [rules.yaml]");
  const rules = loadRules(rulesPath);
  const text = readText(textPath);
  play(text, rules, (verdict) => process.stdout.write(`${verdict}\n`));
}

main().catch((e) => {
  console.error(`ERROR: ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
});

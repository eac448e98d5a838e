import fs from "fs";
import { fileURLToPath } from "url";
import { afterEach, describe, it, expect, vi } from "vitest";
import { usage } from "../src/util.js";

function firstLine(name: string): string {
  const text = fs.readFileSync(fileURLToPath(new URL(`../src/${name}`, import.meta.url)), "utf8");
  return text.split("\n")[0] ?? "";
}

describe("command entry points", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("start with a node shebang so the bin links run", () => {
    expect(firstLine("main.ts")).toBe("#!/usr/bin/env node");
    expect(firstLine("simulate.ts")).toBe("#!/usr/bin/env node");
  });

  it("print usage to stdout and exit 0", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const exit = vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
    expect(() => usage("node dist/main.js <textfile> [rules.yaml]")).toThrow("exit 0");
    expect(log).toHaveBeenCalledWith("Usage: node dist/main.js <textfile> [rules.yaml]");
    expect(exit).toHaveBeenCalledWith(0);
  });
});

import fs from "fs";
import { pathToFileURL } from "url";

export function die(msg: string): never {
  throw new Error(msg);
}

export function readText(path: string): string {
  try {
    return fs.readFileSync(path, "utf8");
  } catch {
    return die(`failed to open file: "${path}"`);
  }
}

export function usage(synopsis: string): never {
  console.log(`Usage: ${synopsis}`);
  process.exit(0);
}

export function isMainModule(metaUrl: string): boolean {
  return !!process.argv[1] && metaUrl === pathToFileURL(process.argv[1]).href;
}

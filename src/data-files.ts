import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const here = path.dirname(fileURLToPath(import.meta.url));

// Sources run from src/, the build from dist/src/.
const CANDIDATE_DIRS = [path.join(here, "..", "data"), path.join(here, "..", "..", "data")];

export function resolveDataFile(name: string): string {
  for (const dir of CANDIDATE_DIRS) {
    const file = path.join(dir, name);
    if (fs.existsSync(file)) {
      return file;
    }
  }
  throw new Error(`Data file not found: ${name}`);
}

export function readDataFile(name: string): unknown {
  return JSON.parse(fs.readFileSync(resolveDataFile(name), "utf-8"));
}

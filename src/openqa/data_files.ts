// src/openqa/data_files.ts
import { existsSync, readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { isAbsolute } from "node:path";
import { fileURLToPath } from "node:url";

// data/ sits two levels above the sources and three above the build output
const CANDIDATES = [
  "../../data/",     // src/openqa/data_files.ts
  "../../../data/",  // dist/src/openqa/data_files.js
];

/** Locate a file under the repo's `data/` directory from either the sources or the build output. */
export function dataFilePath(name: string): string {
  for (const rel of CANDIDATES) {
    const p = fileURLToPath(new URL(rel + name, import.meta.url));
    if (existsSync(p)) return p;
  }
  throw new Error(`data file not found: ${name} (looked in ${CANDIDATES.join(", ")} relative to ${import.meta.url})`);
}

/** Absolute paths pass through; anything else is looked up under `data/`. */
export function resolveDataPath(p: string): string {
  return isAbsolute(p) ? p : dataFilePath(p);
}

export function readDataJsonSync(name: string): unknown {
  return JSON.parse(readFileSync(dataFilePath(name), "utf8"));
}

export async function readJsonFile(path: string): Promise<unknown> {
  const text = await readFile(path, "utf8");
  try {
    return JSON.parse(text);
  } catch (e: unknown) {
    throw new Error(`${path}: invalid JSON (${e instanceof Error ? e.message : String(e)})`);
  }
}

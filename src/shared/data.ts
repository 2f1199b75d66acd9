import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { ConfigError } from "./errors.js";

// Sources live in src/shared, compiled output in dist/src/shared.
const DATA_DIR_CANDIDATES = ["../../data/", "../../../data/"];

export function dataFilePath(name: string): string {
  for (const dir of DATA_DIR_CANDIDATES) {
    const candidate = fileURLToPath(new URL(dir + name, import.meta.url));
    if (existsSync(candidate)) return candidate;
  }
  throw new ConfigError(`Data file ${name} not found`);
}

/** Parsed contents of a bundled JSON table; callers validate the shape. */
export function readDataFile(name: string): unknown {
  const file = dataFilePath(name);
  try {
    return JSON.parse(readFileSync(file, "utf8"));
  } catch (err) {
    throw new ConfigError(`Data file ${file} is not valid JSON: ${String(err)}`);
  }
}

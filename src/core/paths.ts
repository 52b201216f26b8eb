import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const HERE = path.dirname(fileURLToPath(import.meta.url));

/**
 * Locate a top-level project directory (`config`, `schemas`) from either the TypeScript
 * sources (src/core) or the compiled output (dist/src/core).
 */
export function projectDir(name: string): string {
  const candidates = [path.resolve(HERE, "../..", name), path.resolve(HERE, "../../..", name)];
  return candidates.find((c) => fs.existsSync(c)) ?? candidates[0];
}

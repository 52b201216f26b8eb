import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { projectDir } from "../core/paths.js";
import type { FleetConfig } from "../types/config.js";

export const ENV_PREFIX = "FLEET_";

type Tree = Record<string, unknown>;

function isTree(v: unknown): v is Tree {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Tree, override: Tree): Tree {
  const result: Tree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const prev = result[key];
    if (isTree(val) && isTree(prev)) {
      result[key] = deepMerge(prev, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Tree {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isTree(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/**
 * Apply FLEET_ prefixed environment variable overrides.
 * FLEET_STATE_DIR → state_dir; a double underscore descends: FLEET_SERVER__PORT → server.port.
 * Values are read as YAML scalars so numbers and booleans keep their type.
 */
export function applyEnvOverrides(config: Tree, env: NodeJS.ProcessEnv = process.env): Tree {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((s) => s.length > 0);
    if (segments.length === 0) continue;

    let patch: Tree = { [segments[segments.length - 1]]: parseScalar(value) };
    for (let i = segments.length - 2; i >= 0; i--) {
      patch = { [segments[i]]: patch };
    }
    result = deepMerge(result, patch);
  }
  return result;
}

function parseScalar(value: string): unknown {
  try {
    const parsed: unknown = YAML.parse(value);
    return isTree(parsed) || Array.isArray(parsed) ? value : parsed;
  } catch {
    return value;
  }
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← environment variables.
 * The result is unvalidated; pass it through `validateConfig` before use.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): FleetConfig {
  const dir = configDir ?? projectDir("config");

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }
  merged = applyEnvOverrides(merged, env);

  return merged as unknown as FleetConfig;
}

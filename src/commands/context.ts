import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { ValidationError } from "../core/errors.js";
import { buildRuntime, type FleetRuntime, type RuntimeAccess, type RuntimeOverrides } from "../runtime.js";
import type { FleetConfig } from "../types/config.js";

export type ConfigOpts = {
  configDir?: string;
  /** Overlay file name without extension, e.g. "production". */
  env?: string;
  schemaDir?: string;
};

/** Load and validate the layered configuration; invalid config is a ValidationError. */
export async function loadValidConfig(opts: ConfigOpts): Promise<FleetConfig> {
  const configDir = opts.configDir ? path.resolve(opts.configDir) : undefined;
  const config = loadConfig(opts.env, configDir);
  const check = await validateConfig(config, opts.schemaDir);
  if (!check.valid) {
    throw new ValidationError(`Invalid configuration: ${check.errors ?? "unknown error"}`);
  }
  return config;
}

export async function openRuntime(
  opts: ConfigOpts,
  overrides?: RuntimeOverrides,
  access: RuntimeAccess = "exclusive",
  role = "cli",
): Promise<FleetRuntime> {
  return buildRuntime(await loadValidConfig(opts), overrides, access, role);
}

/**
 * Run `fn` against a runtime and close it afterwards. Commands that change state open
 * it exclusive and so refuse while a server holds the state directory.
 */
export async function withRuntime<R>(
  opts: ConfigOpts,
  access: RuntimeAccess,
  fn: (rt: FleetRuntime) => Promise<R>,
  overrides?: RuntimeOverrides,
): Promise<R> {
  const rt = await openRuntime(opts, overrides, access);
  try {
    return await fn(rt);
  } finally {
    await rt.close();
  }
}

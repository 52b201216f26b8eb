import fs from "node:fs";
import path from "node:path";
import { validateRepositoryUrl, validateRetention } from "../backup/validation.js";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { errorMessage } from "../core/errors.js";
import { projectDir } from "../core/paths.js";
import { SchemaRegistry } from "../schema/registry.js";
import type { FleetConfig } from "../types/config.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
};

export type ValidateResult = { ok: true; warnings: Diagnostic[] } | { ok: false; errors: Diagnostic[] };

/** Request schemas the API cannot start without. */
export const REQUEST_SCHEMAS = ["handshake", "decision", "dispatch"] as const;

function diag(level: Diagnostic["level"], code: string, message: string, filePath?: string): Diagnostic {
  return filePath === undefined ? { level, code, message } : { level, code, message, path: filePath };
}

export async function validateAll(opts: { configDir: string; env?: string; schemaDir?: string }): Promise<ValidateResult> {
  const configDir = path.resolve(opts.configDir);
  const schemaDir = opts.schemaDir ? path.resolve(opts.schemaDir) : projectDir("schemas");

  if (!fs.existsSync(configDir)) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`, configDir)] };
  }
  if (!fs.existsSync(schemaDir)) {
    return { ok: false, errors: [diag("error", "SCHEMA_DIR_MISSING", `Schema directory not found: ${schemaDir}`, schemaDir)] };
  }

  const diagnostics: Diagnostic[] = [];

  let config: FleetConfig | null = null;
  try {
    config = loadConfig(opts.env, configDir);
  } catch (e) {
    diagnostics.push(diag("error", "CONFIG_READ_FAILED", `Failed to read config: ${errorMessage(e)}`, configDir));
  }

  if (config) {
    const check = await validateConfig(config, schemaDir);
    if (!check.valid) {
      diagnostics.push(diag("error", "CONFIG_INVALID", `Config invalid: ${check.errors ?? "unknown error"}`, configDir));
    } else {
      diagnostics.push(...checkSemantics(config));
    }
  }

  const registry = new SchemaRegistry(schemaDir);
  await registry.load();
  for (const name of registry.missing(REQUEST_SCHEMAS)) {
    diagnostics.push(diag("error", "SCHEMA_MISSING", `Missing schema: ${name}.schema.json`, schemaDir));
  }
  for (const [name, error] of Object.entries(await registry.compileAll(REQUEST_SCHEMAS))) {
    diagnostics.push(diag("error", "SCHEMA_INVALID", `Schema ${name} does not compile: ${error}`, schemaDir));
  }

  const errors = diagnostics.filter((d) => d.level === "error");
  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, warnings: diagnostics.filter((d) => d.level === "warn") };
}

/** Checks the schema cannot express: backup prerequisites and an empty command allowlist. */
function checkSemantics(config: FleetConfig): Diagnostic[] {
  const out: Diagnostic[] = [];

  if (config.commands.allowed_functions.length === 0) {
    out.push(diag("warn", "COMMANDS_NONE_ALLOWED", "commands.allowed_functions is empty; every dispatch will be refused"));
  }
  if (config.operators.length === 0) {
    out.push(diag("warn", "NO_OPERATORS", "No operators configured; only handshakes will be accepted over HTTP"));
  }

  if (config.backup.enabled) {
    try {
      validateRepositoryUrl(config.backup.repository_url);
      validateRetention(config.backup.retention);
    } catch (e) {
      out.push(diag("error", "BACKUP_INVALID", errorMessage(e)));
    }
    if (!fs.existsSync(config.backup.passphrase_file)) {
      out.push(diag("error", "BACKUP_PASSPHRASE_MISSING", "backup.passphrase_file does not exist", config.backup.passphrase_file));
    }
    const keyFile = config.backup.ssh_key_file;
    if (keyFile && !fs.existsSync(keyFile)) {
      out.push(diag("error", "BACKUP_KEY_MISSING", "backup.ssh_key_file does not exist", keyFile));
    }
  }
  return out;
}

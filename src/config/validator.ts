import fs from "node:fs";
import path from "node:path";
import { projectDir } from "../core/paths.js";
import { compileSchema, loadAjv } from "../schema/ajv.js";
import type { FleetConfig } from "../types/config.js";

export type ConfigValidationResult = {
  valid: boolean;
  errors: string | null;
};

/** Validate a loaded config against schemas/config.schema.json, plus cross-field rules. */
export async function validateConfig(config: FleetConfig, schemaDir?: string): Promise<ConfigValidationResult> {
  const schemaPath = path.join(schemaDir ?? projectDir("schemas"), "config.schema.json");
  const schema: unknown = JSON.parse(fs.readFileSync(schemaPath, "utf8"));

  const ajv = await loadAjv();
  const validate = compileSchema(ajv, schema);
  if (!validate(config)) {
    return { valid: false, errors: ajv.errorsText(validate.errors) };
  }

  const problems: string[] = [];
  if (config.commands.default_timeout_seconds > config.commands.max_timeout_seconds) {
    problems.push("commands.default_timeout_seconds must not exceed commands.max_timeout_seconds");
  }
  if (config.backup.enabled && config.backup.repository_url.trim().length === 0) {
    problems.push("backup.repository_url is required when backup.enabled is true");
  }
  const subjects = new Set<string>();
  for (const op of config.operators) {
    if (subjects.has(op.subject)) problems.push(`operators: duplicate subject ${op.subject}`);
    subjects.add(op.subject);
  }

  return problems.length > 0 ? { valid: false, errors: problems.join(", ") } : { valid: true, errors: null };
}

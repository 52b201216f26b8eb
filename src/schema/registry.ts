import { readFile, readdir, stat } from "node:fs/promises";
import path from "node:path";
import { projectDir } from "../core/paths.js";
import { errorMessage } from "../core/errors.js";
import { compileSchema, loadAjv, type AjvInstance, type AjvValidateFn } from "./ajv.js";

const SCHEMA_SUFFIX = ".schema.json";
const DEFAULT_VERSION = "1.0.0";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type SchemaCheck = { valid: boolean; errors: string | null };

/** Per-schema compile failure, keyed by schema name. */
export type CompileFailures = Record<string, string>;

/**
 * Request and config schemas of one directory (`<name>.schema.json`). Validators are
 * compiled on first use and shared by every request after that.
 */
export class SchemaRegistry {
  private readonly entries = new Map<string, SchemaEntry>();
  private readonly validators = new Map<string, AjvValidateFn>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  async load(): Promise<void> {
    const info = await stat(this.schemaDir).catch(() => null);
    if (!info?.isDirectory()) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    for (const file of (await readdir(this.schemaDir)).filter((f) => f.endsWith(SCHEMA_SUFFIX))) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(await readFile(filePath, "utf8"));
      const name = file.slice(0, -SCHEMA_SUFFIX.length);
      this.entries.set(name, { name, version: versionOf(schema), filePath, schema });
    }
    this.ajv = await loadAjv();
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  versions(): Record<string, string> {
    return Object.fromEntries(this.names().map((name) => [name, this.entries.get(name)?.version ?? DEFAULT_VERSION]));
  }

  /** Names from `required` with no schema file. */
  missing(required: readonly string[]): string[] {
    return required.filter((name) => !this.entries.has(name));
  }

  /** Compile each named schema that exists and collect the ones ajv refuses. */
  async compileAll(names: readonly string[]): Promise<CompileFailures> {
    const failures: CompileFailures = {};
    for (const name of names) {
      if (!this.entries.has(name)) continue;
      try {
        await this.validator(name);
      } catch (e) {
        failures[name] = errorMessage(e);
      }
    }
    return failures;
  }

  async validate(name: string, data: unknown): Promise<SchemaCheck> {
    const validate = await this.validator(name);
    if (validate(data)) return { valid: true, errors: null };
    return { valid: false, errors: (await this.instance()).errorsText(validate.errors) };
  }

  private async validator(name: string): Promise<AjvValidateFn> {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) throw new Error(`Schema not found: ${name}`);

    const validate = compileSchema(await this.instance(), entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  private async instance(): Promise<AjvInstance> {
    if (!this.ajv) this.ajv = await loadAjv();
    return this.ajv;
  }
}

/** `$id` values end in `@x.y.z`. */
function versionOf(schema: unknown): string {
  if (typeof schema !== "object" || schema === null) return DEFAULT_VERSION;
  const id: unknown = Reflect.get(schema, "$id");
  const m = typeof id === "string" ? /@(\d+\.\d+\.\d+)$/.exec(id) : null;
  return m ? m[1] : DEFAULT_VERSION;
}

export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? projectDir("schemas"));
  await registry.load();
  return registry;
}

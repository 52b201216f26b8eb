import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  getSchema: (keyRef: string) => AjvValidateFn | undefined;
  errorsText: (errors: unknown) => string;
};

let shared: AjvInstance | null = null;

/**
 * Strict draft 2020-12 validator with formats. Union types are allowed for nullable
 * configuration fields such as `ssh_key_file: string | null`.
 */
export async function loadAjv(): Promise<AjvInstance> {
  if (shared) return shared;

  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true, allowUnionTypes: true });
  add(ajv);

  shared = ajv;
  return ajv;
}

/** Compile once per `$id`; ajv refuses to register the same id twice. */
export function compileSchema(ajv: AjvInstance, schema: unknown): AjvValidateFn {
  const id = schemaId(schema);
  if (id) {
    const existing = ajv.getSchema(id);
    if (existing) return existing;
  }
  return ajv.compile(schema);
}

function schemaId(schema: unknown): string | null {
  if (typeof schema !== "object" || schema === null || !("$id" in schema)) return null;
  const id = schema.$id;
  return typeof id === "string" ? id : null;
}

import { ValidationError } from "../core/errors.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { CommandPayload, ExecutionState } from "../types/command.js";
import type { TrustState } from "../types/minion.js";

export type HandshakeRequest = { id: string; fingerprint: string };

export type DecisionRequest =
  | { id: string; decision: "accept"; fingerprint: string }
  | { id: string; decision: "reject" };

export type DispatchBody = { targetId: string; payload: CommandPayload; timeout?: number };

const TRUST_STATES: readonly TrustState[] = ["pending", "accepted", "rejected"];
const EXECUTION_STATES: readonly ExecutionState[] = ["queued", "running", "completed", "failed", "timed_out"];

async function requireValid(registry: SchemaRegistry, schema: string, body: unknown): Promise<object> {
  const check = await registry.validate(schema, body);
  if (!check.valid || typeof body !== "object" || body === null) {
    throw new ValidationError(`Invalid ${schema} request: ${check.errors ?? "body must be an object"}`);
  }
  return body;
}

function str(obj: object, key: string): string {
  const v: unknown = Reflect.get(obj, key);
  if (typeof v !== "string") throw new ValidationError(`${key} must be a string`);
  return v;
}

function optionalInt(obj: object, key: string): number | undefined {
  const v: unknown = Reflect.get(obj, key);
  if (v === undefined) return undefined;
  if (typeof v !== "number" || !Number.isInteger(v)) throw new ValidationError(`${key} must be an integer`);
  return v;
}

export async function parseHandshake(registry: SchemaRegistry, body: unknown): Promise<HandshakeRequest> {
  const data = await requireValid(registry, "handshake", body);
  return { id: str(data, "id"), fingerprint: str(data, "fingerprint") };
}

export async function parseDecision(registry: SchemaRegistry, body: unknown): Promise<DecisionRequest> {
  const data = await requireValid(registry, "decision", body);
  const id = str(data, "id");
  const decision = str(data, "decision");
  if (decision === "accept") {
    if (Reflect.get(data, "fingerprint") === undefined) throw new ValidationError("Invalid decision request: accept requires a fingerprint");
    return { id, decision, fingerprint: str(data, "fingerprint") };
  }
  if (decision === "reject") return { id, decision };
  throw new ValidationError(`Unknown decision: ${decision}`);
}

export async function parseDispatch(registry: SchemaRegistry, body: unknown): Promise<DispatchBody> {
  const data = await requireValid(registry, "dispatch", body);
  const payload: unknown = Reflect.get(data, "payload");
  if (typeof payload !== "object" || payload === null) throw new ValidationError("payload must be an object");

  const rawArgs: unknown = Reflect.get(payload, "args");
  const args = Array.isArray(rawArgs) ? rawArgs.filter((a): a is string => typeof a === "string") : [];
  return {
    targetId: str(data, "targetId"),
    payload: { fun: str(payload, "fun"), args },
    timeout: optionalInt(data, "timeout"),
  };
}

/** Single-valued query parameter; repeated or nested values are rejected. */
export function queryParam(value: unknown, name: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new ValidationError(`Query parameter ${name} must be given once`);
  return value;
}

export function parseTrustState(value: string | undefined): TrustState | undefined {
  if (value === undefined) return undefined;
  const state = TRUST_STATES.find((s) => s === value);
  if (!state) throw new ValidationError(`Unknown trust state: ${value}`);
  return state;
}

export function parseExecutionState(value: string | undefined): ExecutionState | undefined {
  if (value === undefined) return undefined;
  const state = EXECUTION_STATES.find((s) => s === value);
  if (!state) throw new ValidationError(`Unknown execution state: ${value}`);
  return state;
}

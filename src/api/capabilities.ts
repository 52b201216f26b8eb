import { ForbiddenError, UnauthenticatedError } from "../core/errors.js";
import type { OperatorRef, OperatorRole } from "../types/operator.js";

export type PublicOperation = "trust.handshake" | "health";

export type ProtectedOperation =
  | "trust.read"
  | "trust.decide"
  | "commands.read"
  | "commands.dispatch"
  | "backup.read"
  | "backup.trigger";

export type Operation = PublicOperation | ProtectedOperation;

const ROLE_RANK: Record<OperatorRole, number> = {
  viewer: 0,
  operator: 1,
  admin: 2,
};

/** Minimum role per upward operation. */
export const CAPABILITIES: Readonly<Record<Operation, OperatorRole | "public">> = {
  health: "public",
  "trust.handshake": "public",
  "trust.read": "viewer",
  "commands.read": "viewer",
  "backup.read": "viewer",
  "trust.decide": "operator",
  "commands.dispatch": "operator",
  "backup.trigger": "admin",
};

export function hasRole(operator: OperatorRef, required: OperatorRole): boolean {
  return ROLE_RANK[operator.role] >= ROLE_RANK[required];
}

/**
 * The one capability check per operation. Protected operations return the operator
 * that passed; public ones pass whoever called, possibly nobody.
 */
export function authorize(operation: PublicOperation, operator: OperatorRef | null): OperatorRef | null;
export function authorize(operation: ProtectedOperation, operator: OperatorRef | null): OperatorRef;
export function authorize(operation: Operation, operator: OperatorRef | null): OperatorRef | null {
  const required = CAPABILITIES[operation];
  if (required === "public") return operator;
  if (!operator) throw new UnauthenticatedError();
  if (!hasRole(operator, required)) {
    throw new ForbiddenError(`${operation} requires role ${required}`, { operation, role: operator.role });
  }
  return operator;
}

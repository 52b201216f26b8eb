/**
 * Error taxonomy shared by the trust, dispatch and backup paths.
 *
 * Every error carries a stable `code`, the HTTP status the API layer answers with,
 * and whether a caller may retry it (transient) or must change something first (permanent).
 */
export type ErrorCode =
  | "CONFLICT"
  | "ALREADY_DECIDED"
  | "NOT_FOUND"
  | "UNKNOWN_TARGET"
  | "THROTTLED"
  | "CONNECTIVITY"
  | "TIMEOUT"
  | "SECRET_HANDLING"
  | "VALIDATION"
  | "FORBIDDEN"
  | "UNAUTHENTICATED";

export type ErrorContext = Record<string, unknown>;

export class FleetError extends Error {
  readonly code: ErrorCode;
  readonly status: number;
  readonly transient: boolean;
  readonly context: ErrorContext;

  constructor(code: ErrorCode, message: string, opts: { status: number; transient?: boolean; context?: ErrorContext; cause?: unknown }) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.status = opts.status;
    this.transient = opts.transient ?? false;
    this.context = opts.context ?? {};
  }
}

/** Why a conflict happened; the operator's next step differs per reason. */
export type ConflictReason = "fingerprint_mismatch" | "identity_exists" | "state_locked";

export class ConflictError extends FleetError {
  readonly reason: ConflictReason;

  constructor(message: string, reason: ConflictReason = "fingerprint_mismatch", context?: ErrorContext) {
    super("CONFLICT", message, { status: 409, context: { ...context, reason } });
    this.reason = reason;
  }
}

export class AlreadyDecidedError extends FleetError {
  constructor(message: string, context?: ErrorContext) {
    super("ALREADY_DECIDED", message, { status: 409, context });
  }
}

export class NotFoundError extends FleetError {
  constructor(message: string, context?: ErrorContext) {
    super("NOT_FOUND", message, { status: 404, context });
  }
}

export class UnknownTargetError extends FleetError {
  constructor(message: string, context?: ErrorContext) {
    super("UNKNOWN_TARGET", message, { status: 422, context });
  }
}

export class ThrottledError extends FleetError {
  readonly retryAfterMs: number;
  readonly retryAfterSeconds: number;

  constructor(message: string, retryAfterMs: number, context?: ErrorContext) {
    const retryAfterSeconds = Math.max(1, Math.ceil(retryAfterMs / 1000));
    super("THROTTLED", message, { status: 429, transient: true, context: { ...context, retryAfterSeconds } });
    this.retryAfterMs = retryAfterMs;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class ConnectivityError extends FleetError {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super("CONNECTIVITY", message, { status: 502, transient: true, context, cause });
  }
}

export class TimeoutError extends FleetError {
  constructor(message: string, context?: ErrorContext) {
    super("TIMEOUT", message, { status: 504, context });
  }
}

export class SecretHandlingError extends FleetError {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super("SECRET_HANDLING", message, { status: 500, context, cause });
  }
}

export class ValidationError extends FleetError {
  constructor(message: string, context?: ErrorContext) {
    super("VALIDATION", message, { status: 400, context });
  }
}

export class ForbiddenError extends FleetError {
  constructor(message: string, context?: ErrorContext) {
    super("FORBIDDEN", message, { status: 403, context });
  }
}

export class UnauthenticatedError extends FleetError {
  constructor(message = "Operator identity required") {
    super("UNAUTHENTICATED", message, { status: 401 });
  }
}

export function isFleetError(e: unknown): e is FleetError {
  return e instanceof FleetError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

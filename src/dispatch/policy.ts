import { minimatch } from "minimatch";
import { ValidationError } from "../core/errors.js";
import type { CommandPayload } from "../types/command.js";

export const MAX_ARGS = 32;
export const MAX_ARG_LENGTH = 4096;

/**
 * Command policy: `fun` must match one of the allowed glob patterns ("pkg.*"),
 * arguments may not smuggle extra lines or NUL bytes into the remote invocation.
 */
export function validatePayload(payload: CommandPayload, allowedFunctions: readonly string[]): CommandPayload {
  const fun = payload.fun.trim();
  if (!/^[a-z_][a-z0-9_]*\.[a-z_][a-z0-9_]*$/.test(fun)) {
    throw new ValidationError(`Invalid function name: ${fun}`);
  }
  if (!allowedFunctions.some((pattern) => minimatch(fun, pattern))) {
    throw new ValidationError(`Function not allowed: ${fun}. Allowed: ${allowedFunctions.join(", ")}`, { fun });
  }

  const args = payload.args ?? [];
  if (args.length > MAX_ARGS) {
    throw new ValidationError(`Too many arguments: ${args.length} (max: ${MAX_ARGS})`);
  }
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.length > MAX_ARG_LENGTH) {
      throw new ValidationError(`Argument ${i + 1} too long: ${arg.length} chars (max: ${MAX_ARG_LENGTH})`);
    }
    if (/[\r\n\0]/.test(arg)) {
      throw new ValidationError(`Argument ${i + 1} contains a newline or NUL byte`);
    }
  }

  return { fun, args: [...args] };
}

/** Clamp a requested timeout to [1, max]; absent means the default. */
export function resolveTimeout(requested: number | undefined, defaultSeconds: number, maxSeconds: number): number {
  if (requested === undefined) return Math.min(defaultSeconds, maxSeconds);
  if (!Number.isFinite(requested) || requested <= 0) {
    throw new ValidationError(`Invalid timeout: ${requested}`);
  }
  return Math.min(Math.ceil(requested), maxSeconds);
}

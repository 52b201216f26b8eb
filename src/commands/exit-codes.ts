import { isFleetError } from "../core/errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILED: 1,
  INVALID_CONFIG: 2,
  INVALID_ARGS: 3,
  CONFLICT: 4,
  NOT_FOUND: 5,
  BACKEND_UNAVAILABLE: 6,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(err: unknown): ExitCode {
  if (!isFleetError(err)) return EXIT.FAILED;
  switch (err.code) {
    case "VALIDATION":
    case "UNKNOWN_TARGET":
      return EXIT.INVALID_ARGS;
    case "CONFLICT":
    case "ALREADY_DECIDED":
      return EXIT.CONFLICT;
    case "NOT_FOUND":
      return EXIT.NOT_FOUND;
    case "CONNECTIVITY":
    case "TIMEOUT":
      return EXIT.BACKEND_UNAVAILABLE;
    default:
      return EXIT.FAILED;
  }
}

import { errorMessage, isFleetError } from "../core/errors.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";

export type CommandResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: { code: string; message: string }; exitCode: ExitCode };

/** Run a CLI operation and fold its failure into a result with an exit code. */
export async function runCommand<T>(fn: () => Promise<T>): Promise<CommandResult<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (e) {
    return {
      ok: false,
      error: { code: isFleetError(e) ? e.code : "FAILED", message: errorMessage(e) },
      exitCode: isFleetError(e) ? exitCodeFor(e) : EXIT.FAILED,
    };
  }
}

import { parseTrustState } from "../api/requests.js";
import type { RuntimeOverrides } from "../runtime.js";
import type { MinionIdentity } from "../types/minion.js";
import type { OperatorRef } from "../types/operator.js";
import { withRuntime, type ConfigOpts } from "./context.js";
import { runCommand, type CommandResult } from "./result.js";

/** Local CLI use acts with admin rights under the invoking user's name. */
export function cliOperator(subject?: string): OperatorRef {
  return { subject: subject ?? process.env.USER ?? "cli", role: "admin" };
}

export function trustList(opts: ConfigOpts & { state?: string }, overrides?: RuntimeOverrides): Promise<CommandResult<MinionIdentity[]>> {
  return runCommand(() => withRuntime(opts, "read-only", async (rt) => rt.ledger.list(parseTrustState(opts.state)), overrides));
}

export function trustStatus(opts: ConfigOpts, id: string, overrides?: RuntimeOverrides): Promise<CommandResult<MinionIdentity>> {
  return runCommand(() => withRuntime(opts, "read-only", async (rt) => rt.ledger.status(id), overrides));
}

export function trustHandshake(opts: ConfigOpts, id: string, fingerprint: string, overrides?: RuntimeOverrides): Promise<CommandResult<MinionIdentity>> {
  return runCommand(() => withRuntime(opts, "exclusive", (rt) => rt.ledger.recordPending(id, fingerprint), overrides));
}

export function trustAccept(
  opts: ConfigOpts & { by?: string },
  id: string,
  fingerprint: string,
  overrides?: RuntimeOverrides,
): Promise<CommandResult<MinionIdentity>> {
  return runCommand(() => withRuntime(opts, "exclusive", (rt) => rt.ledger.accept(id, fingerprint, cliOperator(opts.by)), overrides));
}

export function trustReject(opts: ConfigOpts & { by?: string }, id: string, overrides?: RuntimeOverrides): Promise<CommandResult<MinionIdentity>> {
  return runCommand(() => withRuntime(opts, "exclusive", (rt) => rt.ledger.reject(id, cliOperator(opts.by)), overrides));
}

import { parseExecutionState } from "../api/requests.js";
import type { RuntimeOverrides } from "../runtime.js";
import type { CommandExecution } from "../types/command.js";
import { withRuntime, type ConfigOpts } from "./context.js";
import { runCommand, type CommandResult } from "./result.js";

export function executionStatus(opts: ConfigOpts, executionId: string, overrides?: RuntimeOverrides): Promise<CommandResult<CommandExecution>> {
  return runCommand(() => withRuntime(opts, "read-only", async (rt) => rt.dispatcher.get(executionId), overrides));
}

export function executionList(
  opts: ConfigOpts & { target?: string; state?: string },
  overrides?: RuntimeOverrides,
): Promise<CommandResult<CommandExecution[]>> {
  return runCommand(() =>
    withRuntime(
      opts,
      "read-only",
      async (rt) => rt.dispatcher.list({ targetMinionId: opts.target, state: parseExecutionState(opts.state) }),
      overrides,
    ),
  );
}

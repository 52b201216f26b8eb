import path from "node:path";
import { sweepKeyMaterial } from "../backup/secrets.js";
import { ValidationError } from "../core/errors.js";
import type { BackupRunResult } from "../backup/orchestrator.js";
import type { RuntimeOverrides } from "../runtime.js";
import { acquireStateLock } from "../store/state-lock.js";
import type { BackupRun } from "../types/backup.js";
import { loadValidConfig, withRuntime, type ConfigOpts } from "./context.js";
import { runCommand, type CommandResult } from "./result.js";

export function backupRun(opts: ConfigOpts, overrides?: RuntimeOverrides): Promise<CommandResult<BackupRunResult>> {
  return runCommand(() =>
    withRuntime(
      opts,
      "exclusive",
      async (rt) => {
        if (!rt.backupEnabled) throw new ValidationError("Backups are not enabled (backup.enabled is false)");
        return rt.backup.trigger();
      },
      overrides,
    ),
  );
}

export function backupStatus(opts: ConfigOpts & { limit?: number }, overrides?: RuntimeOverrides): Promise<CommandResult<BackupRun[]>> {
  return runCommand(() => withRuntime(opts, "read-only", async (rt) => rt.backup.history(opts.limit ?? 10), overrides));
}

/** Remove transport key material left behind by crashed runs; refused while the state directory is held. */
export function backupSweep(
  opts: ConfigOpts,
  overrides?: Pick<RuntimeOverrides, "lockWaitMs">,
): Promise<CommandResult<{ removed: number }>> {
  return runCommand(async () => {
    const config = await loadValidConfig(opts);
    const lock = await acquireStateLock(path.resolve(config.state_dir), { role: "cli", waitMs: overrides?.lockWaitMs });
    try {
      return { removed: await sweepKeyMaterial(config.backup.key_dir) };
    } finally {
      await lock.release();
    }
  });
}

import path from "node:path";
import { OperatorDirectory } from "./api/auth.js";
import { BorgTransport } from "./backup/borg-transport.js";
import { BackupOrchestrator } from "./backup/orchestrator.js";
import { BackupScheduler } from "./backup/scheduler.js";
import { FileCredentialSource, sweepKeyMaterial, type CredentialSource } from "./backup/secrets.js";
import { createLogger, type Logger } from "./core/logger.js";
import { CommandDispatcher } from "./dispatch/dispatcher.js";
import { SaltCommandBackend } from "./dispatch/salt-backend.js";
import { createRegistry, type SchemaRegistry } from "./schema/registry.js";
import { EntityStore } from "./store/entity-store.js";
import { Journal } from "./store/journal.js";
import { acquireStateLock, type StateLock } from "./store/state-lock.js";
import { AdmissionThrottle } from "./throttle/admission-throttle.js";
import { TrustLedger } from "./trust/ledger.js";
import { SaltKeyTrustBackend } from "./trust/salt-key-backend.js";
import type { BackupTransport, CommandBackend, TrustBackend } from "./types/backends.js";
import type { BackupRun } from "./types/backup.js";
import type { CommandExecution } from "./types/command.js";
import type { FleetConfig } from "./types/config.js";
import type { MinionIdentity } from "./types/minion.js";

/** A command backend that collects results by polling. */
export type PollingCommandBackend = CommandBackend & {
  start?(intervalMs: number): void;
  stop?(): void;
};

export type RuntimeOverrides = {
  trustBackend?: TrustBackend;
  commandBackend?: PollingCommandBackend;
  transport?: BackupTransport;
  credentials?: CredentialSource;
  loggerFor?: (tag: string) => Logger;
  now?: () => Date;
  /** How long an exclusive runtime waits for the state lock. */
  lockWaitMs?: number;
};

/**
 * `exclusive` holds the state-dir lock, recovers what a crashed process left behind and
 * may mutate; `read-only` takes no lock, recovers nothing and cannot be started.
 */
export type RuntimeAccess = "exclusive" | "read-only";

export type FleetRuntime = {
  config: FleetConfig;
  ledger: TrustLedger;
  dispatcher: CommandDispatcher;
  backup: BackupOrchestrator;
  backupEnabled: boolean;
  throttle: AdmissionThrottle;
  registry: SchemaRegistry;
  operators: OperatorDirectory;
  /** Start the watchdog, result polling and (if enabled) the backup schedule. */
  start(): void;
  close(): Promise<void>;
};

export const JOURNAL_FILES = {
  minions: "minions.jsonl",
  commands: "commands.jsonl",
  backups: "backups.jsonl",
} as const;

const THROTTLE_PRUNE_INTERVAL_MS = 60 * 1000;

function openStore<T extends { id: string }>(stateDir: string, file: string, now: () => Date): EntityStore<T> {
  const store = new EntityStore<T>(new Journal<T>(path.join(stateDir, file)), now);
  store.replay();
  return store;
}

/**
 * Assemble every component from a validated configuration. Journals under `state_dir`
 * are replayed. An exclusive runtime first takes the state-dir lock, then closes backup
 * runs a previous process left open as interrupted and sweeps stray transport keys; the
 * lock is released by `close()`.
 */
export async function buildRuntime(
  config: FleetConfig,
  overrides: RuntimeOverrides = {},
  access: RuntimeAccess = "exclusive",
  role = "cli",
): Promise<FleetRuntime> {
  const loggerFor = overrides.loggerFor ?? createLogger;
  const stateDir = path.resolve(config.state_dir);

  const lock: StateLock | null =
    access === "exclusive"
      ? await acquireStateLock(stateDir, { role, waitMs: overrides.lockWaitMs, logger: loggerFor("state") })
      : null;
  try {
    return await assemble(config, overrides, stateDir, lock);
  } catch (e) {
    await lock?.release();
    throw e;
  }
}

async function assemble(
  config: FleetConfig,
  overrides: RuntimeOverrides,
  stateDir: string,
  lock: StateLock | null,
): Promise<FleetRuntime> {
  const loggerFor = overrides.loggerFor ?? createLogger;
  const now = overrides.now ?? (() => new Date());

  const minionStore = openStore<MinionIdentity>(stateDir, JOURNAL_FILES.minions, now);
  const commandStore = openStore<CommandExecution>(stateDir, JOURNAL_FILES.commands, now);
  const backupStore = openStore<BackupRun>(stateDir, JOURNAL_FILES.backups, now);

  const ledger = new TrustLedger({
    store: minionStore,
    backend: overrides.trustBackend ?? new SaltKeyTrustBackend(config.trust.salt_key_bin),
    logger: loggerFor("trust"),
    now,
  });

  const throttle = AdmissionThrottle.fromConfig(config.throttle);

  const commandBackend: PollingCommandBackend =
    overrides.commandBackend ??
    new SaltCommandBackend({
      saltBin: config.commands.salt_bin,
      saltRunBin: config.commands.salt_run_bin,
      logger: loggerFor("salt"),
    });

  const dispatcher = new CommandDispatcher({
    store: commandStore,
    backend: commandBackend,
    targets: ledger,
    settings: {
      defaultTimeoutSeconds: config.commands.default_timeout_seconds,
      maxTimeoutSeconds: config.commands.max_timeout_seconds,
      outputMaxBytes: config.commands.output_max_bytes,
      successExitCode: config.commands.success_exit_code,
      allowedFunctions: config.commands.allowed_functions,
    },
    throttle,
    logger: loggerFor("dispatch"),
    now,
  });

  const backupLogger = loggerFor("backup");
  const backup = new BackupOrchestrator({
    store: backupStore,
    transport:
      overrides.transport ??
      new BorgTransport({ bin: config.backup.borg_bin, encryption: config.backup.encryption }),
    credentials:
      overrides.credentials ?? new FileCredentialSource(config.backup.passphrase_file, config.backup.ssh_key_file ?? null),
    settings: {
      repositoryUrl: config.backup.repository_url,
      paths: config.backup.paths,
      stateDir,
      compression: config.backup.compression,
      retention: config.backup.retention,
      keyDir: config.backup.key_dir,
    },
    logger: backupLogger,
    now,
    flushState: async () => {
      await Promise.all([minionStore.flush(), commandStore.flush(), backupStore.flush()]);
    },
  });

  // only the lock holder may close another process's runs or remove its keys
  if (lock) {
    const interrupted = await backup.recoverInterrupted();
    const swept = await sweepKeyMaterial(config.backup.key_dir);
    if (interrupted > 0 || swept > 0) {
      backupLogger.warn("recovered after restart", { interruptedRuns: interrupted, keyDirsRemoved: swept });
    }
  }

  const scheduler = config.backup.enabled
    ? new BackupScheduler(backup, config.backup.interval_minutes * 60 * 1000, backupLogger)
    : null;

  let throttleSweep: NodeJS.Timeout | null = null;

  return {
    config,
    ledger,
    dispatcher,
    backup,
    backupEnabled: config.backup.enabled,
    throttle,
    registry: await createRegistry(),
    operators: new OperatorDirectory(config.operators),
    start() {
      if (!lock) throw new Error("A read-only runtime cannot be started");
      dispatcher.startWatchdog(config.commands.watchdog_interval_seconds * 1000);
      commandBackend.start?.(config.commands.poll_interval_seconds * 1000);
      scheduler?.start();
      if (!throttleSweep) {
        throttleSweep = setInterval(() => throttle.prune(), THROTTLE_PRUNE_INTERVAL_MS);
        throttleSweep.unref();
      }
    },
    async close() {
      if (throttleSweep) clearInterval(throttleSweep);
      throttleSweep = null;
      await scheduler?.stop();
      commandBackend.stop?.();
      try {
        await dispatcher.close();
      } finally {
        await lock?.release();
      }
    },
  };
}

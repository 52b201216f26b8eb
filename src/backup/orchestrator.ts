import { randomUUID } from "node:crypto";
import { KeyedClaims } from "../core/concurrency.js";
import { ConnectivityError, errorMessage, isFleetError } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { redactSecrets } from "../core/security.js";
import type { EntityStore } from "../store/entity-store.js";
import type { BackupTransport } from "../types/backends.js";
import type {
  BackupCredentials,
  BackupOutcome,
  BackupRun,
  BackupStats,
  RetentionPolicy,
  TransportCredentials,
} from "../types/backup.js";
import { withTransportKey, type CredentialSource } from "./secrets.js";
import {
  archiveNameFor,
  formatRepositoryTarget,
  validateBackupPaths,
  validateRepositoryUrl,
  validateRetention,
} from "./validation.js";

export type BackupSettings = {
  repositoryUrl: string;
  paths: string[];
  /** The fleet's own state directory; always part of the archive. */
  stateDir: string;
  compression: string;
  retention: RetentionPolicy;
  /** Where a transport key is materialized for one run. */
  keyDir: string;
  prune?: boolean;
};

export type BackupOrchestratorOpts = {
  store: EntityStore<BackupRun>;
  transport: BackupTransport;
  credentials: CredentialSource;
  settings: BackupSettings;
  logger?: Logger;
  now?: () => Date;
  newId?: () => string;
  /** Called right before the transfer so the archive holds every committed journal line. */
  flushState?: () => Promise<void>;
};

export type BackupRunResult =
  | { skipped: false; run: BackupRun }
  | { skipped: true; reason: string };

type ProtocolResult = {
  outcome: Exclude<BackupOutcome, "failed">;
  stats: BackupStats;
  pruned: boolean;
};

/**
 * Backup orchestrator: probe the repository target, initialize it only when the probe
 * says it does not exist, then run. At most one run per target; a run that finds the
 * target busy is skipped. Failures are terminal for the run; the next tick retries.
 */
export class BackupOrchestrator {
  private readonly store: EntityStore<BackupRun>;
  private readonly transport: BackupTransport;
  private readonly credentials: CredentialSource;
  private readonly settings: BackupSettings;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly flushState: () => Promise<void>;
  private readonly claims = new KeyedClaims();

  constructor(opts: BackupOrchestratorOpts) {
    this.store = opts.store;
    this.transport = opts.transport;
    this.credentials = opts.credentials;
    this.settings = opts.settings;
    this.logger = opts.logger ?? silentLogger;
    this.now = opts.now ?? (() => new Date());
    this.newId = opts.newId ?? randomUUID;
    this.flushState = opts.flushState ?? (async () => undefined);
  }

  /** Manual run. */
  trigger(): Promise<BackupRunResult> {
    return this.runOnce("manual");
  }

  async runOnce(trigger: BackupRun["trigger"]): Promise<BackupRunResult> {
    const target = this.settings.repositoryUrl;
    const check = this.claims.check(target);
    const release = this.claims.tryAcquire(target, `${trigger}:${this.now().toISOString()}`);
    if (!release) {
      const reason = `A backup run is already in flight for ${formatRepositoryTarget(target)}`;
      this.logger.warn("backup skipped", { target: formatRepositoryTarget(target), holder: check.holder ?? null, trigger });
      return { skipped: true, reason };
    }
    try {
      return { skipped: false, run: await this.execute(target, trigger) };
    } finally {
      release();
    }
  }

  /** Most recent run, in flight or finished. */
  lastRun(): BackupRun | null {
    return this.history(1)[0] ?? null;
  }

  /** Runs newest first. */
  history(limit?: number): BackupRun[] {
    const runs = this.store.values().sort((a, b) => b.startedAt.localeCompare(a.startedAt) || b.id.localeCompare(a.id));
    return limit === undefined ? runs : runs.slice(0, limit);
  }

  isRunning(): boolean {
    return this.claims.isHeld(this.settings.repositoryUrl);
  }

  /** Close runs a crashed process left without an outcome. Returns how many were closed. */
  async recoverInterrupted(): Promise<number> {
    let closed = 0;
    for (const run of this.store.values()) {
      if (run.outcome !== null || this.claims.isHeld(run.repositoryTarget)) continue;
      const res = this.store.compareAndSet(
        run.id,
        (cur) => cur.outcome === null,
        (cur) => ({ ...cur, outcome: "failed", finishedAt: this.now().toISOString(), errorDetail: "interrupted", errorCode: "interrupted" }),
      );
      if (!res.ok) continue;
      await res.persisted;
      closed++;
      this.logger.warn("interrupted backup run closed", { run: run.id, archive: run.archiveName });
    }
    return closed;
  }

  private async execute(target: string, trigger: BackupRun["trigger"]): Promise<BackupRun> {
    const startedAt = this.now();
    const display = formatRepositoryTarget(target);
    const inserted = this.store.insert({
      id: this.newId(),
      repositoryTarget: target,
      archiveName: archiveNameFor(startedAt),
      trigger,
      startedAt: startedAt.toISOString(),
      finishedAt: null,
      outcome: null,
      errorDetail: null,
      errorCode: null,
      stats: null,
      pruned: false,
    });
    if (!inserted.ok) throw new Error(`Backup run id collision: ${inserted.current.id}`);
    await inserted.persisted;
    const run = inserted.record;
    this.logger.info("backup started", { run: run.id, target: display, archive: run.archiveName, trigger });

    let credentials: BackupCredentials | null = null;
    try {
      validateRepositoryUrl(target);
      const paths = validateBackupPaths(archivePaths(this.settings.paths, this.settings.stateDir));
      validateRetention(this.settings.retention);

      const loaded = await this.credentials.load();
      credentials = loaded;
      const result = await withTransportKey(loaded, this.settings.keyDir, (transport) =>
        this.protocol(target, transport, run.archiveName, paths),
      );

      const done = await this.finish(run.id, { outcome: result.outcome, stats: result.stats, pruned: result.pruned });
      this.logger.info("backup finished", { run: run.id, target: display, outcome: result.outcome, pruned: result.pruned });
      return done;
    } catch (e) {
      const errorDetail = redactSecrets(errorMessage(e), [credentials?.passphrase, credentials?.sshKey]);
      const errorCode = failureCode(e);
      this.logger.error("backup failed", { run: run.id, target: display, code: errorCode, error: errorDetail });
      return this.finish(run.id, { outcome: "failed", errorDetail, errorCode });
    }
  }

  private async protocol(target: string, transport: TransportCredentials, archiveName: string, paths: string[]): Promise<ProtocolResult> {
    const probe = await this.transport.probe(target, transport);
    let initialized = false;

    if (probe.kind === "not_found") {
      this.logger.info("repository not found; initializing", { target: formatRepositoryTarget(target) });
      const init = await this.transport.initialize(target, transport);
      if (!init.ok) {
        throw new ConnectivityError(`Repository initialization failed: ${init.error}`, { reason: "init_failed" });
      }
      initialized = true;
    } else if (probe.kind !== "exists") {
      throw new ConnectivityError(`Repository probe failed (${probe.kind}): ${probe.detail}`, { reason: probe.kind });
    }

    await this.flushState();
    const res = await this.transport.run(target, transport, {
      archiveName,
      paths,
      compression: this.settings.compression,
    });
    if (!res.ok) {
      throw new ConnectivityError(`Backup transfer failed: ${res.error}`, { reason: "run_failed" });
    }

    return {
      outcome: initialized ? "initialized_and_succeeded" : "success",
      stats: res.stats,
      pruned: await this.prune(target, transport),
    };
  }

  /** Retention prune after a successful run; its failure does not change the outcome. */
  private async prune(target: string, transport: TransportCredentials): Promise<boolean> {
    if (this.settings.prune === false || !this.transport.prune) return false;
    try {
      const res = await this.transport.prune(target, transport, this.settings.retention);
      if (res.ok) return true;
      this.logger.warn("prune failed", { target: formatRepositoryTarget(target), error: redactSecrets(res.error, [transport.passphrase]) });
    } catch (e) {
      this.logger.warn("prune failed", { target: formatRepositoryTarget(target), error: redactSecrets(errorMessage(e), [transport.passphrase]) });
    }
    return false;
  }

  private async finish(
    id: string,
    fields: { outcome: BackupOutcome; stats?: BackupStats; pruned?: boolean; errorDetail?: string; errorCode?: string },
  ): Promise<BackupRun> {
    const res = this.store.compareAndSet(
      id,
      (cur) => cur.outcome === null,
      (cur) => ({
        ...cur,
        outcome: fields.outcome,
        finishedAt: this.now().toISOString(),
        stats: fields.stats ?? null,
        pruned: fields.pruned ?? false,
        errorDetail: fields.errorDetail ?? null,
        errorCode: fields.errorCode ?? null,
      }),
    );
    if (!res.ok) throw new Error(`Backup run ${id} was closed by someone else`);
    await res.persisted;
    return res.record;
  }
}

/** Configured paths plus the state directory, unless a configured path already covers it. */
export function archivePaths(paths: readonly string[], stateDir: string): string[] {
  const covered = paths.some((p) => stateDir === p || stateDir.startsWith(p.endsWith("/") ? p : `${p}/`));
  return covered ? [...paths] : [...paths, stateDir];
}

function failureCode(e: unknown): string {
  if (!isFleetError(e)) return "backup_failed";
  const reason = e.context.reason;
  return typeof reason === "string" ? reason : e.code.toLowerCase();
}

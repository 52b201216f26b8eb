import { createHash } from "node:crypto";
import fs from "node:fs";
import type { ExecFn, ExecOptions, ExecResult } from "../src/core/exec.js";
import type { PollingCommandBackend } from "../src/runtime.js";
import type {
  BackupTransport,
  CommandBackendListener,
  ProbeResult,
  TransportResult,
  TrustBackend,
} from "../src/types/backends.js";
import type { BackupPayload, BackupStats, RetentionPolicy, TransportCredentials } from "../src/types/backup.js";
import type { CommandPayload } from "../src/types/command.js";

/** Sixteen colon-separated hex pairs derived from `seed`. */
export function fp(seed: string): string {
  const hex = createHash("md5").update(seed).digest("hex");
  return Array.from({ length: 16 }, (_, i) => hex.slice(i * 2, i * 2 + 2)).join(":");
}

export function gate(): { wait: Promise<void>; release: () => void } {
  let release: () => void = () => undefined;
  const wait = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { wait, release };
}

/** Manually advanced clock. */
export function clock(start = "2026-10-19T12:00:00.000Z") {
  let t = Date.parse(start);
  return {
    now: () => new Date(t),
    advance(ms: number) {
      t += ms;
    },
  };
}

export class FakeTrustBackend implements TrustBackend {
  readonly keys = new Map<string, string>();
  readonly admitted: string[] = [];
  admitError: Error | null = null;
  lookupError: Error | null = null;

  async lookupFingerprint(id: string): Promise<string | null> {
    if (this.lookupError) throw this.lookupError;
    return this.keys.get(id) ?? null;
  }

  async admitToFleet(id: string): Promise<void> {
    if (this.admitError) throw this.admitError;
    this.admitted.push(id);
  }
}

export class FakeCommandBackend implements PollingCommandBackend {
  readonly submissions: { handle: string; targetId: string; payload: CommandPayload }[] = [];
  readonly resumed: string[] = [];
  failNext: Error | null = null;
  hold: Promise<void> | null = null;
  private counter = 0;
  private readonly listeners = new Set<CommandBackendListener>();

  constructor(private readonly prefix = "job") {}

  async submit(targetId: string, payload: CommandPayload): Promise<string> {
    const handle = `${this.prefix}-${++this.counter}`;
    this.submissions.push({ handle, targetId, payload });
    if (this.failNext) {
      const err = this.failNext;
      this.failNext = null;
      throw err;
    }
    if (this.hold) await this.hold;
    return handle;
  }

  subscribe(listener: CommandBackendListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  resume(handle: string): void {
    this.resumed.push(handle);
  }

  emitAck(handle: string): void {
    for (const l of this.listeners) l.onAck?.(handle);
  }

  emitResult(handle: string, exitCode: number, output: string): void {
    for (const l of this.listeners) l.onResult({ handle, exitCode, output });
  }

  listenerCount(): number {
    return this.listeners.size;
  }
}

type FakeRepo = { passphrase: string; archives: string[] };

/** In-memory encrypted repository store keyed by target. */
export class FakeTransport implements BackupTransport {
  readonly repos = new Map<string, FakeRepo>();
  readonly calls: string[] = [];
  readonly payloads: BackupPayload[] = [];
  readonly keyFilesSeen: { path: string; existed: boolean }[] = [];
  probeOverride: ProbeResult | null = null;
  initError: string | null = null;
  runError: string | null = null;
  pruneError: string | null = null;
  runHold: Promise<void> | null = null;
  /** Runs inside `run`, after the payload is recorded. */
  onRun: ((credentials: TransportCredentials) => void) | null = null;
  pruned: RetentionPolicy[] = [];
  stats: BackupStats = { originalSize: 4096, compressedSize: 2048, deduplicatedSize: 1024, filesCount: 3 };

  async probe(target: string, credentials: TransportCredentials): Promise<ProbeResult> {
    this.calls.push("probe");
    this.observeKey(credentials);
    if (this.probeOverride) return this.probeOverride;
    const repo = this.repos.get(target);
    if (!repo) return { kind: "not_found", detail: "Repository.DoesNotExist: no repository" };
    if (repo.passphrase !== credentials.passphrase) {
      return { kind: "auth_error", detail: `PassphraseWrong: passphrase ${credentials.passphrase} is incorrect` };
    }
    return { kind: "exists" };
  }

  async initialize(target: string, credentials: TransportCredentials): Promise<TransportResult> {
    this.calls.push("init");
    if (this.initError) return { ok: false, error: this.initError };
    this.repos.set(target, { passphrase: credentials.passphrase, archives: [] });
    return { ok: true };
  }

  async run(target: string, credentials: TransportCredentials, payload: BackupPayload): Promise<TransportResult<{ stats: BackupStats }>> {
    this.calls.push("run");
    this.observeKey(credentials);
    this.payloads.push(payload);
    this.onRun?.(credentials);
    if (this.runHold) await this.runHold;
    if (this.runError) return { ok: false, error: this.runError };
    this.repos.get(target)?.archives.push(payload.archiveName);
    return { ok: true, stats: { ...this.stats } };
  }

  async prune(_target: string, _credentials: TransportCredentials, retention: RetentionPolicy): Promise<TransportResult> {
    this.calls.push("prune");
    if (this.pruneError) return { ok: false, error: this.pruneError };
    this.pruned.push(retention);
    return { ok: true };
  }

  private observeKey(credentials: TransportCredentials): void {
    if (credentials.sshKeyPath) {
      this.keyFilesSeen.push({ path: credentials.sshKeyPath, existed: fs.existsSync(credentials.sshKeyPath) });
    }
  }
}

export type ExecCall = { file: string; args: string[]; opts: ExecOptions };

/** ExecFn answering from a script; a thrown or returned Error rejects. */
export function scriptedExec(script: (file: string, args: string[]) => ExecResult | Error): { exec: ExecFn; calls: ExecCall[] } {
  const calls: ExecCall[] = [];
  const exec: ExecFn = async (file, args, opts) => {
    calls.push({ file, args, opts });
    const out = script(file, args);
    if (out instanceof Error) throw out;
    return out;
  };
  return { exec, calls };
}

export function ok(stdout = "", stderr = ""): ExecResult {
  return { exitCode: 0, stdout, stderr };
}

export function exited(exitCode: number, stderr = "", stdout = ""): ExecResult {
  return { exitCode, stdout, stderr };
}

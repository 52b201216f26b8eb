import { errorMessage } from "../core/errors.js";
import { defaultExec, type ExecFn, type ExecResult } from "../core/exec.js";
import { sanitizeLogMessage } from "../core/security.js";
import type { BackupTransport, ProbeResult, TransportResult } from "../types/backends.js";
import type { BackupPayload, BackupStats, RetentionPolicy, TransportCredentials } from "../types/backup.js";

export type BorgTransportOpts = {
  bin?: string;
  encryption?: string;
  exec?: ExecFn;
  /** probe, init and prune */
  timeoutMs?: number;
  /** create */
  runTimeoutMs?: number;
};

/** Structured borg message ids and what a probe failure with them means. */
const MSGID_KINDS: ReadonlyArray<[RegExp, ProbeResult["kind"]]> = [
  [/^Repository\.DoesNotExist$/, "not_found"],
  [/^PassphraseWrong$/, "auth_error"],
  [/^Repository\.InvalidRepository/, "invalid_repository"],
  [/^ConnectionClosed/, "network_error"],
];

/** Used only when borg printed no msgid. */
const MESSAGE_KINDS: ReadonlyArray<[RegExp, ProbeResult["kind"]]> = [
  [/passphrase supplied .* is incorrect|passphrase.*wrong/i, "auth_error"],
  [/permission denied|authentication failed/i, "auth_error"],
  [/connection closed|connection refused|connection reset|could not resolve|no route to host|timed out/i, "network_error"],
  [/is not a valid repository/i, "invalid_repository"],
  [/repository .*does not exist/i, "not_found"],
];

type BorgLogLine = { msgid: string | null; message: string };

/**
 * Backup transport over the borg CLI. The repository and its secrets travel in the
 * child's environment (BORG_REPO, BORG_PASSPHRASE, BORG_RSH), never in argv.
 */
export class BorgTransport implements BackupTransport {
  private readonly bin: string;
  private readonly encryption: string;
  private readonly exec: ExecFn;
  private readonly timeoutMs: number;
  private readonly runTimeoutMs: number;

  constructor(opts: BorgTransportOpts = {}) {
    this.bin = opts.bin ?? "borg";
    this.encryption = opts.encryption ?? "repokey";
    this.exec = opts.exec ?? defaultExec;
    this.timeoutMs = opts.timeoutMs ?? 5 * 60 * 1000;
    this.runTimeoutMs = opts.runTimeoutMs ?? 6 * 60 * 60 * 1000;
  }

  async probe(repositoryTarget: string, credentials: TransportCredentials): Promise<ProbeResult> {
    let res: ExecResult;
    try {
      res = await this.borg(["list", "--last", "1", "--short"], repositoryTarget, credentials, this.timeoutMs);
    } catch (e) {
      return { kind: "network_error", detail: errorMessage(e) };
    }
    if (res.exitCode === 0) return { kind: "exists" };
    return classifyProbeFailure(res.stderr || res.stdout);
  }

  async initialize(repositoryTarget: string, credentials: TransportCredentials): Promise<TransportResult> {
    return this.simple(["init", `--encryption=${this.encryption}`], repositoryTarget, credentials, this.timeoutMs);
  }

  async run(repositoryTarget: string, credentials: TransportCredentials, payload: BackupPayload): Promise<TransportResult<{ stats: BackupStats }>> {
    const args = [
      "create",
      "--json",
      "--compression",
      payload.compression,
      "--exclude-caches",
      `::${payload.archiveName}`,
      ...payload.paths,
    ];
    let res: ExecResult;
    try {
      res = await this.borg(args, repositoryTarget, credentials, this.runTimeoutMs);
    } catch (e) {
      return { ok: false, error: errorMessage(e) };
    }
    // 1 is "finished with warnings": the archive was written
    if (res.exitCode !== 0 && res.exitCode !== 1) {
      return { ok: false, error: `borg create exited with ${res.exitCode}: ${describeFailure(res.stderr || res.stdout)}` };
    }
    return { ok: true, stats: parseBorgStats(res.stdout, res.stderr) };
  }

  async prune(repositoryTarget: string, credentials: TransportCredentials, retention: RetentionPolicy): Promise<TransportResult> {
    const args = [
      "prune",
      `--keep-daily=${retention.daily}`,
      `--keep-weekly=${retention.weekly}`,
      `--keep-monthly=${retention.monthly}`,
    ];
    return this.simple(args, repositoryTarget, credentials, this.timeoutMs);
  }

  private async simple(args: string[], repositoryTarget: string, credentials: TransportCredentials, timeoutMs: number): Promise<TransportResult> {
    try {
      const res = await this.borg(args, repositoryTarget, credentials, timeoutMs);
      if (res.exitCode === 0) return { ok: true };
      return { ok: false, error: `borg ${args[0]} exited with ${res.exitCode}: ${describeFailure(res.stderr || res.stdout)}` };
    } catch (e) {
      return { ok: false, error: errorMessage(e) };
    }
  }

  private borg(args: string[], repositoryTarget: string, credentials: TransportCredentials, timeoutMs: number): Promise<ExecResult> {
    return this.exec(this.bin, ["--log-json", ...args], { timeoutMs, env: borgEnv(repositoryTarget, credentials) });
  }
}

export function borgEnv(repositoryTarget: string, credentials: TransportCredentials): Record<string, string> {
  const env: Record<string, string> = {
    BORG_REPO: repositoryTarget,
    BORG_PASSPHRASE: credentials.passphrase,
    BORG_RELOCATED_REPO_ACCESS_IS_OK: "no",
    BORG_UNKNOWN_UNENCRYPTED_REPO_ACCESS_IS_OK: "no",
  };
  if (credentials.sshKeyPath) {
    env.BORG_RSH = ["ssh", "-i", shellQuote(credentials.sshKeyPath), "-o", "StrictHostKeyChecking=accept-new", "-o", "LogLevel=ERROR"].join(" ");
  }
  return env;
}

function shellQuote(s: string): string {
  return /^[A-Za-z0-9_./-]+$/.test(s) ? s : `'${s.replace(/'/g, `'\\''`)}'`;
}

/** Parse `--log-json` stderr into (msgid, message) pairs; plain lines keep their text. */
export function parseBorgLog(stderr: string): BorgLogLine[] {
  const lines: BorgLogLine[] = [];
  for (const raw of stderr.split("\n")) {
    const line = raw.trim();
    if (!line) continue;
    try {
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed === "object" && parsed !== null) {
        const msgid: unknown = Reflect.get(parsed, "msgid");
        const message: unknown = Reflect.get(parsed, "message");
        lines.push({ msgid: typeof msgid === "string" ? msgid : null, message: typeof message === "string" ? message : "" });
        continue;
      }
    } catch {
      // not a JSON log line
    }
    lines.push({ msgid: null, message: line });
  }
  return lines;
}

/**
 * Tell "repository absent" from every other probe failure. The structured msgid decides
 * when borg printed one; message matching is the fallback. Anything unrecognized is a
 * network error so that it never leads to initialization.
 */
export function classifyProbeFailure(stderr: string): ProbeResult {
  const lines = parseBorgLog(stderr);
  const detail = describeLines(lines);

  for (const { msgid } of lines) {
    if (!msgid) continue;
    for (const [pattern, kind] of MSGID_KINDS) {
      if (pattern.test(msgid)) return { kind, detail };
    }
  }

  const text = lines.map((l) => l.message).join("\n");
  for (const [pattern, kind] of MESSAGE_KINDS) {
    if (pattern.test(text)) return { kind, detail };
  }
  return { kind: "network_error", detail: detail || "borg probe failed without output" };
}

/**
 * Stats of a `borg create --json` run (`archive.stats`), or of the text `--stats`
 * summary when no JSON was printed.
 */
export function parseBorgStats(stdout: string, stderr = ""): BackupStats {
  const text = stdout.trim();
  if (text.startsWith("{")) {
    try {
      const parsed: unknown = JSON.parse(text);
      const stats = typeof parsed === "object" && parsed !== null ? Reflect.get(parsed, "archive") : null;
      const s: unknown = typeof stats === "object" && stats !== null ? Reflect.get(stats, "stats") : null;
      if (typeof s === "object" && s !== null) {
        return pruneUndefined({
          originalSize: numberField(s, "original_size"),
          compressedSize: numberField(s, "compressed_size"),
          deduplicatedSize: numberField(s, "deduplicated_size"),
          filesCount: numberField(s, "nfiles"),
        });
      }
    } catch {
      // fall through to the text summary
    }
  }

  const summary = `${stdout}\n${parseBorgLog(stderr).map((l) => l.message).join("\n")}`;
  const grab = (label: string) => {
    const m = new RegExp(`${label}:\\s+(\\d+)`).exec(summary);
    return m ? Number(m[1]) : undefined;
  };
  return pruneUndefined({
    originalSize: grab("Original size"),
    compressedSize: grab("Compressed size"),
    deduplicatedSize: grab("Deduplicated size"),
    filesCount: grab("Number of files"),
  });
}

function numberField(obj: object, key: string): number | undefined {
  const v: unknown = Reflect.get(obj, key);
  return typeof v === "number" ? v : undefined;
}

function pruneUndefined(stats: BackupStats): BackupStats {
  const out: BackupStats = {};
  if (stats.originalSize !== undefined) out.originalSize = stats.originalSize;
  if (stats.compressedSize !== undefined) out.compressedSize = stats.compressedSize;
  if (stats.deduplicatedSize !== undefined) out.deduplicatedSize = stats.deduplicatedSize;
  if (stats.filesCount !== undefined) out.filesCount = stats.filesCount;
  return out;
}

function describeFailure(stderr: string): string {
  return describeLines(parseBorgLog(stderr)) || "no output";
}

function describeLines(lines: BorgLogLine[]): string {
  return sanitizeLogMessage(
    lines
      .map((l) => (l.msgid ? `${l.msgid}: ${l.message}` : l.message))
      .filter((s) => s.length > 0)
      .join("; "),
  );
}

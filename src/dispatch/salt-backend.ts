import { ConnectivityError, errorMessage, isFleetError } from "../core/errors.js";
import { defaultExec, type ExecFn, type ExecResult } from "../core/exec.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { redactSensitiveInfo } from "../core/security.js";
import type { CommandBackend, CommandBackendListener, CommandResultEvent } from "../types/backends.js";
import type { CommandPayload } from "../types/command.js";

export type SaltCommandBackendOpts = {
  saltBin?: string;
  saltRunBin?: string;
  exec?: ExecFn;
  logger?: Logger;
  timeoutMs?: number;
  /** Jobs without a return after this long are no longer polled. */
  maxPendingMs?: number;
  now?: () => number;
};

type PendingJob = { target: string; since: number };

/**
 * Command backend over the salt CLI.
 *
 * `salt --async` publishes the job and answers with its jid; returns are collected by
 * polling `salt-run jobs.list_job`, which reports the minion's return and retcode.
 */
export class SaltCommandBackend implements CommandBackend {
  private readonly saltBin: string;
  private readonly saltRunBin: string;
  private readonly exec: ExecFn;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly maxPendingMs: number;
  private readonly now: () => number;

  private readonly listeners = new Set<CommandBackendListener>();
  private readonly pending = new Map<string, PendingJob>();
  private timer: NodeJS.Timeout | null = null;
  private polling = false;

  constructor(opts: SaltCommandBackendOpts = {}) {
    this.saltBin = opts.saltBin ?? "salt";
    this.saltRunBin = opts.saltRunBin ?? "salt-run";
    this.exec = opts.exec ?? defaultExec;
    this.logger = opts.logger ?? silentLogger;
    this.timeoutMs = opts.timeoutMs ?? 30000;
    this.maxPendingMs = opts.maxPendingMs ?? 24 * 60 * 60 * 1000;
    this.now = opts.now ?? Date.now;
  }

  async submit(targetId: string, payload: CommandPayload): Promise<string> {
    // "--" ends option parsing so an argument cannot turn into a salt flag
    const args = ["--async", "--out=json", "--", targetId, payload.fun, ...payload.args];
    let res: ExecResult;
    try {
      res = await this.exec(this.saltBin, args, { timeoutMs: this.timeoutMs });
    } catch (e) {
      if (isFleetError(e)) throw e;
      throw new ConnectivityError(`${this.saltBin} failed: ${redactSensitiveInfo(errorMessage(e))}`, { target: targetId }, e);
    }
    if (res.exitCode !== 0) {
      throw new ConnectivityError(`${this.saltBin} exited with ${res.exitCode}: ${redactSensitiveInfo((res.stderr || res.stdout).trim())}`, {
        target: targetId,
      });
    }

    const jid = parseJobId(res.stdout);
    if (!jid) {
      throw new ConnectivityError(`No job id in ${this.saltBin} output for ${targetId}`, { target: targetId });
    }
    this.pending.set(jid, { target: targetId, since: this.now() });
    return jid;
  }

  subscribe(listener: CommandBackendListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  resume(handle: string, targetId: string): void {
    if (!this.pending.has(handle)) this.pending.set(handle, { target: targetId, since: this.now() });
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.pollOnce().catch((e: unknown) => this.logger.error("poll failed", { error: errorMessage(e) }));
    }, intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  pendingJobs(): number {
    return this.pending.size;
  }

  /** One polling pass over every pending job. Returns how many results were delivered. */
  async pollOnce(): Promise<number> {
    if (this.polling) return 0;
    this.polling = true;
    let delivered = 0;
    try {
      for (const [jid, job] of [...this.pending]) {
        if (this.now() - job.since > this.maxPendingMs) {
          this.pending.delete(jid);
          this.logger.warn("job abandoned without return", { jid, target: job.target });
          continue;
        }

        const event = await this.lookup(jid, job.target);
        if (!event) continue;
        this.pending.delete(jid);
        this.emit(event);
        delivered++;
      }
    } finally {
      this.polling = false;
    }
    return delivered;
  }

  private async lookup(jid: string, target: string): Promise<CommandResultEvent | null> {
    try {
      const res = await this.exec(this.saltRunBin, ["jobs.list_job", jid, "--out=json"], { timeoutMs: this.timeoutMs });
      if (res.exitCode !== 0) {
        this.logger.warn("job lookup failed", { jid, exitCode: res.exitCode });
        return null;
      }
      return parseJobReturn(res.stdout, jid, target);
    } catch (e) {
      this.logger.warn("job lookup failed", { jid, error: errorMessage(e) });
      return null;
    }
  }

  private emit(event: CommandResultEvent): void {
    for (const l of this.listeners) {
      try {
        l.onResult(event);
      } catch (e) {
        this.logger.error("result listener failed", { jid: event.handle, error: errorMessage(e) });
      }
    }
  }
}

/** Job id from `salt --async`: either `{"jid": ...}` or "Executed command with job ID: <jid>". */
export function parseJobId(stdout: string): string | null {
  const text = stdout.trim();
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === "object" && parsed !== null) {
      const jid: unknown = Reflect.get(parsed, "jid");
      if (typeof jid === "string" || typeof jid === "number") return String(jid);
    }
  } catch {
    // plain-text form
  }
  const m = /job ID:\s*(\d+)/i.exec(text);
  return m ? m[1] : null;
}

/**
 * Return of `target` from `salt-run jobs.list_job`, or null while the minion has not
 * answered. Without a retcode the `success` flag decides between 0 and 1.
 */
export function parseJobReturn(stdout: string, jid: string, target: string): CommandResultEvent | null {
  const text = stdout.trim();
  if (!text) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new ConnectivityError(`Unparsable job output for ${jid}`);
  }
  if (typeof parsed !== "object" || parsed === null) return null;

  const results: unknown = Reflect.get(parsed, "Result");
  if (typeof results !== "object" || results === null) return null;
  const entry: unknown = Reflect.get(results, target);
  if (typeof entry !== "object" || entry === null) return null;

  const ret: unknown = Reflect.get(entry, "return");
  const retcode: unknown = Reflect.get(entry, "retcode");
  const success: unknown = Reflect.get(entry, "success");

  const exitCode = typeof retcode === "number" ? retcode : success === false ? 1 : 0;
  const output = typeof ret === "string" ? ret : JSON.stringify(ret ?? null, null, 2);
  return { handle: jid, exitCode, output };
}

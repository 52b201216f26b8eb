import { mkdir, open, readFile, stat, unlink } from "node:fs/promises";
import path from "node:path";
import { ConflictError, errorMessage } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/logger.js";

export const LOCK_FILE = "fleetctl.lock";

/** A lock file still empty after this long was left by a process that died mid-write. */
const EMPTY_LOCK_STALE_MS = 10_000;

export type LockHolder = { pid: number; since: number; role: string };

export type StateLock = {
  readonly path: string;
  readonly holder: LockHolder;
  release(): Promise<void>;
};

export type AcquireOpts = {
  /** Recorded in the lock file, e.g. "serve" or "cli". */
  role: string;
  /** How long to wait for a live holder before giving up. */
  waitMs?: number;
  logger?: Logger;
};

export function lockPath(stateDir: string): string {
  return path.join(stateDir, LOCK_FILE);
}

/** `pid\nsince\nrole`; null while the holder has not finished writing it. */
export function parseLockFile(content: string): LockHolder | null {
  const [pid, since, role] = content.split("\n");
  const p = Number(pid);
  const s = Number(since);
  if (!Number.isInteger(p) || p <= 0 || !Number.isFinite(s)) return null;
  return { pid: p, since: s, role: role || "unknown" };
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    // EPERM: it exists but belongs to someone else
    return e instanceof Error && "code" in e && e.code === "EPERM";
  }
}

/**
 * Exclusive, PID-stamped lock on a state directory. Locks of dead processes are taken
 * over; a live holder (this process included) is waited for up to `waitMs`, after which
 * the call fails with a ConflictError (reason `state_locked`).
 */
export async function acquireStateLock(stateDir: string, opts: AcquireOpts): Promise<StateLock> {
  const file = lockPath(stateDir);
  const logger = opts.logger ?? silentLogger;
  const waitMs = opts.waitMs ?? 2000;
  const started = Date.now();
  await mkdir(stateDir, { recursive: true });

  for (let attempt = 1; ; attempt++) {
    const holder: LockHolder = { pid: process.pid, since: Date.now(), role: opts.role };
    try {
      const fh = await open(file, "wx", 0o600);
      try {
        await fh.writeFile(`${holder.pid}\n${holder.since}\n${holder.role}\n`, "utf8");
        await fh.sync();
      } finally {
        await fh.close();
      }
      return { path: file, holder, release: () => releaseLock(file, holder, logger) };
    } catch (e) {
      if (!(e instanceof Error && "code" in e && e.code === "EEXIST")) throw e;
    }

    const current = await inspect(file);
    if (current.kind === "gone") continue;
    if (current.kind === "orphaned") {
      logger.warn("removing orphaned state lock", { path: file, pid: current.pid ?? null });
      await unlink(file).catch((e: unknown) => {
        if (!(e instanceof Error && "code" in e && e.code === "ENOENT")) throw e;
      });
      continue;
    }

    if (Date.now() - started >= waitMs) {
      const who = current.holder ? `pid ${current.holder.pid} (${current.holder.role})` : "a starting process";
      throw new ConflictError(`State directory ${stateDir} is locked by ${who}`, "state_locked", {
        stateDir,
        pid: current.holder?.pid ?? null,
      });
    }
    const backoff = Math.min(25 * Math.pow(1.5, attempt), 500);
    await new Promise((r) => setTimeout(r, backoff));
  }
}

type Inspection =
  | { kind: "gone" }
  | { kind: "orphaned"; pid?: number }
  | { kind: "held"; holder: LockHolder | null };

async function inspect(file: string): Promise<Inspection> {
  let content: string;
  let mtimeMs: number;
  try {
    content = await readFile(file, "utf8");
    mtimeMs = (await stat(file)).mtimeMs;
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return { kind: "gone" };
    throw e;
  }

  const holder = parseLockFile(content);
  if (!holder) {
    return Date.now() - mtimeMs > EMPTY_LOCK_STALE_MS ? { kind: "orphaned" } : { kind: "held", holder: null };
  }
  return isProcessAlive(holder.pid) ? { kind: "held", holder } : { kind: "orphaned", pid: holder.pid };
}

async function releaseLock(file: string, ours: LockHolder, logger: Logger): Promise<void> {
  let content: string;
  try {
    content = await readFile(file, "utf8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return;
    throw new Error(`Failed to release state lock ${file}: ${errorMessage(e)}`);
  }

  const current = parseLockFile(content);
  if (!current || current.pid !== ours.pid || current.since !== ours.since) {
    logger.warn("state lock taken over by another process", { path: file, pid: current?.pid ?? null });
    return;
  }
  await unlink(file);
}

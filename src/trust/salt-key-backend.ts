import { ConnectivityError, errorMessage, isFleetError } from "../core/errors.js";
import { defaultExec, type ExecFn, type ExecResult } from "../core/exec.js";
import { redactSensitiveInfo } from "../core/security.js";
import type { TrustBackend } from "../types/backends.js";

const KEY_SECTIONS = ["minions_pre", "minions"] as const;

/**
 * Trust backend over the salt-key CLI. Pending keys live under `minions_pre`,
 * accepted ones under `minions`; the pending section is consulted first.
 */
export class SaltKeyTrustBackend implements TrustBackend {
  constructor(
    private readonly bin: string = "salt-key",
    private readonly exec: ExecFn = defaultExec,
    private readonly timeoutMs: number = 30000,
  ) {}

  async lookupFingerprint(id: string): Promise<string | null> {
    const { stdout } = await this.call(["--finger", id, "--out=json"]);
    return parseFingerprint(stdout, id);
  }

  async admitToFleet(id: string): Promise<void> {
    await this.call([`--accept=${id}`, "--yes"]);
  }

  private async call(args: string[]): Promise<ExecResult> {
    let res: ExecResult;
    try {
      res = await this.exec(this.bin, args, { timeoutMs: this.timeoutMs });
    } catch (e) {
      if (isFleetError(e)) throw e;
      throw new ConnectivityError(`${this.bin} failed: ${redactSensitiveInfo(errorMessage(e))}`, { args: args.join(" ") }, e);
    }
    if (res.exitCode !== 0) {
      const detail = redactSensitiveInfo((res.stderr || res.stdout).trim());
      throw new ConnectivityError(`${this.bin} exited with ${res.exitCode}: ${detail}`, { args: args.join(" ") });
    }
    return res;
  }
}

export function parseFingerprint(stdout: string, id: string): string | null {
  const trimmed = stdout.trim();
  if (!trimmed) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    throw new ConnectivityError(`Unparsable salt-key output for ${id}`);
  }
  if (typeof parsed !== "object" || parsed === null) return null;

  for (const section of KEY_SECTIONS) {
    const keys: unknown = Reflect.get(parsed, section);
    if (typeof keys !== "object" || keys === null) continue;
    const fp: unknown = Reflect.get(keys, id);
    if (typeof fp === "string" && fp.length > 0) return fp;
  }
  return null;
}

import { isAbsolute } from "node:path";
import { ValidationError } from "../core/errors.js";
import type { RetentionPolicy } from "../types/backup.js";

const REPOSITORY_URL = /^(ssh:\/\/|file:\/\/|\/)[A-Za-z0-9@:./_-]+$/;
const ARCHIVE_NAME = /^[A-Za-z0-9_:-]+$/;
export const MAX_RETENTION = 1000;

export function validateRepositoryUrl(url: string): string {
  if (!REPOSITORY_URL.test(url)) {
    throw new ValidationError(`Invalid repository URL format: ${formatRepositoryTarget(url)}`);
  }
  return url;
}

/** `fleet-YYYY-MM-DD_HH-MM-SS-mmm` in UTC; two runs in the same second get distinct names. */
export function archiveNameFor(at: Date, prefix = "fleet"): string {
  const p = (n: number) => String(n).padStart(2, "0");
  const date = `${at.getUTCFullYear()}-${p(at.getUTCMonth() + 1)}-${p(at.getUTCDate())}`;
  const time = `${p(at.getUTCHours())}-${p(at.getUTCMinutes())}-${p(at.getUTCSeconds())}-${String(at.getUTCMilliseconds()).padStart(3, "0")}`;
  return validateArchiveName(`${prefix}-${date}_${time}`);
}

export function validateArchiveName(name: string): string {
  if (!ARCHIVE_NAME.test(name)) {
    throw new ValidationError(`Invalid archive name: ${name}`);
  }
  return name;
}

export function validateRetention(retention: RetentionPolicy): RetentionPolicy {
  for (const [k, v] of Object.entries(retention)) {
    if (!Number.isInteger(v) || v < 0 || v > MAX_RETENTION) {
      throw new ValidationError(`Invalid retention count for ${k}: ${v}`);
    }
  }
  return retention;
}

/** Backup sources must be absolute and free of traversal segments. */
export function validateBackupPaths(paths: readonly string[]): string[] {
  if (paths.length === 0) throw new ValidationError("No backup paths configured");
  for (const p of paths) {
    if (p.includes("\0") || p.split("/").includes("..")) {
      throw new ValidationError(`Invalid backup path: ${p}`);
    }
    if (!isAbsolute(p)) {
      throw new ValidationError(`Backup path must be absolute: ${p}`);
    }
  }
  return [...paths];
}

/** Repository target for display and logs: the user part is hidden. */
export function formatRepositoryTarget(url: string): string {
  if (url.startsWith("ssh://")) return url.replace(/^ssh:\/\/[^@/]+@/, "ssh://***@");
  return url.replace(/^[^@/:]+@/, "***@");
}

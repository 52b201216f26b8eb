import type { TrustBackend } from "../types/backends.js";
import type { VerifyOutcome } from "../types/minion.js";

/** Fingerprints compare trimmed and case-insensitively ("AA:bb" equals " aa:BB"). */
export function normalizeFingerprint(fp: string): string {
  return fp.trim().toLowerCase();
}

export function fingerprintsEqual(a: string, b: string): boolean {
  return normalizeFingerprint(a) === normalizeFingerprint(b);
}

/**
 * Compare a claimed fingerprint with the one the trust backend holds for `claimedId`.
 * Read-only; backend failures propagate to the caller. Holds no lock, so slow lookups
 * for one identity never delay another's.
 */
export async function verifyFingerprint(backend: TrustBackend, claimedId: string, claimedFingerprint: string): Promise<VerifyOutcome> {
  const actual = await backend.lookupFingerprint(claimedId);
  if (actual === null || actual.trim().length === 0) return "unknown";
  return fingerprintsEqual(actual, claimedFingerprint) ? "match" : "mismatch";
}

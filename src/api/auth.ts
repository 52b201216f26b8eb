import { createHash, timingSafeEqual } from "node:crypto";
import type { OperatorConfig } from "../types/config.js";
import type { OperatorRef } from "../types/operator.js";

export function hashToken(token: string): string {
  return createHash("sha256").update(token, "utf8").digest("hex");
}

/** Resolves bearer tokens to operators. Only SHA-256 digests of tokens are configured. */
export class OperatorDirectory {
  private readonly entries: { digest: Buffer; ref: OperatorRef }[];

  constructor(operators: readonly OperatorConfig[]) {
    this.entries = operators.map((o) => ({
      digest: Buffer.from(o.token_sha256.toLowerCase(), "hex"),
      ref: { subject: o.subject, role: o.role },
    }));
  }

  /** Operator for an `Authorization: Bearer <token>` header, or null. */
  authenticate(authorization: string | undefined): OperatorRef | null {
    const m = /^Bearer\s+(\S+)\s*$/i.exec(authorization ?? "");
    if (!m) return null;

    const digest = Buffer.from(hashToken(m[1]), "hex");
    let found: OperatorRef | null = null;
    for (const entry of this.entries) {
      // no early exit: every entry is compared
      if (entry.digest.length === digest.length && timingSafeEqual(entry.digest, digest) && !found) {
        found = entry.ref;
      }
    }
    return found ? { ...found } : null;
  }

  size(): number {
    return this.entries.length;
  }
}

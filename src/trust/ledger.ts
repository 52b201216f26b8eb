import { KeyedClaims } from "../core/concurrency.js";
import {
  AlreadyDecidedError,
  ConflictError,
  ConnectivityError,
  NotFoundError,
  errorMessage,
  isFleetError,
} from "../core/errors.js";
import { silentLogger, type Logger } from "../core/logger.js";
import type { EntityStore } from "../store/entity-store.js";
import type { TrustBackend } from "../types/backends.js";
import type { MinionIdentity, TrustState } from "../types/minion.js";
import type { OperatorRef } from "../types/operator.js";
import { fingerprintsEqual, normalizeFingerprint, verifyFingerprint } from "./fingerprint.js";

export type TrustLedgerOpts = {
  store: EntityStore<MinionIdentity>;
  backend: TrustBackend;
  logger?: Logger;
  now?: () => Date;
};

/**
 * Trust ledger: owns every MinionIdentity.
 *
 * Decisions go Pending → Accepted | Rejected exactly once. A decision first takes a
 * per-identity claim; whoever holds it wins and every concurrent decision on the same
 * id fails with AlreadyDecidedError. Accept commits only after the backend admitted
 * the minion; on failure the claim is dropped and the identity stays Pending.
 */
export class TrustLedger {
  private readonly store: EntityStore<MinionIdentity>;
  private readonly backend: TrustBackend;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly claims = new KeyedClaims();

  constructor(opts: TrustLedgerOpts) {
    this.store = opts.store;
    this.backend = opts.backend;
    this.logger = opts.logger ?? silentLogger;
    this.now = opts.now ?? (() => new Date());
  }

  /** Record a handshake. Same (id, fingerprint) is a no-op; a different fingerprint is a conflict. */
  async recordPending(id: string, fingerprint: string): Promise<MinionIdentity> {
    const fp = normalizeFingerprint(fingerprint);
    const inserted = this.store.insert({
      id,
      fingerprint: fp,
      state: "pending",
      firstSeenAt: this.now().toISOString(),
      decidedAt: null,
      decidedBy: null,
    });

    if (inserted.ok) {
      await inserted.persisted;
      this.logger.info("handshake recorded", { minion: id });
      return inserted.record;
    }

    const existing = inserted.current;
    if (!fingerprintsEqual(existing.fingerprint, fp)) {
      this.logger.warn("handshake fingerprint conflict", { minion: id, state: existing.state });
      throw new ConflictError(`Identity ${id} is already registered with a different fingerprint`, "fingerprint_mismatch", {
        id,
        state: existing.state,
      });
    }
    if (existing.state === "rejected") {
      this.logger.warn("handshake from rejected identity", { minion: id });
      throw new ConflictError(`Identity ${id} was rejected; re-onboarding requires a new identity`, "identity_exists", {
        id,
        state: existing.state,
      });
    }
    return existing;
  }

  async accept(id: string, fingerprint: string, operator: OperatorRef): Promise<MinionIdentity> {
    const release = this.claimPending(id, operator.subject, "accept");
    try {
      const current = this.requirePending(id);

      if (!fingerprintsEqual(current.fingerprint, fingerprint)) {
        throw new ConflictError(`Fingerprint mismatch for ${id}: presented fingerprint differs from the recorded one`, "fingerprint_mismatch", { id });
      }

      const verdict = await this.verify(id, fingerprint);
      if (verdict === "unknown") {
        throw new NotFoundError(`Trust backend has no key for ${id}`, { id });
      }
      if (verdict === "mismatch") {
        throw new ConflictError(`Fingerprint mismatch for ${id}: backend reports a different key`, "fingerprint_mismatch", { id });
      }

      try {
        await this.backend.admitToFleet(id);
      } catch (e) {
        this.logger.warn("admit to fleet failed; identity left pending", { minion: id, error: errorMessage(e) });
        throw isFleetError(e) ? e : new ConnectivityError(`Failed to admit ${id} to the fleet: ${errorMessage(e)}`, { id }, e);
      }

      const decided = await this.commit(id, "accepted", operator);
      this.logger.info("minion accepted", { minion: id, by: operator.subject });
      return decided;
    } finally {
      release();
    }
  }

  async reject(id: string, operator: OperatorRef): Promise<MinionIdentity> {
    const release = this.claimPending(id, operator.subject, "reject");
    try {
      this.requirePending(id);
      const decided = await this.commit(id, "rejected", operator);
      this.logger.info("minion rejected", { minion: id, by: operator.subject });
      return decided;
    } finally {
      release();
    }
  }

  status(id: string): MinionIdentity {
    const record = this.store.get(id);
    if (!record) throw new NotFoundError(`Unknown minion: ${id}`, { id });
    return record;
  }

  /** Identities ordered by first handshake, optionally filtered by state. */
  list(state?: TrustState): MinionIdentity[] {
    return this.store
      .values()
      .filter((m) => state === undefined || m.state === state)
      .sort((a, b) => a.firstSeenAt.localeCompare(b.firstSeenAt) || a.id.localeCompare(b.id));
  }

  isAccepted(id: string): boolean {
    return this.store.get(id)?.state === "accepted";
  }

  private claimPending(id: string, holder: string, action: string): () => void {
    const record = this.store.get(id);
    if (!record) throw new NotFoundError(`Unknown minion: ${id}`, { id });
    if (record.state !== "pending") {
      throw new AlreadyDecidedError(`Minion ${id} is already ${record.state}`, { id, state: record.state });
    }

    const release = this.claims.tryAcquire(id, `${action}:${holder}`);
    if (!release) {
      throw new AlreadyDecidedError(`A decision for ${id} is already in progress`, { id, state: record.state });
    }
    return release;
  }

  private requirePending(id: string): MinionIdentity {
    const record = this.status(id);
    if (record.state !== "pending") {
      throw new AlreadyDecidedError(`Minion ${id} is already ${record.state}`, { id, state: record.state });
    }
    return record;
  }

  private async verify(id: string, fingerprint: string) {
    try {
      return await verifyFingerprint(this.backend, id, fingerprint);
    } catch (e) {
      throw isFleetError(e) ? e : new ConnectivityError(`Fingerprint lookup failed for ${id}: ${errorMessage(e)}`, { id }, e);
    }
  }

  private async commit(id: string, state: Exclude<TrustState, "pending">, operator: OperatorRef): Promise<MinionIdentity> {
    const res = this.store.compareAndSet(
      id,
      (cur) => cur.state === "pending",
      (cur) => ({ ...cur, state, decidedAt: this.now().toISOString(), decidedBy: operator.subject }),
    );
    if (!res.ok) {
      throw new AlreadyDecidedError(`Minion ${id} is already ${res.current?.state ?? "gone"}`, { id });
    }
    await res.persisted;
    return res.record;
  }
}

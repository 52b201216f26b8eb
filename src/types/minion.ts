/** Minion identity: trust status of one remote agent. */
export type TrustState = "pending" | "accepted" | "rejected";

export type MinionIdentity = {
  id: string;
  /** Public-key fingerprint; bound to `id` for good once accepted. */
  fingerprint: string;
  state: TrustState;
  firstSeenAt: string;
  decidedAt: string | null;
  decidedBy: string | null;
};

export type VerifyOutcome = "match" | "mismatch" | "unknown";

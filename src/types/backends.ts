import type { BackupPayload, BackupStats, RetentionPolicy, TransportCredentials } from "./backup.js";
import type { CommandPayload } from "./command.js";

/** Key management side of the automation backend. */
export type TrustBackend = {
  /** Fingerprint the backend currently holds for `id`, or null when it has no record. */
  lookupFingerprint(id: string): Promise<string | null>;
  /** Admit the minion to the fleet. Idempotent on the backend side; throws on failure. */
  admitToFleet(id: string): Promise<void>;
};

export type CommandResultEvent = {
  handle: string;
  exitCode: number;
  output: string;
};

export type CommandBackendListener = {
  onAck?: (handle: string) => void;
  onResult: (event: CommandResultEvent) => void;
};

/** Remote execution side of the automation backend. */
export type CommandBackend = {
  /** Submit for execution; resolves with the backend's handle once it accepted the job. */
  submit(targetId: string, payload: CommandPayload): Promise<string>;
  /** Register for asynchronous acks and results. Returns an unsubscribe function. */
  subscribe(listener: CommandBackendListener): () => void;
  /** Keep watching a job submitted before a restart. */
  resume?(handle: string, targetId: string): void;
};

export type ProbeResult =
  | { kind: "exists" }
  | { kind: "not_found"; detail: string }
  | { kind: "auth_error"; detail: string }
  | { kind: "network_error"; detail: string }
  | { kind: "invalid_repository"; detail: string };

export type TransportResult<T = unknown> =
  | ({ ok: true } & T)
  | { ok: false; error: string };

/** Encrypted repository storage. */
export type BackupTransport = {
  probe(repositoryTarget: string, credentials: TransportCredentials): Promise<ProbeResult>;
  initialize(repositoryTarget: string, credentials: TransportCredentials): Promise<TransportResult>;
  run(repositoryTarget: string, credentials: TransportCredentials, payload: BackupPayload): Promise<TransportResult<{ stats: BackupStats }>>;
  prune?(repositoryTarget: string, credentials: TransportCredentials, retention: RetentionPolicy): Promise<TransportResult>;
};

/** Backup run: one execution of the scheduled backup job. */
export type BackupOutcome = "success" | "initialized_and_succeeded" | "failed";

export type BackupStats = {
  originalSize?: number;
  compressedSize?: number;
  deduplicatedSize?: number;
  filesCount?: number;
};

export type BackupRun = {
  id: string;
  repositoryTarget: string;
  archiveName: string;
  trigger: "manual" | "schedule";
  startedAt: string;
  /** Null while the run is in flight. */
  finishedAt: string | null;
  outcome: BackupOutcome | null;
  /** Redacted: never contains the passphrase or key material. */
  errorDetail: string | null;
  errorCode: string | null;
  stats: BackupStats | null;
  pruned: boolean;
};

export type BackupCredentials = {
  passphrase: string;
  /** Private key for the SSH-style transport, if the target needs one. */
  sshKey: string | null;
};

/** Repository credentials as handed to the transport: key already materialized on disk. */
export type TransportCredentials = {
  passphrase: string;
  sshKeyPath: string | null;
};

export type BackupPayload = {
  archiveName: string;
  paths: string[];
  compression: string;
};

export type RetentionPolicy = {
  daily: number;
  weekly: number;
  monthly: number;
};

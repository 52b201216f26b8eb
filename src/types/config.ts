/** Configuration types: layered config system (base.yaml ← env.yaml ← FLEET_* env vars). */
import type { OperatorRole } from "./operator.js";

export type ServerConfig = {
  host: string;
  port: number;
};

export type TrustConfig = {
  salt_key_bin: string;
};

export type CommandsConfig = {
  default_timeout_seconds: number;
  max_timeout_seconds: number;
  output_max_bytes: number;
  watchdog_interval_seconds: number;
  success_exit_code: number;
  allowed_functions: string[];
  salt_bin: string;
  salt_run_bin: string;
  poll_interval_seconds: number;
};

export type ThrottleKeyKind = "ip" | "subject";

export type ThrottleClassConfig = {
  limit: number;
  window_seconds: number;
  key: ThrottleKeyKind;
};

export type ThrottleConfig = {
  safelist: string[];
  classes: Record<string, ThrottleClassConfig>;
};

export type BackupConfig = {
  enabled: boolean;
  repository_url: string;
  encryption: string;
  interval_minutes: number;
  paths: string[];
  retention: { daily: number; weekly: number; monthly: number };
  passphrase_file: string;
  ssh_key_file?: string | null;
  key_dir: string;
  borg_bin: string;
  compression: string;
};

export type OperatorConfig = {
  subject: string;
  role: OperatorRole;
  token_sha256: string;
};

export type FleetConfig = {
  schema_version: string;
  state_dir: string;
  server: ServerConfig;
  trust: TrustConfig;
  commands: CommandsConfig;
  throttle: ThrottleConfig;
  backup: BackupConfig;
  operators: OperatorConfig[];
};

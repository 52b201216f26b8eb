#!/usr/bin/env node

import { Command } from "commander";
import { backupRun, backupStatus, backupSweep } from "./commands/backup.js";
import type { ConfigOpts } from "./commands/context.js";
import { executionList, executionStatus } from "./commands/executions.js";
import { EXIT } from "./commands/exit-codes.js";
import type { CommandResult } from "./commands/result.js";
import { serve } from "./commands/serve.js";
import { trustAccept, trustHandshake, trustList, trustReject, trustStatus } from "./commands/trust.js";
import { validateAll } from "./commands/validate.js";
import { formatRepositoryTarget } from "./backup/validation.js";

type Format = "human" | "jsonl";
type GlobalOpts = { config: string; env?: string; format: Format };

const program = new Command();

program
  .name("fleetctl")
  .description("Fleet trust, command dispatch and backup control plane")
  .version("0.1.0")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Config overlay to apply on top of base.yaml (e.g. production)")
  .option("--format <format>", "Output format: human|jsonl", "human");

function globals(): GlobalOpts {
  const opts = program.opts<{ config: string; env?: string; format: string }>();
  return { config: opts.config, env: opts.env, format: opts.format === "jsonl" ? "jsonl" : "human" };
}

function configOpts(g: GlobalOpts): ConfigOpts {
  return { configDir: g.config, env: g.env };
}

/** Print a command result and exit non-zero on failure. */
function report<T>(res: CommandResult<T>, format: Format, human: (value: T) => void): void {
  if (!res.ok) {
    if (format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "error", code: res.error.code, message: res.error.message }) + "\n");
    } else {
      console.error(`${res.error.code}: ${res.error.message}`);
    }
    process.exit(res.exitCode);
  }

  if (format === "jsonl") {
    const value: unknown = res.value;
    const items = Array.isArray(value) ? value : [value];
    for (const item of items) process.stdout.write(JSON.stringify(item) + "\n");
  } else {
    human(res.value);
  }
}

program
  .command("validate")
  .description("Validate layered config and request schemas")
  .action(async () => {
    const g = globals();
    const res = await validateAll({ configDir: g.config, env: g.env });

    if (!res.ok) {
      if (g.format === "jsonl") {
        for (const err of res.errors) process.stdout.write(JSON.stringify(err) + "\n");
      } else {
        for (const err of res.errors) console.error(`${err.code}: ${err.message}`);
      }
      process.exit(EXIT.INVALID_CONFIG);
    }

    if (g.format === "jsonl") {
      for (const w of res.warnings) process.stdout.write(JSON.stringify(w) + "\n");
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
    } else {
      for (const w of res.warnings) console.warn(`${w.code}: ${w.message}`);
      console.log("OK");
    }
  });

program
  .command("serve")
  .description("Run the HTTP API, command watchdog and backup schedule")
  .option("--port <port>", "Override server.port", (v) => Number.parseInt(v, 10))
  .option("--host <host>", "Override server.host")
  .action(async (opts: { port?: number; host?: string }) => {
    const g = globals();
    const serving = await serve({ ...configOpts(g), port: opts.port, host: opts.host });

    const stop = (signal: string) => {
      console.log(`[fleet] ${signal} received, shutting down`);
      serving.shutdown().then(
        () => process.exit(EXIT.SUCCESS),
        (err: unknown) => {
          console.error(`[fleet] shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
          process.exit(EXIT.FAILED);
        },
      );
    };
    process.once("SIGINT", () => stop("SIGINT"));
    process.once("SIGTERM", () => stop("SIGTERM"));
  });

// --- trust ---

const trust = program.command("trust").description("Minion identity trust decisions");

trust
  .command("list")
  .description("List known minion identities")
  .option("--state <state>", "pending|accepted|rejected")
  .action(async (opts: { state?: string }) => {
    const g = globals();
    report(await trustList({ ...configOpts(g), state: opts.state }), g.format, (minions) => {
      if (minions.length === 0) {
        console.log("No minions found.");
        return;
      }
      for (const m of minions) console.log(`${m.id}  ${m.state}  ${m.fingerprint}  ${m.firstSeenAt}`);
    });
  });

trust
  .command("status")
  .description("Show one minion identity")
  .argument("<id>", "Minion id")
  .action(async (id: string) => {
    const g = globals();
    report(await trustStatus(configOpts(g), id), g.format, (m) => console.log(JSON.stringify(m, null, 2)));
  });

trust
  .command("handshake")
  .description("Record a pending identity")
  .argument("<id>", "Minion id")
  .argument("<fingerprint>", "Public key fingerprint")
  .action(async (id: string, fingerprint: string) => {
    const g = globals();
    report(await trustHandshake(configOpts(g), id, fingerprint), g.format, (m) => console.log(`${m.id}: ${m.state}`));
  });

trust
  .command("accept")
  .description("Accept a pending identity after verifying its fingerprint")
  .argument("<id>", "Minion id")
  .argument("<fingerprint>", "Fingerprint verified out of band")
  .option("--by <subject>", "Operator recorded as decider")
  .action(async (id: string, fingerprint: string, opts: { by?: string }) => {
    const g = globals();
    report(await trustAccept({ ...configOpts(g), by: opts.by }, id, fingerprint), g.format, (m) =>
      console.log(`${m.id}: ${m.state} by ${m.decidedBy ?? "unknown"}`),
    );
  });

trust
  .command("reject")
  .description("Reject a pending identity")
  .argument("<id>", "Minion id")
  .option("--by <subject>", "Operator recorded as decider")
  .action(async (id: string, opts: { by?: string }) => {
    const g = globals();
    report(await trustReject({ ...configOpts(g), by: opts.by }, id), g.format, (m) =>
      console.log(`${m.id}: ${m.state} by ${m.decidedBy ?? "unknown"}`),
    );
  });

// --- commands ---

const commands = program.command("commands").description("Dispatched command executions");

commands
  .command("status")
  .description("Show one execution, or list executions when no id is given")
  .argument("[executionId]", "Execution id")
  .option("--target <id>", "Only executions for this minion")
  .option("--state <state>", "queued|running|completed|failed|timed_out")
  .action(async (executionId: string | undefined, opts: { target?: string; state?: string }) => {
    const g = globals();
    if (executionId) {
      report(await executionStatus(configOpts(g), executionId), g.format, (e) => console.log(JSON.stringify(e, null, 2)));
      return;
    }
    report(await executionList({ ...configOpts(g), target: opts.target, state: opts.state }), g.format, (list) => {
      if (list.length === 0) {
        console.log("No executions found.");
        return;
      }
      for (const e of list) console.log(`${e.id}  ${e.targetMinionId}  ${e.payload.fun}  ${e.state}  ${e.startedAt}`);
    });
  });

// --- backup ---

const backup = program.command("backup").description("Encrypted repository backups");

backup
  .command("run")
  .description("Run a backup now")
  .action(async () => {
    const g = globals();
    const res = await backupRun(configOpts(g));
    report(res, g.format, (r) => {
      if (r.skipped) {
        console.log(`Skipped: ${r.reason}`);
        return;
      }
      const detail = r.run.errorDetail ? ` (${r.run.errorDetail})` : "";
      console.log(`${r.run.archiveName}: ${r.run.outcome ?? "unknown"}${detail}`);
    });
    if (res.ok && !res.value.skipped && res.value.run.outcome === "failed") process.exit(EXIT.FAILED);
  });

backup
  .command("status")
  .description("Show recent backup runs")
  .option("--limit <n>", "Number of runs", (v) => Number.parseInt(v, 10), 10)
  .action(async (opts: { limit: number }) => {
    const g = globals();
    report(await backupStatus({ ...configOpts(g), limit: opts.limit }), g.format, (runs) => {
      if (runs.length === 0) {
        console.log("No backup runs yet.");
        return;
      }
      for (const r of runs) {
        console.log(`${r.startedAt}  ${r.archiveName}  ${r.outcome ?? "running"}  ${formatRepositoryTarget(r.repositoryTarget)}`);
      }
    });
  });

backup
  .command("sweep")
  .description("Remove transport key material left by crashed runs")
  .action(async () => {
    const g = globals();
    report(await backupSweep(configOpts(g)), g.format, (r) => console.log(`Removed ${r.removed} key director${r.removed === 1 ? "y" : "ies"}.`));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FAILED);
});

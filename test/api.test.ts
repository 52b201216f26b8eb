import { describe, expect, it, beforeAll } from "vitest";
import request from "supertest";
import type { Express } from "express";
import { createApp, errorBody } from "../src/api/app.js";
import { OperatorDirectory, hashToken } from "../src/api/auth.js";
import { BackupOrchestrator } from "../src/backup/orchestrator.js";
import { ConflictError, ThrottledError } from "../src/core/errors.js";
import { CommandDispatcher } from "../src/dispatch/dispatcher.js";
import { createRegistry, type SchemaRegistry } from "../src/schema/registry.js";
import { EntityStore } from "../src/store/entity-store.js";
import { AdmissionThrottle } from "../src/throttle/admission-throttle.js";
import { TrustLedger } from "../src/trust/ledger.js";
import type { BackupRun } from "../src/types/backup.js";
import type { CommandExecution } from "../src/types/command.js";
import type { MinionIdentity } from "../src/types/minion.js";
import { FakeCommandBackend, FakeTransport, FakeTrustBackend, fp } from "./fakes.js";

const VIEWER = "Bearer test-viewer-token";
const OPERATOR = "Bearer test-operator-token";
const ADMIN = "Bearer test-admin-token";

let registry: SchemaRegistry;

beforeAll(async () => {
  registry = await createRegistry();
});

function harness(opts: { backupEnabled?: boolean; handshakeLimit?: number } = {}) {
  const trust = new FakeTrustBackend();
  const commands = new FakeCommandBackend();
  const ledger = new TrustLedger({ store: new EntityStore<MinionIdentity>(), backend: trust });
  const throttle = new AdmissionThrottle({
    handshake: { limit: opts.handshakeLimit ?? 100, windowMs: 60_000, key: "ip" },
    decision: { limit: 100, windowMs: 60_000, key: "ip" },
    dispatch: { limit: 3, windowMs: 60_000, key: "subject" },
  });
  const dispatcher = new CommandDispatcher({
    store: new EntityStore<CommandExecution>(),
    backend: commands,
    targets: ledger,
    settings: {
      defaultTimeoutSeconds: 60,
      maxTimeoutSeconds: 3600,
      outputMaxBytes: 65536,
      successExitCode: 0,
      allowedFunctions: ["test.ping", "cmd.run"],
    },
    throttle,
  });
  const backup = new BackupOrchestrator({
    store: new EntityStore<BackupRun>(),
    transport: new FakeTransport(),
    credentials: { load: async () => ({ passphrase: "test-secret", sshKey: null }) },
    settings: {
      repositoryUrl: "/var/backups/fleet",
      paths: ["/etc/fleetctl"],
      stateDir: "/var/lib/fleetctl",
      compression: "lz4",
      retention: { daily: 7, weekly: 4, monthly: 6 },
      keyDir: "/tmp",
    },
  });
  const operators = new OperatorDirectory([
    { subject: "victor", role: "viewer", token_sha256: hashToken("test-viewer-token") },
    { subject: "alice", role: "operator", token_sha256: hashToken("test-operator-token") },
    { subject: "root", role: "admin", token_sha256: hashToken("test-admin-token") },
  ]);
  const app: Express = createApp({
    ledger,
    dispatcher,
    backup: opts.backupEnabled === false ? null : backup,
    throttle,
    registry,
    operators,
  });
  return { app, ledger, dispatcher, trust, commands };
}

/** Handshake and accept `id` so it can receive commands. */
async function acceptedMinion(h: ReturnType<typeof harness>, id: string): Promise<void> {
  h.trust.keys.set(id, fp(id));
  await h.ledger.recordPending(id, fp(id));
  await h.ledger.accept(id, fp(id), { subject: "root", role: "admin" });
}

describe("api: health and routing", () => {
  it("answers health without credentials", async () => {
    const res = await request(harness().app).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });

  it("answers unknown routes with the error shape", async () => {
    const res = await request(harness().app).get("/nope");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ ok: false, error: { code: "NOT_FOUND", message: "No such route" } });
  });

  it("rejects malformed JSON", async () => {
    const res = await request(harness().app).post("/trust/handshake").set("Content-Type", "application/json").send("{bad");
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, error: { code: "VALIDATION", message: "Malformed JSON body" } });
  });
});

describe("api: trust", () => {
  it("records a handshake as pending", async () => {
    const h = harness();
    const res = await request(h.app).post("/trust/handshake").send({ id: "web1", fingerprint: fp("web1") });
    expect(res.status).toBe(202);
    expect(res.body).toEqual({ id: "web1", state: "pending" });
    expect(h.ledger.status("web1").state).toBe("pending");
  });

  it("validates handshake bodies", async () => {
    const res = await request(harness().app).post("/trust/handshake").send({ id: "web1", fingerprint: "zz" });
    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("VALIDATION");
    expect(res.body.error.message).toMatch(/^Invalid handshake request: /);
  });

  it("answers a conflicting fingerprint with 409", async () => {
    const h = harness();
    await h.ledger.recordPending("web1", fp("web1"));
    const res = await request(h.app).post("/trust/handshake").send({ id: "web1", fingerprint: fp("impostor") });
    expect(res.status).toBe(409);
    expect(res.body.error).toEqual({
      code: "CONFLICT",
      message: "Identity web1 is already registered with a different fingerprint",
      reason: "fingerprint_mismatch",
    });
  });

  it("answers a handshake from a rejected identity with 409", async () => {
    const h = harness();
    await h.ledger.recordPending("web1", fp("web1"));
    await h.ledger.reject("web1", { subject: "alice", role: "operator" });
    const res = await request(h.app).post("/trust/handshake").send({ id: "web1", fingerprint: fp("web1") });
    expect(res.status).toBe(409);
    expect(res.body.error).toEqual({
      code: "CONFLICT",
      message: "Identity web1 was rejected; re-onboarding requires a new identity",
      reason: "identity_exists",
    });
  });

  it("throttles handshakes per client with Retry-After", async () => {
    const h = harness({ handshakeLimit: 2 });
    for (const id of ["a1", "a2"]) {
      const ok = await request(h.app).post("/trust/handshake").send({ id, fingerprint: fp(id) });
      expect(ok.status).toBe(202);
    }
    const res = await request(h.app).post("/trust/handshake").send({ id: "a3", fingerprint: fp("a3") });
    expect(res.status).toBe(429);
    expect(res.body.error.code).toBe("THROTTLED");
    expect(res.body.error.retryAfterSeconds).toBeGreaterThan(0);
    expect(res.body.error.retryAfterSeconds).toBeLessThanOrEqual(60);
    expect(res.headers["retry-after"]).toBe(String(res.body.error.retryAfterSeconds));
    expect(() => h.ledger.status("a3")).toThrow("Unknown minion: a3");
  });

  it("requires an operator for decisions", async () => {
    const h = harness();
    await h.ledger.recordPending("web1", fp("web1"));

    const anonymous = await request(h.app).post("/trust/decision").send({ id: "web1", decision: "reject" });
    expect(anonymous.status).toBe(401);
    expect(anonymous.body.error.code).toBe("UNAUTHENTICATED");

    const wrongToken = await request(h.app).post("/trust/decision").set("Authorization", "Bearer not-a-token").send({ id: "web1", decision: "reject" });
    expect(wrongToken.status).toBe(401);

    const viewer = await request(h.app).post("/trust/decision").set("Authorization", VIEWER).send({ id: "web1", decision: "reject" });
    expect(viewer.status).toBe(403);
    expect(viewer.body.error).toEqual({ code: "FORBIDDEN", message: "trust.decide requires role operator" });
    expect(h.ledger.status("web1").state).toBe("pending");
  });

  it("accepts with a matching fingerprint and records the operator", async () => {
    const h = harness();
    h.trust.keys.set("web1", fp("web1"));
    await h.ledger.recordPending("web1", fp("web1"));

    const res = await request(h.app)
      .post("/trust/decision")
      .set("Authorization", OPERATOR)
      .send({ id: "web1", decision: "accept", fingerprint: fp("web1") });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ id: "web1", state: "accepted" });
    expect(h.ledger.status("web1").decidedBy).toBe("alice");
    expect(h.trust.admitted).toEqual(["web1"]);

    const again = await request(h.app).post("/trust/decision").set("Authorization", OPERATOR).send({ id: "web1", decision: "reject" });
    expect(again.status).toBe(409);
    expect(again.body.error.code).toBe("ALREADY_DECIDED");
  });

  it("requires a fingerprint to accept", async () => {
    const h = harness();
    await h.ledger.recordPending("web1", fp("web1"));
    const res = await request(h.app).post("/trust/decision").set("Authorization", OPERATOR).send({ id: "web1", decision: "accept" });
    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({ code: "VALIDATION", message: "Invalid decision request: accept requires a fingerprint" });
  });

  it("lists and shows minions to viewers", async () => {
    const h = harness();
    await h.ledger.recordPending("web1", fp("web1"));
    await acceptedMinion(h, "web2");

    const all = await request(h.app).get("/trust/minions").set("Authorization", VIEWER);
    expect(all.status).toBe(200);
    expect(all.body.minions.map((m: MinionIdentity) => m.id)).toEqual(["web1", "web2"]);

    const pending = await request(h.app).get("/trust/minions?state=pending").set("Authorization", VIEWER);
    expect(pending.body.minions.map((m: MinionIdentity) => m.id)).toEqual(["web1"]);

    const bad = await request(h.app).get("/trust/minions?state=weird").set("Authorization", VIEWER);
    expect(bad.status).toBe(400);
    expect(bad.body.error.message).toBe("Unknown trust state: weird");

    const one = await request(h.app).get("/trust/minions/web2").set("Authorization", VIEWER);
    expect(one.body).toMatchObject({ id: "web2", state: "accepted", decidedBy: "root" });

    const missing = await request(h.app).get("/trust/minions/ghost").set("Authorization", VIEWER);
    expect(missing.status).toBe(404);

    const anonymous = await request(h.app).get("/trust/minions");
    expect(anonymous.status).toBe(401);
  });
});

describe("api: commands", () => {
  it("dispatches to an accepted minion", async () => {
    const h = harness();
    await acceptedMinion(h, "web1");

    const res = await request(h.app)
      .post("/commands/dispatch")
      .set("Authorization", OPERATOR)
      .send({ targetId: "web1", payload: { fun: "cmd.run", args: ["uptime"] }, timeout: 30 });
    expect(res.status).toBe(202);
    expect(res.body.state).toBe("queued");

    await h.dispatcher.drain();
    const shown = await request(h.app).get(`/commands/${res.body.executionId}`).set("Authorization", VIEWER);
    expect(shown.status).toBe(200);
    expect(shown.body).toMatchObject({
      targetMinionId: "web1",
      payload: { fun: "cmd.run", args: ["uptime"] },
      state: "running",
      timeoutSeconds: 30,
      requestedBy: "alice",
    });

    h.commands.emitResult(shown.body.submissionHandle, 0, "up 3 days");
    const listed = await request(h.app).get("/commands?target=web1&state=completed").set("Authorization", VIEWER);
    expect(listed.body.executions).toHaveLength(1);
    expect(listed.body.executions[0].output).toBe("up 3 days");
  });

  it("refuses targets that are not accepted", async () => {
    const h = harness();
    await h.ledger.recordPending("web1", fp("web1"));
    const res = await request(h.app).post("/commands/dispatch").set("Authorization", OPERATOR).send({ targetId: "web1", payload: { fun: "test.ping" } });
    expect(res.status).toBe(422);
    expect(res.body.error).toEqual({ code: "UNKNOWN_TARGET", message: "Minion web1 is not an accepted target" });
    expect(h.commands.submissions).toEqual([]);
  });

  it("refuses functions outside the allowlist", async () => {
    const h = harness();
    await acceptedMinion(h, "web1");
    const res = await request(h.app)
      .post("/commands/dispatch")
      .set("Authorization", OPERATOR)
      .send({ targetId: "web1", payload: { fun: "system.reboot" } });
    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe("Function not allowed: system.reboot. Allowed: test.ping, cmd.run");
  });

  it("requires the operator role to dispatch", async () => {
    const h = harness();
    await acceptedMinion(h, "web1");
    const res = await request(h.app).post("/commands/dispatch").set("Authorization", VIEWER).send({ targetId: "web1", payload: { fun: "test.ping" } });
    expect(res.status).toBe(403);
  });

  it("throttles dispatches per operator", async () => {
    const h = harness();
    await acceptedMinion(h, "web1");
    const send = (auth: string) =>
      request(h.app).post("/commands/dispatch").set("Authorization", auth).send({ targetId: "web1", payload: { fun: "test.ping" } });

    for (let i = 0; i < 3; i++) expect((await send(OPERATOR)).status).toBe(202);
    const limited = await send(OPERATOR);
    expect(limited.status).toBe(429);
    expect(limited.headers["retry-after"]).toBeDefined();
    // another subject has its own budget
    expect((await send(ADMIN)).status).toBe(202);
  });

  it("reports unknown executions", async () => {
    const res = await request(harness().app).get("/commands/missing").set("Authorization", VIEWER);
    expect(res.status).toBe(404);
    expect(res.body.error).toEqual({ code: "NOT_FOUND", message: "Unknown execution: missing" });
  });
});

describe("api: backup", () => {
  it("lets admins trigger a run and viewers read the last one", async () => {
    const h = harness();
    const denied = await request(h.app).post("/backup/trigger").set("Authorization", OPERATOR);
    expect(denied.status).toBe(403);
    expect(denied.body.error.message).toBe("backup.trigger requires role admin");

    const res = await request(h.app).post("/backup/trigger").set("Authorization", ADMIN);
    expect(res.status).toBe(200);
    expect(res.body.skipped).toBe(false);
    expect(res.body.run.outcome).toBe("initialized_and_succeeded");

    const last = await request(h.app).get("/backup/last").set("Authorization", VIEWER);
    expect(last.body.run.id).toBe(res.body.run.id);
  });

  it("answers 404 when backups are disabled", async () => {
    const h = harness({ backupEnabled: false });
    const res = await request(h.app).post("/backup/trigger").set("Authorization", ADMIN);
    expect(res.status).toBe(404);
    expect(res.body.error.message).toBe("Backups are not enabled");
  });
});

describe("error body", () => {
  it("carries the reason and retry hint", () => {
    expect(errorBody(new ConflictError("taken", "identity_exists"))).toEqual({
      ok: false,
      error: { code: "CONFLICT", message: "taken", reason: "identity_exists" },
    });
    expect(errorBody(new ThrottledError("slow down", 1500))).toEqual({
      ok: false,
      error: { code: "THROTTLED", message: "slow down", retryAfterSeconds: 2 },
    });
  });
});

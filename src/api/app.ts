import express, { type Express } from "express";
import asyncHandler from "express-async-handler";
import { NotFoundError, ThrottledError, isFleetError, type FleetError } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/logger.js";
import type { BackupOrchestrator } from "../backup/orchestrator.js";
import type { CommandDispatcher } from "../dispatch/dispatcher.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { AdmissionThrottle } from "../throttle/admission-throttle.js";
import type { TrustLedger } from "../trust/ledger.js";
import type { Caller } from "../types/operator.js";
import type { OperatorDirectory } from "./auth.js";
import { authorize } from "./capabilities.js";
import {
  parseDecision,
  parseDispatch,
  parseExecutionState,
  parseHandshake,
  parseTrustState,
  queryParam,
} from "./requests.js";

export interface AppDependencies {
  ledger: TrustLedger;
  dispatcher: CommandDispatcher;
  backup: BackupOrchestrator | null;
  throttle: AdmissionThrottle;
  registry: SchemaRegistry;
  operators: OperatorDirectory;
  logger?: Logger;
}

export type ErrorBody = {
  ok: false;
  error: { code: string; message: string; reason?: string; retryAfterSeconds?: number };
};

export function errorBody(err: FleetError): ErrorBody {
  const reason = err.context.reason;
  return {
    ok: false,
    error: {
      code: err.code,
      message: err.message,
      ...(typeof reason === "string" ? { reason } : {}),
      ...(err instanceof ThrottledError ? { retryAfterSeconds: err.retryAfterSeconds } : {}),
    },
  };
}

export function createApp(deps: AppDependencies): Express {
  const { ledger, dispatcher, backup, throttle, registry, operators } = deps;
  const logger = deps.logger ?? silentLogger;

  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "64kb" }));

  const callerOf = (req: express.Request): Caller => ({
    ip: req.ip ?? req.socket.remoteAddress ?? "unknown",
    operator: operators.authenticate(req.get("authorization")),
  });

  const admit = (endpointClass: string, caller: Caller): void => {
    const decision = throttle.allow(endpointClass, throttle.keyFor(endpointClass, caller));
    if (!decision.allowed) {
      throw new ThrottledError(`Too many ${endpointClass} requests`, decision.retryAfterMs, { class: endpointClass });
    }
  };

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.post(
    "/trust/handshake",
    asyncHandler(async (req, res) => {
      const caller = callerOf(req);
      authorize("trust.handshake", caller.operator);
      admit("handshake", caller);
      const body = await parseHandshake(registry, req.body);
      const identity = await ledger.recordPending(body.id, body.fingerprint);
      res.status(202).json({ id: identity.id, state: identity.state });
    }),
  );

  app.post(
    "/trust/decision",
    asyncHandler(async (req, res) => {
      const caller = callerOf(req);
      const operator = authorize("trust.decide", caller.operator);
      admit("decision", caller);
      const body = await parseDecision(registry, req.body);
      const identity =
        body.decision === "accept"
          ? await ledger.accept(body.id, body.fingerprint, operator)
          : await ledger.reject(body.id, operator);
      res.json({ id: identity.id, state: identity.state });
    }),
  );

  app.get("/trust/minions", (req, res) => {
    authorize("trust.read", callerOf(req).operator);
    const state = parseTrustState(queryParam(req.query.state, "state"));
    res.json({ minions: ledger.list(state) });
  });

  app.get("/trust/minions/:id", (req, res) => {
    authorize("trust.read", callerOf(req).operator);
    res.json(ledger.status(req.params.id));
  });

  app.post(
    "/commands/dispatch",
    asyncHandler(async (req, res) => {
      const caller = callerOf(req);
      const operator = authorize("commands.dispatch", caller.operator);
      const body = await parseDispatch(registry, req.body);
      const execution = await dispatcher.dispatch({
        targetMinionId: body.targetId,
        payload: body.payload,
        timeoutSeconds: body.timeout,
        requestedBy: operator.subject,
        clientKey: throttle.keyFor("dispatch", caller),
      });
      res.status(202).json({ executionId: execution.id, state: execution.state });
    }),
  );

  app.get("/commands", (req, res) => {
    authorize("commands.read", callerOf(req).operator);
    const executions = dispatcher.list({
      targetMinionId: queryParam(req.query.target, "target"),
      state: parseExecutionState(queryParam(req.query.state, "state")),
    });
    res.json({ executions });
  });

  app.get("/commands/:executionId", (req, res) => {
    authorize("commands.read", callerOf(req).operator);
    res.json(dispatcher.get(req.params.executionId));
  });

  app.post(
    "/backup/trigger",
    asyncHandler(async (req, res) => {
      authorize("backup.trigger", callerOf(req).operator);
      if (!backup) throw new NotFoundError("Backups are not enabled");
      res.json(await backup.trigger());
    }),
  );

  app.get("/backup/last", (req, res) => {
    authorize("backup.read", callerOf(req).operator);
    if (!backup) throw new NotFoundError("Backups are not enabled");
    res.json({ run: backup.lastRun() });
  });

  app.use((_req: express.Request, res: express.Response) => {
    res.status(404).json({ ok: false, error: { code: "NOT_FOUND", message: "No such route" } });
  });

  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (isFleetError(err)) {
      if (err instanceof ThrottledError) res.set("Retry-After", String(err.retryAfterSeconds));
      if (err.status >= 500) logger.error("request failed", { method: req.method, path: req.path, code: err.code, error: err.message });
      res.status(err.status).json(errorBody(err));
      return;
    }
    // body parser errors (malformed JSON, oversized body) carry their 4xx status
    if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number" && err.status >= 400 && err.status < 500) {
      const message = err instanceof SyntaxError ? "Malformed JSON body" : err instanceof Error ? err.message : "Bad request";
      res.status(err.status).json({ ok: false, error: { code: "VALIDATION", message } });
      return;
    }
    logger.error("unhandled error", { method: req.method, path: req.path, error: err instanceof Error ? err.message : String(err) });
    res.status(500).json({ ok: false, error: { code: "INTERNAL", message: "Internal error" } });
  });

  return app;
}

import { randomUUID } from "node:crypto";
import { NotFoundError, ThrottledError, UnknownTargetError, errorMessage } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { redactSensitiveInfo } from "../core/security.js";
import type { EntityStore } from "../store/entity-store.js";
import type { AdmissionThrottle } from "../throttle/admission-throttle.js";
import type { CommandBackend, CommandResultEvent } from "../types/backends.js";
import type { CommandExecution, CommandPayload, ExecutionState } from "../types/command.js";
import { boundOutput } from "./output.js";
import { resolveTimeout, validatePayload } from "./policy.js";
import { isTerminal, nextState, resultEvent, statesAccepting, type ExecutionEvent } from "./state-machine.js";

export type DispatcherSettings = {
  defaultTimeoutSeconds: number;
  maxTimeoutSeconds: number;
  outputMaxBytes: number;
  successExitCode: number;
  allowedFunctions: readonly string[];
};

export type TargetRegistry = {
  isAccepted(id: string): boolean;
};

export type CommandDispatcherOpts = {
  store: EntityStore<CommandExecution>;
  backend: CommandBackend;
  targets: TargetRegistry;
  settings: DispatcherSettings;
  throttle?: AdmissionThrottle;
  logger?: Logger;
  now?: () => Date;
  newId?: () => string;
};

export type DispatchRequest = {
  targetMinionId: string;
  payload: CommandPayload;
  timeoutSeconds?: number;
  requestedBy?: string | null;
  /** Throttle key for the `dispatch` class; no check when absent. */
  clientKey?: string;
};

export type TransitionOutcome =
  | { applied: true; record: CommandExecution }
  | { applied: false; record: CommandExecution | undefined };

export type ExecutionFilter = {
  targetMinionId?: string;
  state?: ExecutionState;
};

/** Results for handles that were never bound are kept up to this many. */
const MAX_UNBOUND_RESULTS = 1000;

/**
 * Command dispatcher.
 *
 * Every transition is one compare-and-set on the execution's current state, so the
 * backend's result callback and the watchdog may race freely: the first commit wins and
 * the loser sees a terminal record and drops its effect.
 */
export class CommandDispatcher {
  private readonly store: EntityStore<CommandExecution>;
  private readonly backend: CommandBackend;
  private readonly targets: TargetRegistry;
  private readonly settings: DispatcherSettings;
  private readonly throttle?: AdmissionThrottle;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly newId: () => string;

  /** backend handle → execution id */
  private readonly handles = new Map<string, string>();
  private readonly unbound = new Map<string, CommandResultEvent>();
  private readonly inflight = new Set<Promise<void>>();
  private readonly unsubscribe: () => void;
  private watchdog: NodeJS.Timeout | null = null;

  constructor(opts: CommandDispatcherOpts) {
    this.store = opts.store;
    this.backend = opts.backend;
    this.targets = opts.targets;
    this.settings = opts.settings;
    this.throttle = opts.throttle;
    this.logger = opts.logger ?? silentLogger;
    this.now = opts.now ?? (() => new Date());
    this.newId = opts.newId ?? randomUUID;

    // replayed executions still waiting on the backend keep receiving results
    for (const e of this.store.values()) {
      if (e.submissionHandle && !isTerminal(e.state)) {
        this.handles.set(e.submissionHandle, e.id);
        this.backend.resume?.(e.submissionHandle, e.targetMinionId);
      }
    }

    this.unsubscribe = this.backend.subscribe({
      onAck: (handle) => {
        const id = this.handles.get(handle);
        if (id) this.onBackendAck(id);
      },
      onResult: (event) => this.routeResult(event),
    });
  }

  async dispatch(req: DispatchRequest): Promise<CommandExecution> {
    if (this.throttle && req.clientKey !== undefined) {
      const decision = this.throttle.allow("dispatch", req.clientKey, this.now().getTime());
      if (!decision.allowed) {
        throw new ThrottledError("Too many dispatch requests", decision.retryAfterMs, { class: "dispatch" });
      }
    }

    if (!this.targets.isAccepted(req.targetMinionId)) {
      throw new UnknownTargetError(`Minion ${req.targetMinionId} is not an accepted target`, { target: req.targetMinionId });
    }

    const payload = validatePayload(req.payload, this.settings.allowedFunctions);
    const timeoutSeconds = resolveTimeout(req.timeoutSeconds, this.settings.defaultTimeoutSeconds, this.settings.maxTimeoutSeconds);

    const inserted = this.store.insert({
      id: this.newId(),
      targetMinionId: req.targetMinionId,
      payload,
      state: "queued",
      timeoutSeconds,
      requestedBy: req.requestedBy ?? null,
      startedAt: this.now().toISOString(),
      finishedAt: null,
      exitCode: null,
      output: null,
      outputTruncated: false,
      submissionHandle: null,
    });
    if (!inserted.ok) {
      throw new Error(`Execution id collision: ${inserted.current.id}`);
    }
    await inserted.persisted;

    this.logger.info("command queued", { execution: inserted.record.id, target: req.targetMinionId, fun: payload.fun });
    this.track(this.submit(inserted.record));
    return inserted.record;
  }

  /** Queued → Running. A repeated ack is a logged no-op. */
  onBackendAck(executionId: string): TransitionOutcome {
    const res = this.transition(executionId, "ack", (cur) => ({ ...cur, state: "running" }));
    if (!res.applied && res.record) {
      this.logger.info("ack ignored", { execution: executionId, state: res.record.state });
    }
    return res;
  }

  /** Running (or still Queued) → Completed | Failed by exit code. Terminal records are left as they are. */
  onBackendResult(executionId: string, exitCode: number, output: string): TransitionOutcome {
    const event = resultEvent(exitCode, this.settings.successExitCode);
    const bounded = boundOutput(output, this.settings.outputMaxBytes);
    const res = this.transition(executionId, event, (cur, state) => ({
      ...cur,
      state,
      finishedAt: this.now().toISOString(),
      exitCode,
      output: bounded.output,
      outputTruncated: bounded.truncated,
    }));

    if (res.applied) {
      this.logger.info("command finished", { execution: executionId, state: res.record.state, exitCode });
    } else if (res.record) {
      this.logger.warn("late result dropped", { execution: executionId, state: res.record.state, exitCode });
    } else {
      this.logger.warn("result for unknown execution", { execution: executionId });
    }
    return res;
  }

  /** Time out every non-terminal execution whose deadline lies before `now`. Returns the ids it moved. */
  watchdogSweep(now: Date = this.now()): string[] {
    const timedOut: string[] = [];
    for (const e of this.store.values()) {
      if (isTerminal(e.state) || !pastDeadline(e, now)) continue;

      const res = this.transition(
        e.id,
        "timeout",
        (cur, state) => ({ ...cur, state, finishedAt: now.toISOString(), output: `Timed out after ${cur.timeoutSeconds}s` }),
        (cur) => pastDeadline(cur, now),
      );
      if (res.applied) {
        timedOut.push(e.id);
        this.logger.warn("command timed out", { execution: e.id, target: e.targetMinionId, timeout: e.timeoutSeconds });
      }
    }
    return timedOut;
  }

  get(executionId: string): CommandExecution {
    const record = this.store.get(executionId);
    if (!record) throw new NotFoundError(`Unknown execution: ${executionId}`, { id: executionId });
    return record;
  }

  /** Executions newest first. */
  list(filter: ExecutionFilter = {}): CommandExecution[] {
    return this.store
      .values()
      .filter((e) => filter.targetMinionId === undefined || e.targetMinionId === filter.targetMinionId)
      .filter((e) => filter.state === undefined || e.state === filter.state)
      .sort((a, b) => b.startedAt.localeCompare(a.startedAt) || a.id.localeCompare(b.id));
  }

  /** Backend handles still routed to a live execution. */
  boundHandles(): number {
    return this.handles.size;
  }

  startWatchdog(intervalMs: number): void {
    if (this.watchdog) return;
    this.watchdog = setInterval(() => this.watchdogSweep(), intervalMs);
    this.watchdog.unref();
  }

  stopWatchdog(): void {
    if (this.watchdog) clearInterval(this.watchdog);
    this.watchdog = null;
  }

  /** Wait for in-flight submissions and journal writes. */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
    await this.store.flush();
  }

  async close(): Promise<void> {
    this.stopWatchdog();
    this.unsubscribe();
    await this.drain();
  }

  private async submit(record: CommandExecution): Promise<void> {
    let handle: string;
    try {
      handle = await this.backend.submit(record.targetMinionId, record.payload);
    } catch (e) {
      const reason = redactSensitiveInfo(errorMessage(e));
      this.logger.warn("submission failed", { execution: record.id, error: reason });
      this.transition(record.id, "failure", (cur, state) => ({
        ...cur,
        state,
        finishedAt: this.now().toISOString(),
        output: boundOutput(`Submission failed: ${reason}`, this.settings.outputMaxBytes).output,
      }));
      return;
    }

    const bound = this.store.compareAndSet(
      record.id,
      (cur) => cur.submissionHandle === null && !isTerminal(cur.state),
      (cur) => ({ ...cur, submissionHandle: handle }),
    );
    if (!bound.ok) {
      // timed out while the backend was still answering
      this.unbound.delete(handle);
      this.logger.info("submission resolved after execution finished", { execution: record.id, state: bound.current?.state ?? null });
      return;
    }
    this.track(bound.persisted);
    this.handles.set(handle, record.id);

    // the backend accepted the job
    this.onBackendAck(record.id);

    const early = this.unbound.get(handle);
    if (early) {
      this.unbound.delete(handle);
      this.onBackendResult(record.id, early.exitCode, early.output);
    }
  }

  private routeResult(event: CommandResultEvent): void {
    const id = this.handles.get(event.handle);
    if (id) {
      this.onBackendResult(id, event.exitCode, event.output);
      return;
    }

    // submission has not resolved yet
    if (this.unbound.size >= MAX_UNBOUND_RESULTS) {
      const oldest = this.unbound.keys().next();
      if (!oldest.done) this.unbound.delete(oldest.value);
    }
    this.unbound.set(event.handle, event);
  }

  private transition(
    id: string,
    event: ExecutionEvent,
    apply: (cur: CommandExecution, state: ExecutionState) => CommandExecution,
    guard: (cur: CommandExecution) => boolean = () => true,
  ): TransitionOutcome {
    const res = this.store.compareAndSet(
      id,
      (cur) => statesAccepting(event).includes(cur.state) && guard(cur),
      (cur) => {
        const state = nextState(cur.state, event);
        if (state === null) throw new Error(`No transition from ${cur.state} on ${event}`);
        return apply(cur, state);
      },
    );
    if (!res.ok) return { applied: false, record: res.current };
    this.track(res.persisted);
    // a terminal execution takes no more backend events
    if (isTerminal(res.record.state) && res.record.submissionHandle) {
      this.handles.delete(res.record.submissionHandle);
    }
    return { applied: true, record: res.record };
  }

  private track(task: Promise<void>): void {
    const tracked = task
      .catch((e: unknown) => {
        this.logger.error("dispatcher background task failed", { error: errorMessage(e) });
      })
      .finally(() => {
        this.inflight.delete(tracked);
      });
    this.inflight.add(tracked);
  }
}

function pastDeadline(e: CommandExecution, now: Date): boolean {
  return Date.parse(e.startedAt) + e.timeoutSeconds * 1000 < now.getTime();
}

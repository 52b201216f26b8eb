import { TERMINAL_EXECUTION_STATES, type ExecutionState } from "../types/command.js";

/**
 * Events that drive execution transitions.
 */
export type ExecutionEvent = "ack" | "success" | "failure" | "timeout";

/**
 * Allowed transitions. A result arriving while still queued counts as an implicit ack.
 */
const EXECUTION_STATES: readonly ExecutionState[] = ["queued", "running", "completed", "failed", "timed_out"];

const TRANSITIONS: Record<ExecutionState, Partial<Record<ExecutionEvent, ExecutionState>>> = {
  queued: { ack: "running", success: "completed", failure: "failed", timeout: "timed_out" },
  running: { success: "completed", failure: "failed", timeout: "timed_out" },
  completed: {},
  failed: {},
  timed_out: {},
};

export function isTerminal(state: ExecutionState): boolean {
  return TERMINAL_EXECUTION_STATES.has(state);
}

/**
 * Pure function: given current state + event, return next state, or null when the
 * event does not apply (duplicate ack, late result after timeout, ...).
 */
export function nextState(current: ExecutionState, event: ExecutionEvent): ExecutionState | null {
  return TRANSITIONS[current][event] ?? null;
}

/** States from which `event` may fire; used as the compare side of compare-and-set. */
export function statesAccepting(event: ExecutionEvent): ExecutionState[] {
  return EXECUTION_STATES.filter((s) => TRANSITIONS[s][event] !== undefined);
}

export function resultEvent(exitCode: number, successExitCode: number): ExecutionEvent {
  return exitCode === successExitCode ? "success" : "failure";
}

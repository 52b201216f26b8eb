/** Command execution: one dispatched command instance and its lifecycle. */
export type ExecutionState = "queued" | "running" | "completed" | "failed" | "timed_out";

export const TERMINAL_EXECUTION_STATES: ReadonlySet<ExecutionState> = new Set(["completed", "failed", "timed_out"]);

export type CommandPayload = {
  /** Remote function name, e.g. "test.ping" or "cmd.run". */
  fun: string;
  args: string[];
};

export type CommandExecution = {
  id: string;
  targetMinionId: string;
  payload: CommandPayload;
  state: ExecutionState;
  timeoutSeconds: number;
  requestedBy: string | null;
  startedAt: string;
  /** Set iff `state` is terminal. */
  finishedAt: string | null;
  exitCode: number | null;
  output: string | null;
  outputTruncated: boolean;
  submissionHandle: string | null;
};

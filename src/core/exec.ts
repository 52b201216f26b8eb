import { execFile } from "node:child_process";
import { TimeoutError } from "./errors.js";
import { sanitizeEnv } from "./security.js";

export type ExecResult = { exitCode: number; stdout: string; stderr: string };

export type ExecOptions = {
  timeoutMs: number;
  /** Extra variables on top of the sanitized environment. */
  env?: Record<string, string>;
};

/**
 * Runs a program and reports how it exited. Rejects only when it could not be run at
 * all (missing binary) or was killed at its deadline (TimeoutError); a non-zero exit resolves.
 */
export type ExecFn = (file: string, args: string[], opts: ExecOptions) => Promise<ExecResult>;

const MAX_BUFFER = 10 * 1024 * 1024;

/** execFile without a shell, sanitized environment. */
export const defaultExec: ExecFn = (file, args, opts) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      {
        shell: false,
        env: { ...sanitizeEnv(process.env), ...opts.env },
        timeout: opts.timeoutMs,
        maxBuffer: MAX_BUFFER,
        encoding: "utf8",
      },
      (error, stdout, stderr) => {
        if (error?.killed) {
          reject(new TimeoutError(`${file} did not finish within ${opts.timeoutMs}ms`, { file }));
          return;
        }
        if (error && typeof error.code !== "number") {
          reject(error);
          return;
        }
        resolve({ exitCode: error && typeof error.code === "number" ? error.code : 0, stdout, stderr });
      },
    );
  });

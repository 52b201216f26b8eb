import { redactSensitiveInfo, sanitizeLogMessage } from "./security.js";

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export type Logger = {
  info: (msg: string, fields?: LogFields) => void;
  warn: (msg: string, fields?: LogFields) => void;
  error: (msg: string, fields?: LogFields) => void;
};

function render(tag: string, msg: string, fields?: LogFields): string {
  let line = `[${tag}] ${msg}`;
  if (fields) {
    for (const [k, v] of Object.entries(fields)) {
      if (v === undefined) continue;
      line += ` ${k}=${String(v)}`;
    }
  }
  return sanitizeLogMessage(redactSensitiveInfo(line));
}

/** Console logger; every line is redacted and stripped of newlines. */
export function createLogger(tag: string): Logger {
  return {
    info: (msg, fields) => console.log(render(tag, msg, fields)),
    warn: (msg, fields) => console.warn(render(tag, msg, fields)),
    error: (msg, fields) => console.error(render(tag, msg, fields)),
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

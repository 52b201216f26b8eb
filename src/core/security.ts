export const MAX_LOG_MESSAGE_LENGTH = 10000;
export const REDACTED = "***";

/** One line per log entry: control characters escaped, length capped. */
export function sanitizeLogMessage(s: string): string {
  if (!s) return "";
  const flat = s.replace(/\r\n|[\r\n]/g, "\\n").replace(/\t/g, "\\t");
  return flat.length > MAX_LOG_MESSAGE_LENGTH ? `${flat.slice(0, MAX_LOG_MESSAGE_LENGTH)}…` : flat;
}

/**
 * Redact well-known secret shapes (key=value pairs, private key blocks, home directories).
 */
export function redactSensitiveInfo(s: string): string {
  if (!s) return "";

  let result = s;

  result = result.replace(/-----BEGIN [A-Z0-9 ]*PRIVATE KEY-----[\s\S]*?(-----END [A-Z0-9 ]*PRIVATE KEY-----|$)/g, "[private key ***]");
  result = result.replace(/passphrase[=:]\s*\S+/gi, "passphrase=***");
  result = result.replace(/password[=:]\s*\S+/gi, "password=***");
  result = result.replace(/token[=:]\s*\S+/gi, "token=***");
  result = result.replace(/api[_-]?key[=:]\s*\S+/gi, "api_key=***");
  result = result.replace(/secret[=:]\s*\S+/gi, "secret=***");
  result = result.replace(/\/home\/[^/\s]+/g, "/home/***");
  result = result.replace(/\/Users\/[^/\s]+/g, "/Users/***");

  return result;
}

/**
 * Remove every occurrence of the given secret values, then apply the generic patterns.
 * Multi-line secrets are also redacted line by line so a partially echoed key is caught.
 */
export function redactSecrets(s: string, secrets: ReadonlyArray<string | null | undefined>): string {
  if (!s) return "";

  const needles = new Set<string>();
  for (const secret of secrets) {
    if (!secret) continue;
    needles.add(secret);
    const trimmed = secret.trim();
    if (trimmed) needles.add(trimmed);
    for (const line of secret.split(/\r?\n/)) {
      const l = line.trim();
      // short lines (e.g. "-----") would redact unrelated text
      if (l.length >= 8) needles.add(l);
    }
  }

  let result = s;
  for (const needle of [...needles].sort((a, b) => b.length - a.length)) {
    result = result.split(needle).join(REDACTED);
  }

  return redactSensitiveInfo(result);
}

/** Variables salt and borg children inherit; everything else, secrets included, is dropped. */
const INHERITED_ENV = ["PATH", "HOME", "USER", "LANG", "LC_ALL", "TZ", "TMPDIR"] as const;

export function sanitizeEnv(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const safe: NodeJS.ProcessEnv = {};
  for (const name of INHERITED_ENV) {
    const value = env[name];
    if (value !== undefined) safe[name] = value;
  }
  return safe;
}

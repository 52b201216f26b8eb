import { chmod, mkdtemp, readFile, readdir, rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { SecretHandlingError, errorMessage } from "../core/errors.js";
import type { BackupCredentials, TransportCredentials } from "../types/backup.js";

/** Directories holding a materialized transport key start with this. */
export const KEY_DIR_PREFIX = "fleet-transport-key-";
const KEY_FILE = "id_transport";
const ZERO_FILL_MIN = 4096;

/** Supplies repository credentials, fresh for every backup invocation. */
export type CredentialSource = {
  load(): Promise<BackupCredentials>;
};

/** Reads the passphrase (and optional transport key) from files named in configuration. */
export class FileCredentialSource implements CredentialSource {
  constructor(
    private readonly passphraseFile: string,
    private readonly sshKeyFile: string | null = null,
  ) {}

  async load(): Promise<BackupCredentials> {
    const passphrase = (await readSecret(this.passphraseFile, "passphrase")).replace(/\r?\n$/, "");
    if (!passphrase) {
      throw new SecretHandlingError("Backup passphrase file is empty", { file: this.passphraseFile });
    }
    const sshKey = this.sshKeyFile ? await readSecret(this.sshKeyFile, "transport key") : null;
    return { passphrase, sshKey };
  }
}

async function readSecret(file: string, what: string): Promise<string> {
  try {
    return await readFile(file, "utf8");
  } catch (e) {
    const code = e instanceof Error && "code" in e ? String(e.code) : "unknown";
    throw new SecretHandlingError(`Cannot read backup ${what} file (${code})`, { file }, e);
  }
}

/** CRLF → LF, trailing newline, and a recognizable private key or `ssh-` prefix. */
export function normalizeTransportKey(raw: string): string {
  const key = raw.replace(/\r\n/g, "\n");
  if (!/^-----BEGIN [A-Z0-9 ]+ PRIVATE KEY-----/.test(key) && !key.startsWith("ssh-")) {
    throw new SecretHandlingError("Invalid SSH key format");
  }
  return key.endsWith("\n") ? key : `${key}\n`;
}

/**
 * Run `fn` with the transport key written to a fresh 0700 directory under `keyDir`
 * (file mode 0600). The key is zero-filled and removed on every exit path; a failure to
 * remove it is itself a SecretHandlingError.
 */
export async function withTransportKey<R>(
  credentials: BackupCredentials,
  keyDir: string,
  fn: (transport: TransportCredentials) => Promise<R>,
): Promise<R> {
  if (credentials.sshKey === null) {
    return fn({ passphrase: credentials.passphrase, sshKeyPath: null });
  }

  const { dir, keyPath } = await materializeKey(normalizeTransportKey(credentials.sshKey), keyDir);
  try {
    return await fn({ passphrase: credentials.passphrase, sshKeyPath: keyPath });
  } finally {
    await destroyKeyMaterial(dir);
  }
}

async function materializeKey(content: string, keyDir: string): Promise<{ dir: string; keyPath: string }> {
  let dir: string | null = null;
  try {
    dir = await mkdtemp(join(keyDir, KEY_DIR_PREFIX));
    await chmod(dir, 0o700);
    const keyPath = join(dir, KEY_FILE);
    await writeFile(keyPath, content, { mode: 0o600, flag: "wx" });
    return { dir, keyPath };
  } catch (e) {
    if (dir !== null) await destroyKeyMaterial(dir);
    throw new SecretHandlingError(`Failed to materialize transport key: ${errorMessage(e)}`, { keyDir }, e);
  }
}

/** Remove key directories left behind by a crashed process. Returns how many were removed. */
export async function sweepKeyMaterial(keyDir: string): Promise<number> {
  let entries: string[];
  try {
    entries = await readdir(keyDir);
  } catch (e) {
    if (isMissing(e)) return 0;
    throw new SecretHandlingError(`Cannot scan key directory: ${errorMessage(e)}`, { keyDir }, e);
  }

  let removed = 0;
  for (const name of entries) {
    if (!name.startsWith(KEY_DIR_PREFIX)) continue;
    await destroyKeyMaterial(join(keyDir, name));
    removed++;
  }
  return removed;
}

/** Zero-fill and remove a key directory. Files or a directory already gone count as removed. */
async function destroyKeyMaterial(dir: string): Promise<void> {
  try {
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (e) {
      if (isMissing(e)) return;
      throw e;
    }
    for (const name of names) {
      const file = join(dir, name);
      try {
        const { size } = await stat(file);
        // r+ never recreates a file removed under us
        await writeFile(file, Buffer.alloc(Math.max(size, ZERO_FILL_MIN)), { flag: "r+" });
      } catch (e) {
        if (!isMissing(e)) throw e;
      }
    }
    await rm(dir, { recursive: true, force: true });
  } catch (e) {
    throw new SecretHandlingError(`Failed to remove transport key material: ${errorMessage(e)}`, { dir }, e);
  }
}

function isMissing(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

import fs from "node:fs";
import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../core/errors.js";

export type JournalEntry<T> = {
  at: string;
  op: "insert" | "transition";
  record: T;
};

/**
 * Append-only JSONL log of committed record snapshots.
 *
 * Appends are chained so lines land in commit order even when callers do not await
 * each other; a failed append rejects its own promise and does not block later ones.
 */
export class Journal<T> {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(readonly filePath: string) {}

  append(entry: JournalEntry<T>): Promise<void> {
    const line = JSON.stringify(entry) + "\n";
    const write = this.tail.then(async () => {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, line, "utf8");
    });
    this.tail = write.then(
      () => undefined,
      () => undefined,
    );
    return write;
  }

  /** Wait for every append issued so far. */
  async flush(): Promise<void> {
    await this.tail;
  }

  /**
   * Read all entries in order. Blank lines are skipped; a torn final line from a crash
   * mid-append is dropped, any other unparsable line is an error.
   */
  readAll(): JournalEntry<T>[] {
    if (!fs.existsSync(this.filePath)) return [];

    const lines = fs.readFileSync(this.filePath, "utf8").split("\n");
    const entries: JournalEntry<T>[] = [];
    for (let i = 0; i < lines.length; i++) {
      const raw = lines[i].trim();
      if (raw.length === 0) continue;
      try {
        entries.push(JSON.parse(raw) as JournalEntry<T>);
      } catch (e) {
        const isLast = lines.slice(i + 1).every((l) => l.trim().length === 0);
        if (isLast) break;
        throw new Error(`Corrupt journal line ${i + 1} in ${this.filePath}: ${errorMessage(e)}`);
      }
    }
    return entries;
  }
}

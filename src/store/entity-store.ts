import type { Journal } from "./journal.js";

export type Identified = { id: string };

export type CasResult<T> =
  | { ok: true; record: T; previous: T; persisted: Promise<void> }
  | { ok: false; current: T | undefined };

export type InsertResult<T> =
  | { ok: true; record: T; persisted: Promise<void> }
  | { ok: false; current: T };

/**
 * In-memory arena of records keyed by id.
 *
 * All mutations are synchronous compare-and-set steps, so a reader never sees a
 * half-applied transition and no lock is held while the caller awaits anything.
 * Committed snapshots are appended to the journal; `persisted` settles when the
 * line is on disk.
 */
export class EntityStore<T extends Identified> {
  private readonly records = new Map<string, T>();

  constructor(
    private readonly journal?: Journal<T>,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Rebuild from the journal; the last snapshot per id wins. */
  replay(): number {
    if (!this.journal) return 0;
    const entries = this.journal.readAll();
    for (const entry of entries) {
      this.records.set(entry.record.id, entry.record);
    }
    return entries.length;
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  get(id: string): T | undefined {
    const r = this.records.get(id);
    return r ? structuredClone(r) : undefined;
  }

  values(): T[] {
    return [...this.records.values()].map((r) => structuredClone(r));
  }

  insert(record: T): InsertResult<T> {
    const existing = this.records.get(record.id);
    if (existing) return { ok: false, current: structuredClone(existing) };

    const stored = structuredClone(record);
    this.records.set(stored.id, stored);
    return { ok: true, record: structuredClone(stored), persisted: this.persist("insert", stored) };
  }

  /**
   * Apply `next` only if `expect` holds for the current record.
   * `next` must be pure; it runs inside the commit step.
   */
  compareAndSet(id: string, expect: (current: T) => boolean, next: (current: T) => T): CasResult<T> {
    const current = this.records.get(id);
    if (!current || !expect(current)) {
      return { ok: false, current: current ? structuredClone(current) : undefined };
    }

    const previous = structuredClone(current);
    const updated = structuredClone(next(structuredClone(current)));
    if (updated.id !== id) {
      throw new Error(`Transition must not change record id (${id} -> ${updated.id})`);
    }
    this.records.set(id, updated);
    return { ok: true, record: structuredClone(updated), previous, persisted: this.persist("transition", updated) };
  }

  async flush(): Promise<void> {
    await this.journal?.flush();
  }

  private persist(op: "insert" | "transition", record: T): Promise<void> {
    if (!this.journal) return Promise.resolve();
    return this.journal.append({ at: this.now().toISOString(), op, record: structuredClone(record) });
  }
}

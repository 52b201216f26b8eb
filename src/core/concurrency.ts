export type Release = () => void;

export type ClaimCheck = {
  allowed: boolean;
  holder?: string;
  reason?: string;
};

/**
 * Non-blocking per-key claims.
 *
 * A claim marks one entity as "being decided" or "being run". Contenders do not wait:
 * `tryAcquire` returns null immediately, so nothing ever queues behind an external call.
 */
export class KeyedClaims {
  private readonly held = new Map<string, { holder: string; since: number }>();

  tryAcquire(key: string, holder = "anonymous"): Release | null {
    if (this.held.has(key)) return null;

    const token = { holder, since: Date.now() };
    this.held.set(key, token);

    let released = false;
    return () => {
      if (released) return;
      released = true;
      // only drop the claim we set
      if (this.held.get(key) === token) this.held.delete(key);
    };
  }

  check(key: string): ClaimCheck {
    const current = this.held.get(key);
    if (!current) return { allowed: true };
    return {
      allowed: false,
      holder: current.holder,
      reason: `${key} is claimed by ${current.holder} since ${new Date(current.since).toISOString()}`,
    };
  }

  isHeld(key: string): boolean {
    return this.held.has(key);
  }

  size(): number {
    return this.held.size;
  }

  /** Run `fn` under the claim; skips it with `ran: false` when the key is taken. */
  async runExclusive<R>(key: string, holder: string, fn: () => Promise<R>): Promise<{ ran: true; value: R } | { ran: false; reason: string }> {
    const release = this.tryAcquire(key, holder);
    if (!release) {
      return { ran: false, reason: this.check(key).reason ?? `${key} is busy` };
    }
    try {
      return { ran: true, value: await fn() };
    } finally {
      release();
    }
  }
}

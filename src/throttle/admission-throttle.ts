import type { ThrottleConfig, ThrottleKeyKind } from "../types/config.js";
import type { Caller } from "../types/operator.js";

export type ThrottleRule = {
  limit: number;
  windowMs: number;
  key: ThrottleKeyKind;
};

export type ThrottleDecision =
  | { allowed: true; limit: number; remaining: number }
  | { allowed: false; limit: number; remaining: 0; retryAfterMs: number; retryAfterSeconds: number };

/**
 * Sliding-window admission throttle keyed by (endpoint class, client key).
 *
 * Each bucket keeps the timestamps of admitted calls inside the window, so a denial
 * can say exactly when the oldest of them leaves the window. Denied calls do not
 * consume budget. `allow` is synchronous: check, roll the window and record happen in
 * one step with nothing interleaving.
 */
export class AdmissionThrottle {
  private readonly buckets = new Map<string, number[]>();
  private readonly safelist: Set<string>;

  constructor(
    private readonly rules: Readonly<Record<string, ThrottleRule>>,
    opts: { safelist?: readonly string[] } = {},
  ) {
    this.safelist = new Set(opts.safelist ?? []);
  }

  static fromConfig(config: ThrottleConfig): AdmissionThrottle {
    const rules: Record<string, ThrottleRule> = {};
    for (const [name, c] of Object.entries(config.classes)) {
      rules[name] = { limit: c.limit, windowMs: Math.round(c.window_seconds * 1000), key: c.key };
    }
    return new AdmissionThrottle(rules, { safelist: config.safelist });
  }

  rule(endpointClass: string): ThrottleRule {
    const rule = this.rules[endpointClass];
    if (!rule) throw new Error(`Unknown throttle class: ${endpointClass}`);
    return rule;
  }

  /** Client key a caller is counted under for this class: IP or authenticated subject. */
  keyFor(endpointClass: string, caller: Caller): string {
    const rule = this.rule(endpointClass);
    if (rule.key === "subject" && caller.operator) return `subject:${caller.operator.subject}`;
    return caller.ip;
  }

  allow(endpointClass: string, clientKey: string, now: number = Date.now()): ThrottleDecision {
    const rule = this.rule(endpointClass);
    if (this.safelist.has(clientKey)) {
      return { allowed: true, limit: rule.limit, remaining: rule.limit };
    }

    const bucketKey = `${endpointClass}\u0000${clientKey}`;
    const hits = this.buckets.get(bucketKey) ?? [];
    rollWindow(hits, now - rule.windowMs);

    if (hits.length < rule.limit) {
      hits.push(now);
      this.buckets.set(bucketKey, hits);
      return { allowed: true, limit: rule.limit, remaining: rule.limit - hits.length };
    }

    // the call that frees a slot is the one `limit` places from the newest
    const retryAfterMs = Math.max(1, hits[hits.length - rule.limit] + rule.windowMs - now);
    this.buckets.set(bucketKey, hits);
    return {
      allowed: false,
      limit: rule.limit,
      remaining: 0,
      retryAfterMs,
      retryAfterSeconds: Math.ceil(retryAfterMs / 1000),
    };
  }

  reset(endpointClass: string, clientKey: string): void {
    this.buckets.delete(`${endpointClass}\u0000${clientKey}`);
  }

  /** Drop buckets whose hits have all left their window. Returns how many were removed. */
  prune(now: number = Date.now()): number {
    let removed = 0;
    for (const [key, hits] of this.buckets) {
      const endpointClass = key.slice(0, key.indexOf("\u0000"));
      const rule = this.rules[endpointClass];
      if (rule) rollWindow(hits, now - rule.windowMs);
      if (!rule || hits.length === 0) {
        this.buckets.delete(key);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.buckets.size;
  }
}

/** Remove timestamps at or before `cutoff` from the sorted front of `hits`. */
function rollWindow(hits: number[], cutoff: number): void {
  let drop = 0;
  while (drop < hits.length && hits[drop] <= cutoff) drop++;
  if (drop > 0) hits.splice(0, drop);
}

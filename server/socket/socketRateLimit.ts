/**
 * Per-key sliding-window rate limiter for WebSocket traffic.
 *
 * One instance per socket server. Event rules are keyed by event name and
 * tracked per socket id; connection attempts use the same limiter keyed by
 * client address. Cleanup is one call per key on disconnect.
 */

export interface RateLimitRule {
  maxPerWindow: number;
  windowMs: number;
}

export class SocketRateLimiter {
  private readonly buckets = new Map<string, Map<string, number[]>>();
  private readonly rules = new Map<string, RateLimitRule>();

  constructor(
    rules: Record<string, RateLimitRule> = {},
    private readonly now: () => number = Date.now
  ) {
    this.register(rules);
  }

  /** Later calls for the same event name overwrite the previous rule. */
  register(entries: Record<string, RateLimitRule>): void {
    for (const [event, rule] of Object.entries(entries)) {
      this.rules.set(event, rule);
    }
  }

  /**
   * Returns true if the event is allowed, false if rate-limited.
   */
  check(key: string, eventName: string): boolean {
    const rule = this.rules.get(eventName);
    if (!rule) return true;

    const now = this.now();
    let perEvent = this.buckets.get(key);
    if (!perEvent) {
      perEvent = new Map();
      this.buckets.set(key, perEvent);
    }

    const recent = (perEvent.get(eventName) ?? []).filter((t) => now - t < rule.windowMs);
    if (recent.length >= rule.maxPerWindow) {
      perEvent.set(eventName, recent);
      return false;
    }

    recent.push(now);
    perEvent.set(eventName, recent);
    return true;
  }

  cleanup(key: string): void {
    this.buckets.delete(key);
  }

  /** Drop keys whose every timestamp has aged out of its window. */
  prune(): void {
    const now = this.now();
    for (const [key, perEvent] of this.buckets) {
      const live = [...perEvent.entries()].some(([event, stamps]) => {
        const windowMs = this.rules.get(event)?.windowMs ?? 0;
        return stamps.some((t) => now - t < windowMs);
      });
      if (!live) this.buckets.delete(key);
    }
  }

  trackedKeys(): number {
    return this.buckets.size;
  }
}

/** Battle event limits, per socket. */
export const BATTLE_EVENT_LIMITS: Record<string, RateLimitRule> = {
  enqueueMatch: { maxPerWindow: 5, windowMs: 60_000 },
  cancelMatch: { maxPerWindow: 10, windowMs: 60_000 },
  createInvite: { maxPerWindow: 3, windowMs: 60_000 },
  acceptInvite: { maxPerWindow: 5, windowMs: 60_000 },
  submitAnswer: { maxPerWindow: 30, windowMs: 60_000 },
  leaveSession: { maxPerWindow: 5, windowMs: 60_000 },
};

/** Connection attempts, per client address. */
export const CONNECTION_LIMIT: Record<string, RateLimitRule> = {
  connection: { maxPerWindow: 10, windowMs: 60_000 },
};

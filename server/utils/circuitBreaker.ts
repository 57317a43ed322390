import logger from "../logger";

export type CircuitState = "closed" | "open" | "half-open";

export interface CircuitBreakerOptions {
  /** Consecutive failures that open the circuit */
  threshold?: number;
  /** How long (ms) the circuit stays open before a probe is allowed */
  resetTimeoutMs?: number;
  now?: () => number;
}

/**
 * Circuit breaker for optional dependencies whose failure should degrade a
 * read path instead of failing it (the leaderboard cache).
 *
 * - **closed** – calls flow through; a success clears the failure count.
 * - **open**   – calls are short-circuited to the fallback value.
 * - **half-open** – one probe call goes through; success closes the
 *   circuit, failure re-opens it.
 */
export class CircuitBreaker {
  private failures = 0;
  private openedAt = 0;
  private state: CircuitState = "closed";
  private readonly threshold: number;
  private readonly resetTimeoutMs: number;
  private readonly now: () => number;

  constructor(
    private readonly name: string,
    options: CircuitBreakerOptions = {}
  ) {
    this.threshold = options.threshold ?? 5;
    this.resetTimeoutMs = options.resetTimeoutMs ?? 30_000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Execute `fn`; on failure return `fallback` and track the failure.
   * While the circuit is open `fn` is not called at all.
   */
  async execute<T>(fn: () => Promise<T>, fallback: T): Promise<T> {
    if (this.state === "open") {
      if (this.now() - this.openedAt < this.resetTimeoutMs) {
        return fallback;
      }
      this.state = "half-open";
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure(error);
      return fallback;
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  private recordSuccess(): void {
    if (this.state === "half-open") {
      logger.info(`[CircuitBreaker] ${this.name} closed after successful probe`);
    }
    this.failures = 0;
    this.state = "closed";
  }

  private recordFailure(error: unknown): void {
    this.failures++;
    if (this.state === "half-open" || this.failures >= this.threshold) {
      this.state = "open";
      this.openedAt = this.now();
      logger.warn(`[CircuitBreaker] ${this.name} opened after ${this.failures} consecutive failures`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

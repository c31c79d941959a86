import { logger } from "../../observability/src/logger.js";

export type CircuitState = "closed" | "open" | "half-open";

export class CircuitOpenError extends Error {
  constructor(breakerName: string) {
    super(`Circuit breaker "${breakerName}" is open, request rejected`);
    this.name = "CircuitOpenError";
  }
}

export interface CircuitBreakerOptions {
  /** Identifier for logging and health output */
  name: string;
  /** Consecutive failures before opening the circuit (default: 5) */
  failureThreshold?: number;
  /** Time in ms the circuit stays open before probing (default: 30000) */
  resetTimeoutMs?: number;
  /** Clock, replaceable in tests */
  now?: () => number;
}

export interface CircuitSnapshot {
  name: string;
  state: CircuitState;
  consecutiveFailures: number;
}

/**
 * Circuit breaker for calls into the survey database.
 *
 * - closed: calls pass; consecutive failures are counted.
 * - open: calls fail fast with CircuitOpenError.
 * - half-open: the next call is a trial; success closes, failure reopens.
 */
export class CircuitBreaker {
  readonly name: string;
  private readonly failureThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly now: () => number;

  private state: CircuitState = "closed";
  private consecutiveFailures = 0;
  private openedAt = 0;

  constructor(opts: CircuitBreakerOptions) {
    this.name = opts.name;
    this.failureThreshold = opts.failureThreshold ?? 5;
    this.resetTimeoutMs = opts.resetTimeoutMs ?? 30_000;
    this.now = opts.now ?? Date.now;
  }

  getState(): CircuitState {
    if (this.state === "open" && this.now() - this.openedAt >= this.resetTimeoutMs) {
      this.moveTo("half-open");
    }
    return this.state;
  }

  snapshot(): CircuitSnapshot {
    return {
      name: this.name,
      state: this.getState(),
      consecutiveFailures: this.consecutiveFailures,
    };
  }

  reset(): void {
    this.consecutiveFailures = 0;
    this.moveTo("closed");
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.getState() === "open") {
      throw new CircuitOpenError(this.name);
    }

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.recordFailure();
      throw error;
    }
    this.consecutiveFailures = 0;
    if (this.state === "half-open") this.moveTo("closed");
    return result;
  }

  private recordFailure(): void {
    this.consecutiveFailures++;
    if (this.state === "half-open" || this.consecutiveFailures >= this.failureThreshold) {
      this.openedAt = this.now();
      this.moveTo("open");
    }
  }

  private moveTo(next: CircuitState): void {
    if (this.state === next) return;
    const previous = this.state;
    this.state = next;
    logger.warn(`Circuit breaker "${this.name}": ${previous} → ${next}`, {
      failures: this.consecutiveFailures,
      threshold: this.failureThreshold,
    });
  }
}

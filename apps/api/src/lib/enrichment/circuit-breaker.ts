import { createLogger } from "@chomp/logger";

const logger = createLogger({ name: "circuit-breaker" });

export enum CircuitState {
  CLOSED = "closed",
  OPEN = "open",
  HALF_OPEN = "half-open"
}

export interface CircuitBreakerOptions {
  /** Consecutive failures that open the circuit. */
  failureThreshold: number;
  /** Consecutive half-open successes that close it again. */
  successThreshold: number;
  /** Time spent open before a trial call is let through. */
  resetTimeoutMs: number;
  now: () => number;
  onStateChange?: (state: CircuitState) => void;
}

const DEFAULT_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  successThreshold: 1,
  resetTimeoutMs: 60_000,
  now: () => Date.now()
};

export class CircuitBreakerOpenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CircuitBreakerOpenError";
  }
}

/**
 * Stops calling the text-generation service after repeated failures so a
 * provider outage costs one timeout per reset window instead of one per
 * request.
 */
export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private openedAt: number | null = null;
  private readonly options: CircuitBreakerOptions;

  constructor(options: Partial<CircuitBreakerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  getState(): CircuitState {
    return this.state;
  }

  canExecute(): boolean {
    if (this.state === CircuitState.OPEN) {
      if (
        this.openedAt !== null &&
        this.options.now() - this.openedAt >= this.options.resetTimeoutMs
      ) {
        this.transitionTo(CircuitState.HALF_OPEN);
        return true;
      }
      return false;
    }

    return true;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.canExecute()) {
      throw new CircuitBreakerOpenError("Circuit breaker is open");
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure();
      throw error;
    }
  }

  private recordSuccess(): void {
    this.failureCount = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.options.successThreshold) {
        this.successCount = 0;
        this.transitionTo(CircuitState.CLOSED);
      }
    }
  }

  private recordFailure(): void {
    this.successCount = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.open();
      return;
    }

    this.failureCount++;
    if (this.failureCount >= this.options.failureThreshold) {
      this.open();
    }
  }

  private open() {
    this.openedAt = this.options.now();
    this.failureCount = 0;
    this.transitionTo(CircuitState.OPEN);
  }

  private transitionTo(newState: CircuitState): void {
    if (this.state !== newState) {
      const oldState = this.state;
      this.state = newState;
      logger.info(
        { from: oldState, to: newState },
        "Circuit breaker state transition"
      );
      this.options.onStateChange?.(newState);
    }
  }
}

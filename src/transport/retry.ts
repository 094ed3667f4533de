import type { ConnectionState } from "./connectionState.js";
import { isRetryableError } from "./errors.js";

/**
 * Decides whether a failed attempt is retried, after how long, and against
 * which endpoint.
 */
export interface RetryPolicy {
  shouldRetry(error: Error, state: ConnectionState): boolean;
  /** Delay in milliseconds before the next attempt */
  nextDelay(state: ConnectionState): number;
  /** Endpoint index for the next attempt (default: round-robin) */
  nextEndpoint?(state: ConnectionState): number;
}

/**
 * Shared behaviour of the stock policies: only transport-level failures are
 * retried, with a fixed delay unless a subclass says otherwise.
 */
abstract class StockRetryPolicy implements RetryPolicy {
  protected constructor(protected readonly delayMs: number) {
    if (delayMs < 0) {
      throw new RangeError("Retry delay must not be negative.");
    }
  }

  shouldRetry(error: Error, state: ConnectionState): boolean {
    return isRetryableError(error) && this.allowsRetry(state);
  }

  nextDelay(_state: ConnectionState): number {
    return this.delayMs;
  }

  protected abstract allowsRetry(state: ConnectionState): boolean;
}

export class NoRetry implements RetryPolicy {
  shouldRetry(_error: Error, _state: ConnectionState): boolean {
    return false;
  }

  nextDelay(): number {
    return 0;
  }
}

export class RetryNTimes extends StockRetryPolicy {
  constructor(delayMs: number, private readonly maxRetries: number) {
    super(delayMs);
  }

  protected allowsRetry(state: ConnectionState): boolean {
    return state.retryCount < this.maxRetries;
  }
}

export class RetryOnce extends RetryNTimes {
  constructor(delayMs: number) {
    super(delayMs, 1);
  }
}

/**
 * Keeps retrying until `timeoutMs` has passed since the request was first sent.
 */
export class RetryWithTimeout extends StockRetryPolicy {
  constructor(delayMs: number, private readonly timeoutMs: number) {
    super(delayMs);
  }

  protected allowsRetry(state: ConnectionState): boolean {
    return state.elapsedMs() + this.delayMs < this.timeoutMs;
  }
}

/**
 * Doubles the delay on every retry. A negative `maxRetries` retries forever,
 * a negative `maxDelayMs` leaves the delay uncapped.
 */
export class RetryWithExponentialBackoff extends StockRetryPolicy {
  constructor(
    startDelayMs: number,
    private readonly maxRetries = -1,
    private readonly maxDelayMs = -1,
  ) {
    super(startDelayMs);
  }

  protected allowsRetry(state: ConnectionState): boolean {
    return this.maxRetries < 0 || state.retryCount < this.maxRetries;
  }

  nextDelay(state: ConnectionState): number {
    const delay = this.delayMs * Math.pow(2, state.retryCount);
    return this.maxDelayMs >= 0 ? Math.min(delay, this.maxDelayMs) : delay;
  }
}

export function createDefaultRetryPolicy(): RetryPolicy {
  return new RetryWithExponentialBackoff(20, 3, 10_000);
}

import type { Logger } from "../logger.js";
import type { ConnectionState } from "./connectionState.js";
import { ConfigurationError, describeCause } from "./errors.js";
import type { RetryPolicy } from "./retry.js";

/**
 * Re-enters the connect loop with the request's existing connection state.
 */
export type RetryHandler = () => void;

export type FutureOutcome<T> =
  | { status: "succeeded"; value: T }
  | { status: "failed"; error: Error };

export type FutureStatus = "pending" | FutureOutcome<unknown>["status"];

export type CompletionListener<T> = (outcome: FutureOutcome<T>) => void;

/**
 * Completion object for a single connect attempt. Only the attempt most
 * recently attached to the future may complete it.
 */
export interface Attempt<T> {
  readonly id: number;
  /** False once a newer attempt was attached or the future completed */
  readonly current: boolean;
  succeed(value: T): boolean;
  /** Routes the error through the retry policy */
  fail(error: Error): boolean;
  /** Fails the future without consulting the retry policy */
  abort(error: Error): boolean;
}

export interface ResponseFutureOptions {
  retryPolicy: RetryPolicy;
  connectionState: ConnectionState;
  retryHandler: RetryHandler;
  logger: Logger;
}

/**
 * Single-assignment result handle for one logical request.
 *
 * The same instance is reused across every retry of the request. It can be
 * awaited directly or observed through `onComplete`.
 */
export class ResponseFuture<T> implements PromiseLike<T> {
  private outcome?: FutureOutcome<T>;
  private readonly listeners: Array<CompletionListener<T>> = [];
  private readonly retryPolicy: RetryPolicy;
  private readonly state: ConnectionState;
  private readonly retryHandler: RetryHandler;
  private readonly logger: Logger;
  private attemptId = 0;
  private retryTimer?: NodeJS.Timeout;

  constructor(options: ResponseFutureOptions) {
    this.retryPolicy = options.retryPolicy;
    this.state = options.connectionState;
    this.retryHandler = options.retryHandler;
    this.logger = options.logger;
  }

  get status(): FutureStatus {
    return this.outcome?.status ?? "pending";
  }

  get connectionState(): ConnectionState {
    return this.state;
  }

  /**
   * Bind the completion object for a new connect attempt.
   */
  attachAttempt(): Attempt<T> {
    const id = ++this.attemptId;
    const isCurrent = () => this.outcome === undefined && this.attemptId === id;

    return {
      id,
      get current() {
        return isCurrent();
      },
      succeed: (value) => isCurrent() && this.succeed(value),
      fail: (error) => {
        if (!isCurrent()) return false;
        this.handleRetry(error);
        return true;
      },
      abort: (error) => isCurrent() && this.fail(error),
    };
  }

  /**
   * Ask the retry policy what to do about a failed attempt. Either schedules
   * another connect with the same connection state or fails the future.
   */
  handleRetry(error: Error): void {
    if (this.outcome || this.retryTimer) {
      return;
    }

    let retry: boolean;
    try {
      retry = this.retryPolicy.shouldRetry(error, this.state);
    } catch (policyError) {
      this.fail(toError(policyError));
      return;
    }

    if (!retry) {
      this.logger.error(
        `Request failed after ${this.state.retryCount} retries: ${describeCause(error)}`,
      );
      this.fail(error);
      return;
    }

    const delayMs = Math.max(0, this.retryPolicy.nextDelay(this.state));
    this.state.retryCount += 1;
    const next = this.retryPolicy.nextEndpoint
      ? this.retryPolicy.nextEndpoint(this.state)
      : this.state.roundRobinIndex();
    if (!Number.isInteger(next)) {
      this.fail(new ConfigurationError(`Retry policy chose an invalid endpoint index: ${next}`));
      return;
    }
    const count = this.state.endpointCount;
    this.state.endpointIndex = ((next % count) + count) % count;

    this.logger.warn(
      `Retry ${this.state.retryCount} in ${delayMs}ms on endpoint ${this.state.endpointIndex}: ${describeCause(error)}`,
    );

    this.retryTimer = setTimeout(() => {
      this.retryTimer = undefined;
      if (this.outcome) return;
      try {
        this.retryHandler();
      } catch (retryError) {
        this.fail(toError(retryError));
      }
    }, delayMs);
  }

  succeed(value: T): boolean {
    return this.complete({ status: "succeeded", value });
  }

  fail(error: Error): boolean {
    return this.complete({ status: "failed", error });
  }

  /**
   * Register a listener; called immediately when the future already completed.
   */
  onComplete(listener: CompletionListener<T>): this {
    if (this.outcome) {
      listener(this.outcome);
    } else {
      this.listeners.push(listener);
    }
    return this;
  }

  toPromise(): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.onComplete((outcome) =>
        outcome.status === "succeeded" ? resolve(outcome.value) : reject(outcome.error),
      );
    });
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
  ): Promise<TResult1 | TResult2> {
    return this.toPromise().then(onfulfilled, onrejected);
  }

  catch<TResult = never>(
    onrejected?: ((reason: unknown) => TResult | PromiseLike<TResult>) | null,
  ): Promise<T | TResult> {
    return this.toPromise().catch(onrejected);
  }

  finally(onfinally?: (() => void) | null): Promise<T> {
    return this.toPromise().finally(onfinally);
  }

  private complete(outcome: FutureOutcome<T>): boolean {
    if (this.outcome) {
      return false;
    }

    this.outcome = outcome;
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = undefined;
    }

    const listeners = this.listeners.splice(0);
    for (const listener of listeners) {
      try {
        listener(outcome);
      } catch (error) {
        this.logger.error("Error in completion listener:", error);
      }
    }
    return true;
  }
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

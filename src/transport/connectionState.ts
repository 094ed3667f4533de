/**
 * Mutable record for one logical request's sequence of connect attempts.
 * Never shared between requests.
 */
export class ConnectionState {
  /** Index into the client's endpoint list for the current attempt */
  endpointIndex: number;
  /** Number of retries scheduled so far */
  retryCount = 0;
  readonly startIndex: number;
  readonly endpointCount: number;
  /** Set once per logical request, not reset on retry */
  readonly attemptStartTime: number;

  constructor(endpointCount: number, startIndex: number, now: number = Date.now()) {
    if (endpointCount < 1) {
      throw new RangeError("ConnectionState requires at least one endpoint.");
    }
    this.endpointCount = endpointCount;
    this.startIndex = startIndex % endpointCount;
    this.endpointIndex = this.startIndex;
    this.attemptStartTime = now;
  }

  /**
   * Endpoint for the current retry count, rotating from the starting endpoint.
   */
  roundRobinIndex(): number {
    return (this.startIndex + this.retryCount) % this.endpointCount;
  }

  elapsedMs(now: number = Date.now()): number {
    return now - this.attemptStartTime;
  }
}

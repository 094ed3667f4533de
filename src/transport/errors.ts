/**
 * Base class for every error raised by the transport.
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Connecting to an endpoint failed (refused, DNS, TLS handshake, connect timeout).
 */
export class ConnectionError extends TransportError {
  readonly endpoint: string;

  constructor(endpoint: string, cause?: unknown) {
    super(`Failed to connect to ${endpoint}: ${describeCause(cause)}`, { cause });
    this.endpoint = endpoint;
  }
}

/**
 * No response arrived within the request's read timeout.
 */
export class ReadTimeoutError extends TransportError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`No response received within ${timeoutMs}ms.`);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The logical request could not be encoded into a wire request.
 */
export class RequestBuildError extends TransportError {
  constructor(cause: unknown) {
    super(`Failed to build request: ${describeCause(cause)}`, { cause });
  }
}

/**
 * Malformed, oversized or truncated response.
 */
export class ProtocolError extends TransportError {}

export class ConfigurationError extends TransportError {}

export class UnsupportedRequestError extends ConfigurationError {
  readonly kind: string;

  constructor(kind: string) {
    super(`Unknown request type ${kind}`);
    this.kind = kind;
  }
}

export class TransportClosedError extends TransportError {
  constructor() {
    super("Transport client is closed.");
  }
}

/**
 * Errors the stock retry policies are allowed to retry.
 */
export function isRetryableError(error: unknown): boolean {
  return (
    error instanceof ConnectionError ||
    error instanceof ReadTimeoutError ||
    error instanceof ProtocolError
  );
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message || cause.name;
  }
  return cause === undefined ? "Unknown error" : String(cause);
}

import { setMaxListeners } from "node:events";
import { request as httpRequest, type ClientRequest } from "node:http";
import type { Socket } from "node:net";
import { defaultLogger, type Logger } from "../logger.js";
import { ConnectionState } from "./connectionState.js";
import { createNodeConnector, DEFAULT_CONNECT_TIMEOUT_MS, type Connector } from "./connector.js";
import {
  ConfigurationError,
  ConnectionError,
  describeCause,
  ProtocolError,
  ReadTimeoutError,
  RequestBuildError,
  TransportClosedError,
} from "./errors.js";
import { buildWireRequest } from "./requestBuilder.js";
import { dispatchResponse, resolveDecoder, type ResponseDecoder } from "./responseDispatch.js";
import { ResponseFuture, type Attempt } from "./responseFuture.js";
import { createDefaultRetryPolicy, type RetryPolicy } from "./retry.js";
import type {
  DecodedResponse,
  Endpoint,
  EndpointConfig,
  EndpointStatus,
  TransportClientOptions,
  TransportRequest,
  WireRequest,
} from "./types.js";

type InternalEndpoint = Endpoint & {
  consecutiveFailures: number;
  healthy: boolean;
  lastLatencyMs?: number;
  lastError?: string;
};

const DEFAULT_MAX_RESPONSE_BYTES = 1024 * 100;
const DEFAULT_FAILURE_THRESHOLD = 3;

/**
 * TransportClient sends logical requests to one of several endpoints over
 * HTTP/1.1, failing over and retrying according to a retry policy.
 *
 * Each attempt opens its own connection. The endpoint of the last successful
 * connection is where the next request starts.
 *
 * @example
 * ```ts
 * const client = new TransportClient([
 *   "http://10.0.0.1:2379",
 *   "http://10.0.0.2:2379",
 * ]);
 *
 * const version = await client.send(versionRequest());
 * client.close();
 * ```
 */
export class TransportClient {
  private readonly endpoints: InternalEndpoint[];
  private readonly connector: Connector;
  private readonly retryPolicy: RetryPolicy;
  private readonly connectTimeoutMs: number;
  private readonly defaultTimeoutMs: number;
  private readonly maxResponseBytes: number;
  private readonly failureThreshold: number;
  private readonly logger: Logger;
  private readonly lifecycle = new AbortController();
  private readonly pending = new Set<Pick<ResponseFuture<unknown>, "fail">>();
  private lastWorkingEndpointIndex = 0;

  constructor(
    endpoints: Array<string | EndpointConfig>,
    options: TransportClientOptions = {},
  ) {
    if (!endpoints.length) {
      throw new ConfigurationError("TransportClient requires at least one endpoint.");
    }

    this.endpoints = endpoints.map((endpoint, index) =>
      normalizeEndpoint(endpoint, index),
    );
    this.connector = options.connector ?? createNodeConnector(options.tls);
    this.retryPolicy = options.retryPolicy ?? createDefaultRetryPolicy();
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 0;
    this.maxResponseBytes = options.maxResponseBytes ?? DEFAULT_MAX_RESPONSE_BYTES;
    this.failureThreshold = options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
    this.logger = options.logger ?? defaultLogger;
    // Every open connection listens on the lifecycle signal.
    setMaxListeners(0, this.lifecycle.signal);
  }

  get closed(): boolean {
    return this.lifecycle.signal.aborted;
  }

  /**
   * Send a request. Returns its future immediately; all network work happens
   * in the background.
   *
   * A request that already carries a future is refused rather than resent
   * with it, so each future has a single owner.
   *
   * @throws UnsupportedRequestError if the request kind is unknown
   * @throws ConfigurationError if the request was already sent
   */
  send<R>(request: TransportRequest<R>): ResponseFuture<R> {
    const decoder = resolveDecoder(request);
    if (request.future) {
      throw new ConfigurationError(
        "Request is already bound to a future; create a new request instead.",
      );
    }

    const state = new ConnectionState(
      this.endpoints.length,
      this.lastWorkingEndpointIndex,
    );
    const future = new ResponseFuture<R>({
      retryPolicy: request.retryPolicy ?? this.retryPolicy,
      connectionState: state,
      retryHandler: () => this.connect(request, decoder, state),
      logger: this.logger,
    });
    request.future = future;

    if (this.closed) {
      future.fail(new TransportClosedError());
      return future;
    }

    this.pending.add(future);
    future.onComplete(() => this.pending.delete(future));

    this.connect(request, decoder, state);
    return future;
  }

  /**
   * Index of the endpoint that accepted the most recent connection.
   */
  getLastWorkingEndpoint(): number {
    return this.lastWorkingEndpointIndex;
  }

  getEndpoints(): Endpoint[] {
    return this.endpoints.map((endpoint) => ({
      id: endpoint.id,
      url: endpoint.url,
      protocol: endpoint.protocol,
      host: endpoint.host,
      port: endpoint.port,
      headers: { ...endpoint.headers },
    }));
  }

  /**
   * Get status of all endpoints.
   */
  getStatus(): EndpointStatus[] {
    return this.endpoints.map((endpoint) => ({
      id: endpoint.id,
      url: endpoint.url,
      healthy: endpoint.healthy,
      consecutiveFailures: endpoint.consecutiveFailures,
      lastLatencyMs: endpoint.lastLatencyMs,
      lastError: endpoint.lastError,
    }));
  }

  /**
   * Release every connection. In-flight and later requests fail with
   * TransportClosedError. Safe to call more than once.
   */
  close(): void {
    if (this.closed) {
      return;
    }

    this.lifecycle.abort();
    const error = new TransportClosedError();
    for (const future of [...this.pending]) {
      future.fail(error);
    }
    this.pending.clear();
  }

  private connect<R>(
    request: TransportRequest<R>,
    decoder: ResponseDecoder<R>,
    state: ConnectionState,
  ): void {
    const future = request.future;
    if (!future) {
      throw new ConfigurationError("Request has no future to complete.");
    }

    const attempt = future.attachAttempt();
    this.runAttempt(request, decoder, state, attempt).catch((error: unknown) => {
      attempt.abort(error instanceof Error ? error : new Error(String(error)));
    });
  }

  private async runAttempt<R>(
    request: TransportRequest<R>,
    decoder: ResponseDecoder<R>,
    state: ConnectionState,
    attempt: Attempt<R>,
  ): Promise<void> {
    if (this.closed) {
      attempt.abort(new TransportClosedError());
      return;
    }

    const endpoint = this.endpoints[state.endpointIndex];
    const socket = await this.openConnection(endpoint);
    if (socket instanceof Error) {
      if (this.closed) {
        attempt.abort(new TransportClosedError());
      } else {
        attempt.fail(socket);
      }
      return;
    }

    this.lastWorkingEndpointIndex = state.endpointIndex;

    try {
      let wire: WireRequest;
      try {
        wire = buildWireRequest(request.path, request);
      } catch (error) {
        attempt.abort(error instanceof Error ? error : new Error(String(error)));
        return;
      }

      let response: DecodedResponse;
      try {
        response = await this.exchange(
          socket,
          endpoint,
          wire,
          request.timeoutMs ?? this.defaultTimeoutMs,
        );
      } catch (error) {
        if (this.closed) {
          attempt.abort(new TransportClosedError());
        } else if (error instanceof RequestBuildError) {
          attempt.abort(error);
        } else {
          attempt.fail(error instanceof Error ? error : new ProtocolError(describeCause(error)));
        }
        return;
      }

      dispatchResponse(decoder, response, attempt);
    } finally {
      socket.destroy();
    }
  }

  /**
   * Connect to an endpoint, tracking its health. Resolves with the error
   * instead of rejecting so the caller can route it.
   */
  private async openConnection(endpoint: InternalEndpoint): Promise<Socket | Error> {
    const start = Date.now();
    try {
      const socket = await this.connector.connect(endpoint, {
        timeoutMs: this.connectTimeoutMs,
        signal: this.lifecycle.signal,
      });
      this.markSuccess(endpoint, Date.now() - start);
      this.logger.info(`Connected to ${endpoint.host}:${endpoint.port}`);
      return socket;
    } catch (error) {
      const connectionError =
        error instanceof ConnectionError || error instanceof TransportClosedError
          ? error
          : new ConnectionError(endpoint.url, error);
      if (!(connectionError instanceof TransportClosedError)) {
        this.markFailure(endpoint, describeCause(error));
        this.logger.warn(connectionError.message);
      }
      return connectionError;
    }
  }

  /**
   * Write the wire request on an open connection and aggregate the response.
   * Rejects with RequestBuildError when node:http refuses the path or headers.
   */
  private exchange(
    socket: Socket,
    endpoint: InternalEndpoint,
    wire: WireRequest,
    timeoutMs: number,
  ): Promise<DecodedResponse> {
    return new Promise<DecodedResponse>((resolve, reject) => {
      // First failure raised here wins over the socket errors it causes.
      let failure: Error | undefined;
      const abort = (error: Error) => {
        failure ??= error;
        req.destroy(error);
      };
      const fail = (error: Error) => reject(failure ?? error);

      let req: ClientRequest;
      try {
        req = httpRequest({
          host: endpoint.host,
          port: endpoint.port,
          method: wire.method,
          path: wire.path,
          headers: { ...endpoint.headers, ...wire.headers },
          createConnection: () => socket,
        });
      } catch (error) {
        reject(new RequestBuildError(error));
        return;
      }

      if (timeoutMs > 0) {
        req.setTimeout(timeoutMs, () => abort(new ReadTimeoutError(timeoutMs)));
      }

      req.on("response", (res) => {
        let size = 0;
        const chunks: Buffer[] = [];

        res.on("data", (chunk: Buffer) => {
          size += chunk.length;
          if (size > this.maxResponseBytes) {
            abort(new ProtocolError(`Response body exceeds ${this.maxResponseBytes} bytes.`));
            return;
          }
          chunks.push(chunk);
        });
        res.on("end", () => {
          if (failure || !res.complete) {
            fail(new ProtocolError("Connection closed before the response completed."));
            return;
          }
          resolve({
            status: res.statusCode ?? 0,
            headers: res.headers,
            body: Buffer.concat(chunks),
          });
        });
        res.on("error", fail);
      });
      req.on("error", fail);

      req.end(wire.body);
    });
  }

  private markSuccess(endpoint: InternalEndpoint, latencyMs: number): void {
    endpoint.consecutiveFailures = 0;
    endpoint.healthy = true;
    endpoint.lastError = undefined;
    endpoint.lastLatencyMs = latencyMs;
  }

  private markFailure(endpoint: InternalEndpoint, reason: string): void {
    endpoint.consecutiveFailures += 1;
    endpoint.lastError = reason;
    if (endpoint.consecutiveFailures >= this.failureThreshold) {
      endpoint.healthy = false;
    }
  }
}

function normalizeEndpoint(
  endpoint: string | EndpointConfig,
  index: number,
): InternalEndpoint {
  const config = typeof endpoint === "string" ? { url: endpoint } : endpoint;
  if (!config.url) {
    throw new ConfigurationError("Endpoint must include a url.");
  }

  let parsed: URL;
  try {
    parsed = new URL(config.url);
  } catch (error) {
    throw new ConfigurationError(`Invalid endpoint url: ${config.url}`, { cause: error });
  }

  const protocol =
    parsed.protocol === "https:" ? "https:" : parsed.protocol === "http:" ? "http:" : undefined;
  if (!protocol) {
    throw new ConfigurationError(`Unsupported endpoint scheme: ${parsed.protocol}`);
  }

  return {
    id: `endpoint-${index}`,
    url: config.url,
    protocol,
    host: parsed.hostname.replace(/^\[(.*)\]$/, "$1"),
    port: parsed.port ? Number(parsed.port) : protocol === "https:" ? 443 : 80,
    headers: config.headers ?? {},
    consecutiveFailures: 0,
    healthy: true,
  };
}

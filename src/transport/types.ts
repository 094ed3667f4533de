import type { IncomingHttpHeaders } from "node:http";
import type { ConnectionOptions } from "node:tls";
import type { Logger } from "../logger.js";
import type { Connector } from "./connector.js";
import type { ResponseFuture } from "./responseFuture.js";
import type { RetryPolicy } from "./retry.js";

export type HttpMethod = "GET" | "HEAD" | "PUT" | "POST" | "DELETE";

/**
 * Fully encoded HTTP/1.1 request, ready to be written to a connection.
 */
export interface WireRequest {
  method: HttpMethod;
  path: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * Aggregated HTTP response handed to response decoders.
 */
export interface DecodedResponse {
  status: number;
  headers: IncomingHttpHeaders;
  body: Buffer;
}

interface RequestBase<R> {
  method: HttpMethod;
  /** Target path, including any query the caller already encoded */
  path: string;
  /** Sent as a query string, or as a form body for POST */
  params?: Record<string, string>;
  /** Read timeout for the response; zero or absent disables it */
  timeoutMs?: number;
  /** Overrides the client's retry policy for this request */
  retryPolicy?: RetryPolicy;
  /** Bound by the transport on first send */
  future?: ResponseFuture<R>;
  /** Last wire request built for this request */
  wireRequest?: WireRequest;
}

/**
 * Key-space operation. The decoded response goes to `onResponse` as is.
 */
export interface KeyRequest<R> extends RequestBase<R> {
  kind: "key";
  onResponse: (response: DecodedResponse) => R;
}

/**
 * Server version probe. The body is decoded as UTF-8 text.
 */
export interface VersionRequest<R> extends RequestBase<R> {
  kind: "version";
  fromText: (text: string) => R;
}

export type TransportRequest<R> = KeyRequest<R> | VersionRequest<R>;

export type RequestKind = TransportRequest<unknown>["kind"];

/**
 * Configuration for a single server endpoint.
 */
export interface EndpointConfig {
  /** Base URL (scheme, host and port) of the endpoint */
  url: string;
  /** Optional headers to include with requests to this endpoint */
  headers?: Record<string, string>;
}

/**
 * Options for the TransportClient.
 */
export interface TransportClientOptions {
  /** TLS settings; when present every endpoint is reached over TLS */
  tls?: ConnectionOptions;
  /** Opens connections (default: node:net / node:tls) */
  connector?: Connector;
  /** Retry policy for requests that carry none */
  retryPolicy?: RetryPolicy;
  /** Connect timeout in milliseconds (default: 300) */
  connectTimeoutMs?: number;
  /** Read timeout for requests that set none; 0 disables it (default: 0) */
  defaultTimeoutMs?: number;
  /** Largest response body accepted, in bytes (default: 102400) */
  maxResponseBytes?: number;
  /** Consecutive connect failures before an endpoint reports unhealthy (default: 3) */
  failureThreshold?: number;
  logger?: Logger;
}

/**
 * Endpoint after normalization.
 */
export interface Endpoint {
  id: string;
  url: string;
  protocol: "http:" | "https:";
  host: string;
  port: number;
  headers: Record<string, string>;
}

/**
 * Status information for an endpoint.
 */
export interface EndpointStatus {
  id: string;
  url: string;
  healthy: boolean;
  consecutiveFailures: number;
  lastLatencyMs?: number;
  lastError?: string;
}

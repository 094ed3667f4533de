export { TransportClient } from "./transportClient.js";
export { ConnectionState } from "./connectionState.js";
export { ResponseFuture } from "./responseFuture.js";
export { buildWireRequest, FormBodyEncoder } from "./requestBuilder.js";
export { dispatchResponse, resolveDecoder, TEXT_ENCODING } from "./responseDispatch.js";
export { createNodeConnector, DEFAULT_CONNECT_TIMEOUT_MS } from "./connector.js";
export {
  createDefaultRetryPolicy,
  NoRetry,
  RetryNTimes,
  RetryOnce,
  RetryWithExponentialBackoff,
  RetryWithTimeout,
} from "./retry.js";
export {
  ConfigurationError,
  ConnectionError,
  isRetryableError,
  ProtocolError,
  ReadTimeoutError,
  RequestBuildError,
  TransportClosedError,
  TransportError,
  UnsupportedRequestError,
} from "./errors.js";
export type { RetryPolicy } from "./retry.js";
export type { Connector, ConnectOptions } from "./connector.js";
export type { ResponseDecoder } from "./responseDispatch.js";
export type {
  Attempt,
  CompletionListener,
  FutureOutcome,
  FutureStatus,
  RetryHandler,
} from "./responseFuture.js";
export type {
  DecodedResponse,
  Endpoint,
  EndpointConfig,
  EndpointStatus,
  HttpMethod,
  KeyRequest,
  RequestKind,
  TransportClientOptions,
  TransportRequest,
  VersionRequest,
  WireRequest,
} from "./types.js";

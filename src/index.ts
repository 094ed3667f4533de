// Transport - connect, retry and failover across endpoints
export {
  buildWireRequest,
  ConfigurationError,
  ConnectionError,
  ConnectionState,
  createDefaultRetryPolicy,
  createNodeConnector,
  isRetryableError,
  NoRetry,
  ProtocolError,
  ReadTimeoutError,
  RequestBuildError,
  ResponseFuture,
  RetryNTimes,
  RetryOnce,
  RetryWithExponentialBackoff,
  RetryWithTimeout,
  TransportClient,
  TransportClosedError,
  TransportError,
  UnsupportedRequestError,
} from "./transport/index.js";
export type {
  Connector,
  DecodedResponse,
  EndpointConfig,
  EndpointStatus,
  FutureOutcome,
  KeyRequest,
  RetryPolicy,
  TransportClientOptions,
  TransportRequest,
  VersionRequest,
  WireRequest,
} from "./transport/index.js";

// Requests - key-space operations and version probe
export {
  createInOrderKey,
  deleteKey,
  getKey,
  KeyError,
  parseKeyResponse,
  setKey,
  versionRequest,
} from "./requests/index.js";
export type { KeyNode, KeyResult } from "./requests/index.js";

// Configuration
export { createTransportClient, loadTransportConfig } from "./config/index.js";
export type { TransportConfig } from "./config/index.js";

export type { Logger } from "./logger.js";

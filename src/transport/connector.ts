import { isIP, connect as netConnect, type Socket } from "node:net";
import { connect as tlsConnect, type ConnectionOptions } from "node:tls";
import { ConnectionError, TransportClosedError } from "./errors.js";
import type { Endpoint } from "./types.js";

export interface ConnectOptions {
  timeoutMs: number;
  /** Aborting destroys the socket, whether still connecting or connected */
  signal: AbortSignal;
}

/**
 * Opens a raw connection to an endpoint. Rejects with ConnectionError.
 */
export interface Connector {
  connect(endpoint: Endpoint, options: ConnectOptions): Promise<Socket>;
}

export const DEFAULT_CONNECT_TIMEOUT_MS = 300;

/**
 * Connector on node:net, or node:tls for https endpoints and whenever TLS
 * options are given.
 */
export function createNodeConnector(tls?: ConnectionOptions): Connector {
  return {
    connect(endpoint, options) {
      return new Promise<Socket>((resolve, reject) => {
        if (options.signal.aborted) {
          reject(new TransportClosedError());
          return;
        }

        const secure = tls !== undefined || endpoint.protocol === "https:";
        const socket: Socket = secure
          ? tlsConnect({
              servername: isIP(endpoint.host) ? undefined : endpoint.host,
              ...tls,
              host: endpoint.host,
              port: endpoint.port,
            })
          : netConnect({ host: endpoint.host, port: endpoint.port });
        const readyEvent = secure ? "secureConnect" : "connect";

        const onAbort = () => socket.destroy(new TransportClosedError());
        const onTimeout = () =>
          socket.destroy(new Error(`Connect timed out after ${options.timeoutMs}ms`));
        const onError = (error: Error) => {
          cleanup();
          reject(
            error instanceof TransportClosedError
              ? error
              : new ConnectionError(endpoint.url, error),
          );
        };
        const onReady = () => {
          cleanup();
          socket.setTimeout(0);
          socket.once("close", () => options.signal.removeEventListener("abort", onAbort));
          options.signal.addEventListener("abort", onAbort, { once: true });
          resolve(socket);
        };
        const cleanup = () => {
          options.signal.removeEventListener("abort", onAbort);
          socket.off("timeout", onTimeout);
          socket.off("error", onError);
          socket.off(readyEvent, onReady);
        };

        socket.setNoDelay(true);
        socket.setTimeout(options.timeoutMs);
        socket.once("timeout", onTimeout);
        socket.once("error", onError);
        socket.once(readyEvent, onReady);
        options.signal.addEventListener("abort", onAbort, { once: true });
      });
    },
  };
}

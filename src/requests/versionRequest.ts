import type { VersionRequest } from "../transport/types.js";
import type { RequestOptions } from "./types.js";

export const VERSION_PATH = "/version";

/**
 * Ask the server for its version string.
 */
export function versionRequest(options: RequestOptions = {}): VersionRequest<string> {
  return {
    kind: "version",
    method: "GET",
    path: VERSION_PATH,
    timeoutMs: options.timeoutMs,
    retryPolicy: options.retryPolicy,
    fromText: (text) => text,
  };
}

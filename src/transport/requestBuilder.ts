import { RequestBuildError } from "./errors.js";
import type { TransportRequest, WireRequest } from "./types.js";

/**
 * Encodes form attributes into an `application/x-www-form-urlencoded` body.
 * Must be closed once the body has been taken.
 */
export class FormBodyEncoder {
  private fields?: URLSearchParams = new URLSearchParams();

  addAttribute(name: string, value: string): void {
    this.open().append(name, value);
  }

  finalize(): string {
    return this.open().toString();
  }

  close(): void {
    this.fields = undefined;
  }

  get closed(): boolean {
    return this.fields === undefined;
  }

  private open(): URLSearchParams {
    if (!this.fields) {
      throw new Error("FormBodyEncoder is closed.");
    }
    return this.fields;
  }
}

/**
 * Translate a logical request into a wire request for `targetPath` and record
 * the result on the request.
 *
 * Query parameters are joined verbatim: callers pass values that are already
 * safe to place in a URL.
 */
export function buildWireRequest<R>(
  targetPath: string,
  request: TransportRequest<R>,
): WireRequest {
  const wire: WireRequest = {
    method: request.method,
    path: targetPath,
    headers: { Connection: "keep-alive" },
  };

  try {
    const entries = Object.entries(request.params ?? {});
    for (const [key, value] of entries) {
      if (typeof value !== "string") {
        throw new TypeError(`Parameter ${key} must be a string, got ${typeof value}.`);
      }
    }

    if (entries.length && request.method === "POST") {
      wire.body = encodeFormBody(entries);
      wire.headers["Content-Type"] = "application/x-www-form-urlencoded";
      wire.headers["Content-Length"] = String(Buffer.byteLength(wire.body));
    } else if (entries.length) {
      const query = entries.map(([key, value]) => `${key}=${value}`).join("&");
      wire.path = targetPath.includes("?")
        ? `${targetPath}&${query}`
        : `${targetPath}?${query}`;
    }
  } catch (error) {
    throw new RequestBuildError(error);
  }

  request.wireRequest = wire;
  return wire;
}

function encodeFormBody(entries: Array<[string, string]>): string {
  const encoder = new FormBodyEncoder();
  try {
    for (const [key, value] of entries) {
      encoder.addAttribute(key, value);
    }
    return encoder.finalize();
  } finally {
    encoder.close();
  }
}

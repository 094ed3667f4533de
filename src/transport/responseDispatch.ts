import { ProtocolError, UnsupportedRequestError } from "./errors.js";
import type { Attempt } from "./responseFuture.js";
import type { DecodedResponse, TransportRequest } from "./types.js";

export type ResponseDecoder<R> = (response: DecodedResponse) => R;

/** Response bodies are decoded with this encoding, whatever the server declares. */
export const TEXT_ENCODING: BufferEncoding = "utf8";

/**
 * Pick the decoder for a request's variant. Throws UnsupportedRequestError for
 * anything that is not a known variant.
 */
export function resolveDecoder<R>(request: TransportRequest<R>): ResponseDecoder<R> {
  switch (request.kind) {
    case "key":
      return (response) => request.onResponse(response);
    case "version":
      return (response) => request.fromText(response.body.toString(TEXT_ENCODING));
    default:
      throw new UnsupportedRequestError(describeKind(request));
  }
}

/**
 * Complete an attempt from a decoded response. Protocol errors go through the
 * retry policy, any other decoder error is terminal.
 */
export function dispatchResponse<R>(
  decoder: ResponseDecoder<R>,
  response: DecodedResponse,
  attempt: Attempt<R>,
): void {
  let value: R;
  try {
    value = decoder(response);
  } catch (error) {
    if (error instanceof ProtocolError) {
      attempt.fail(error);
    } else {
      attempt.abort(error instanceof Error ? error : new Error(String(error)));
    }
    return;
  }
  attempt.succeed(value);
}

function describeKind(request: unknown): string {
  if (typeof request === "object" && request !== null && "kind" in request) {
    return String(request.kind);
  }
  return typeof request;
}

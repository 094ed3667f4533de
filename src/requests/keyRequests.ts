import type { KeyRequest } from "../transport/types.js";
import { parseKeyResponse } from "./keyResponse.js";
import type {
  CreateInOrderKeyOptions,
  DeleteKeyOptions,
  GetKeyOptions,
  KeyResult,
  RequestOptions,
  SetKeyOptions,
} from "./types.js";

export const KEYS_PATH = "/v2/keys";

type ParamValue = string | number | boolean | undefined;

export function getKey(key: string, options: GetKeyOptions = {}): KeyRequest<KeyResult> {
  return keyRequest("GET", key, options, {
    recursive: options.recursive,
    sorted: options.sorted,
    wait: options.wait,
    waitIndex: options.waitIndex,
    quorum: options.quorum,
  });
}

export function setKey(
  key: string,
  value: string,
  options: SetKeyOptions = {},
): KeyRequest<KeyResult> {
  return keyRequest("PUT", key, options, {
    value,
    ttl: options.ttl,
    prevExist: options.prevExist,
    prevValue: options.prevValue,
    prevIndex: options.prevIndex,
  });
}

/**
 * Create a key with a generated, increasing name inside `dir`.
 */
export function createInOrderKey(
  dir: string,
  value: string,
  options: CreateInOrderKeyOptions = {},
): KeyRequest<KeyResult> {
  return keyRequest("POST", dir, options, { value, ttl: options.ttl });
}

export function deleteKey(key: string, options: DeleteKeyOptions = {}): KeyRequest<KeyResult> {
  return keyRequest("DELETE", key, options, {
    recursive: options.recursive,
    dir: options.dir,
    prevValue: options.prevValue,
    prevIndex: options.prevIndex,
  });
}

export function keyPath(key: string): string {
  const trimmed = key.replace(/^\/+/, "");
  return `${KEYS_PATH}/${trimmed.split("/").map(encodeURIComponent).join("/")}`;
}

function keyRequest(
  method: KeyRequest<KeyResult>["method"],
  key: string,
  options: RequestOptions,
  params: Record<string, ParamValue>,
): KeyRequest<KeyResult> {
  return {
    kind: "key",
    method,
    path: keyPath(key),
    // Query strings go out verbatim, form bodies are encoded by the builder.
    params: toParams(params, method !== "POST"),
    timeoutMs: options.timeoutMs,
    retryPolicy: options.retryPolicy,
    onResponse: parseKeyResponse,
  };
}

function toParams(
  params: Record<string, ParamValue>,
  encode: boolean,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(params)) {
    if (value === undefined) continue;
    result[name] = encode ? encodeURIComponent(String(value)) : String(value);
  }
  return result;
}

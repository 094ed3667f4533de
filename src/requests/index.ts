export { createInOrderKey, deleteKey, getKey, keyPath, KEYS_PATH, setKey } from "./keyRequests.js";
export { KeyError, parseKeyResponse } from "./keyResponse.js";
export { versionRequest, VERSION_PATH } from "./versionRequest.js";
export type {
  CreateInOrderKeyOptions,
  DeleteKeyOptions,
  GetKeyOptions,
  KeyErrorBody,
  KeyNode,
  KeyResult,
  RequestOptions,
  SetKeyOptions,
} from "./types.js";

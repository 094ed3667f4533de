import type { RetryPolicy } from "../transport/retry.js";

/**
 * A node of the key space. Directories carry `nodes` instead of `value`.
 */
export interface KeyNode {
  key?: string;
  value?: string;
  dir?: boolean;
  createdIndex?: number;
  modifiedIndex?: number;
  ttl?: number;
  expiration?: string;
  nodes?: KeyNode[];
}

export interface KeyResult {
  action: string;
  node: KeyNode;
  prevNode?: KeyNode;
}

/**
 * Error body returned by the service for a failed key operation.
 */
export interface KeyErrorBody {
  errorCode: number;
  message: string;
  cause?: string;
  index?: number;
}

export interface RequestOptions {
  /** Read timeout in milliseconds */
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
}

export interface GetKeyOptions extends RequestOptions {
  recursive?: boolean;
  sorted?: boolean;
  /** Long-poll until the key changes */
  wait?: boolean;
  waitIndex?: number;
  quorum?: boolean;
}

export interface SetKeyOptions extends RequestOptions {
  /** Time to live in seconds */
  ttl?: number;
  prevExist?: boolean;
  prevValue?: string;
  prevIndex?: number;
}

export interface CreateInOrderKeyOptions extends RequestOptions {
  ttl?: number;
}

export interface DeleteKeyOptions extends RequestOptions {
  recursive?: boolean;
  dir?: boolean;
  prevValue?: string;
  prevIndex?: number;
}

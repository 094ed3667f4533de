import { z } from "zod";
import { ProtocolError } from "../transport/errors.js";
import { TEXT_ENCODING } from "../transport/responseDispatch.js";
import type { DecodedResponse } from "../transport/types.js";
import type { KeyErrorBody, KeyNode, KeyResult } from "./types.js";

const keyNodeSchema: z.ZodType<KeyNode> = z.lazy(() =>
  z.object({
    key: z.string().optional(),
    value: z.string().optional(),
    dir: z.boolean().optional(),
    createdIndex: z.number().int().optional(),
    modifiedIndex: z.number().int().optional(),
    ttl: z.number().optional(),
    expiration: z.string().optional(),
    nodes: z.array(keyNodeSchema).optional(),
  }),
);

const keyResultSchema = z.object({
  action: z.string(),
  node: keyNodeSchema,
  prevNode: keyNodeSchema.optional(),
});

const keyErrorSchema = z.object({
  errorCode: z.number().int(),
  message: z.string(),
  cause: z.string().optional(),
  index: z.number().int().optional(),
});

/**
 * The service rejected a key operation (missing key, failed compare, ...).
 */
export class KeyError extends Error {
  readonly errorCode: number;
  readonly status: number;
  readonly index?: number;
  readonly detail?: string;

  constructor(body: KeyErrorBody, status: number) {
    super(body.cause ? `${body.message} (${body.cause})` : body.message);
    this.name = "KeyError";
    this.errorCode = body.errorCode;
    this.status = status;
    this.index = body.index;
    this.detail = body.cause;
  }
}

/**
 * Decode a key-space response body.
 *
 * @throws KeyError when the service answered with an error body
 * @throws ProtocolError when the body is not a key result
 */
export function parseKeyResponse(response: DecodedResponse): KeyResult {
  let json: unknown;
  try {
    json = JSON.parse(response.body.toString(TEXT_ENCODING));
  } catch (error) {
    throw new ProtocolError(`Response (HTTP ${response.status}) is not valid JSON.`, {
      cause: error,
    });
  }

  const failure = keyErrorSchema.safeParse(json);
  if (failure.success) {
    throw new KeyError(failure.data, response.status);
  }

  const result = keyResultSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
      .join("; ");
    throw new ProtocolError(`Unexpected key response: ${issues}`);
  }
  return result.data;
}

import { z } from "zod";
import { ConfigurationError } from "../transport/errors.js";
import { TransportClient } from "../transport/transportClient.js";
import type { TransportClientOptions } from "../transport/types.js";

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  KV_ENDPOINTS: z
    .string({ required_error: "KV_ENDPOINTS is required" })
    .transform((value) =>
      value
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean),
    )
    .pipe(z.array(z.string().url()).min(1, "at least one endpoint is required")),
  KV_CONNECT_TIMEOUT_MS: positiveInt.default(300),
  KV_REQUEST_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(0),
  KV_MAX_RESPONSE_BYTES: positiveInt.default(1024 * 100),
  KV_FAILURE_THRESHOLD: positiveInt.default(3),
  KV_TLS_REJECT_UNAUTHORIZED: z.enum(["true", "false"]).optional(),
});

export interface TransportConfig {
  endpoints: string[];
  connectTimeoutMs: number;
  /** Read timeout applied to requests that set none; 0 disables it */
  requestTimeoutMs: number;
  maxResponseBytes: number;
  failureThreshold: number;
  /** When set, every endpoint is reached over TLS with this verification setting */
  tlsRejectUnauthorized?: boolean;
}

/**
 * Read transport settings from environment variables.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadTransportConfig(
  env: Record<string, string | undefined> = process.env,
): TransportConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid transport configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    endpoints: values.KV_ENDPOINTS,
    connectTimeoutMs: values.KV_CONNECT_TIMEOUT_MS,
    requestTimeoutMs: values.KV_REQUEST_TIMEOUT_MS,
    maxResponseBytes: values.KV_MAX_RESPONSE_BYTES,
    failureThreshold: values.KV_FAILURE_THRESHOLD,
    tlsRejectUnauthorized:
      values.KV_TLS_REJECT_UNAUTHORIZED === undefined
        ? undefined
        : values.KV_TLS_REJECT_UNAUTHORIZED === "true",
  };
}

/**
 * Build a client from loaded configuration. `overrides` wins over `config`.
 */
export function createTransportClient(
  config: TransportConfig,
  overrides: TransportClientOptions = {},
): TransportClient {
  const tls =
    config.tlsRejectUnauthorized === undefined
      ? undefined
      : { rejectUnauthorized: config.tlsRejectUnauthorized };

  return new TransportClient(config.endpoints, {
    tls,
    connectTimeoutMs: config.connectTimeoutMs,
    defaultTimeoutMs: config.requestTimeoutMs,
    maxResponseBytes: config.maxResponseBytes,
    failureThreshold: config.failureThreshold,
    ...overrides,
  });
}

import type { OpenAIErrorBody } from "./types.js";

export type BridgeErrorCode =
  | "acquire_failed"
  | "exchange_failed"
  | "grant_failed"
  | "credential_unavailable"
  | "normalization_error"
  | "invalid_tool_schema"
  | "translation_error"
  | "invalid_request"
  | "stream_stalled"
  | "deadline_exceeded"
  | "upstream_error"
  | "quota_exceeded"
  | "usage_unavailable";

export type BridgeErrorStatus = 400 | 429 | 502 | 503 | 504;

const STATUS_BY_CODE: Record<BridgeErrorCode, BridgeErrorStatus> = {
  acquire_failed: 503,
  exchange_failed: 503,
  grant_failed: 503,
  credential_unavailable: 503,
  normalization_error: 400,
  invalid_tool_schema: 400,
  translation_error: 400,
  invalid_request: 400,
  stream_stalled: 504,
  deadline_exceeded: 504,
  upstream_error: 502,
  quota_exceeded: 429,
  usage_unavailable: 503,
};

export interface BridgeErrorOptions {
  details?: Record<string, unknown>;
  retryAfterMs?: number;
  /** Failure is worth retrying with the same input (network error, 5xx, rate limit) */
  transient?: boolean;
  cause?: unknown;
}

export class BridgeError extends Error {
  public code: BridgeErrorCode;
  public details?: Record<string, unknown>;
  public retryAfterMs?: number;
  public transient: boolean;

  public constructor(code: BridgeErrorCode, message: string, options: BridgeErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "BridgeError";
    this.code = code;
    this.details = options.details;
    this.retryAfterMs = options.retryAfterMs;
    this.transient = options.transient ?? options.retryAfterMs !== undefined;
  }

  public get status(): BridgeErrorStatus {
    return STATUS_BY_CODE[this.code];
  }
}

export function isBridgeError(value: unknown): value is BridgeError {
  return value instanceof BridgeError;
}

export function toBridgeError(
  value: unknown,
  fallbackCode: BridgeErrorCode = "upstream_error",
  fallbackMessage = "Unknown bridge error"
): BridgeError {
  if (isBridgeError(value)) {
    return value;
  }

  if (value instanceof Error) {
    return new BridgeError(fallbackCode, value.message || fallbackMessage, { cause: value });
  }

  return new BridgeError(fallbackCode, fallbackMessage, {
    details: { value: typeof value === "string" ? value : JSON.stringify(value) },
  });
}

export function errorTypeFor(status: BridgeErrorStatus): string {
  switch (status) {
    case 400:
      return "invalid_request_error";
    case 429:
      return "rate_limit_error";
    default:
      return "upstream_error";
  }
}

/**
 * OpenAI-shaped error body for a bridge error
 */
export function toOpenAIError(error: BridgeError): OpenAIErrorBody {
  return {
    error: {
      message: error.message,
      type: errorTypeFor(error.status),
      code: error.code,
    },
  };
}

import { z } from "zod";
import { BridgeError, type BridgeErrorCode } from "../../shared/errors.js";
import type { UpstreamConfig } from "../../shared/types.js";
import { errorMessage } from "../../shared/utils.js";
import { parseRetryAfterHeader, parseRetryDelay } from "../utils/errorParser.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type GraphQLClientConfig = Pick<
  UpstreamConfig,
  "graphqlUrl" | "clientVersion" | "osCategory" | "osName" | "osVersion"
>;

export interface GraphQLRequest<T> {
  operationName: string;
  query: string;
  variables: Record<string, unknown>;
  /** Schema of the `data` field */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  accessToken?: string;
  /** Code raised for every failure of this call */
  errorCode: BridgeErrorCode;
}

const envelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

export function clientHeaders(config: GraphQLClientConfig): Record<string, string> {
  return {
    "x-warp-client-version": config.clientVersion,
    "x-warp-os-category": config.osCategory,
    "x-warp-os-name": config.osName,
    "x-warp-os-version": config.osVersion,
  };
}

/**
 * POST a GraphQL operation to the upstream and validate its `data`
 */
export async function postGraphQL<T>(
  config: GraphQLClientConfig,
  request: GraphQLRequest<T>,
  fetchImpl: FetchLike = fetch
): Promise<T> {
  const { operationName, errorCode } = request;

  let response: Response;
  try {
    response = await fetchImpl(`${config.graphqlUrl}?op=${operationName}`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
        ...clientHeaders(config),
        ...(request.accessToken ? { Authorization: `Bearer ${request.accessToken}` } : {}),
      },
      body: JSON.stringify({
        operationName,
        query: request.query,
        variables: request.variables,
      }),
    });
  } catch (error) {
    throw new BridgeError(errorCode, `${operationName} request failed: ${errorMessage(error)}`, {
      transient: true,
      cause: error,
    });
  }

  const text = await response.text();

  if (!response.ok) {
    const retryAfterMs =
      response.status === 429
        ? parseRetryAfterHeader(response.headers.get("retry-after")) ?? parseRetryDelay(text)
        : undefined;
    throw new BridgeError(errorCode, `${operationName} failed with HTTP ${response.status}: ${text.slice(0, 200)}`, {
      details: { status: response.status },
      retryAfterMs,
      transient: response.status === 429 || response.status >= 500,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new BridgeError(errorCode, `${operationName} returned invalid JSON`, { cause: error });
  }

  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new BridgeError(errorCode, `${operationName} returned an unexpected response`);
  }

  const firstError = envelope.data.errors?.[0];
  if (firstError) {
    throw new BridgeError(errorCode, `${operationName} failed: ${firstError.message}`);
  }

  const data = request.schema.safeParse(envelope.data.data);
  if (!data.success) {
    throw new BridgeError(errorCode, `${operationName} returned unexpected data: ${data.error.issues[0]?.message ?? "invalid"}`);
  }
  return data.data;
}

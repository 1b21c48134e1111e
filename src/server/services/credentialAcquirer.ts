/**
 * Credential Acquirer
 *
 * 匿名凭证获取的三个阶段：
 * 1. 上游 GraphQL 创建匿名用户 → 身份断言 (custom token)
 * 2. 身份提供方 signInWithCustomToken → refresh token
 * 3. refresh-token grant → access token (JWT)
 *
 * 每个阶段都在 RetryPolicy 下执行；本模块不写入 CredentialStore
 */

import { z } from "zod";
import { BridgeError } from "../../shared/errors.js";
import { logger } from "../../shared/logger.js";
import type { Credential, CredentialsConfig } from "../../shared/types.js";
import { errorMessage } from "../../shared/utils.js";
import { readTokenLifetime } from "../translator/utils/jwt.js";
import { parseRetryAfterHeader, parseRetryDelay } from "../utils/errorParser.js";
import { createRetryPolicy, runWithRetry, type RetryPolicy } from "../utils/retryPolicy.js";
import { postGraphQL, type FetchLike, type GraphQLClientConfig } from "./graphql.js";

const log = logger.scoped("credentials");

const CREATE_ANONYMOUS_USER = `mutation CreateAnonymousUser($input: CreateAnonymousUserInput!, $requestContext: RequestContext!) {
  createAnonymousUser(input: $input, requestContext: $requestContext) {
    __typename
    ... on CreateAnonymousUserOutput {
      expiresAt
      anonymousUserType
      firebaseUid
      idToken
      isInviteValid
    }
    ... on UserFacingError {
      error {
        __typename
        message
      }
    }
  }
}`;

const createAnonymousUserSchema = z.object({
  createAnonymousUser: z.object({
    __typename: z.string(),
    idToken: z.string().optional(),
    error: z.object({ message: z.string() }).optional(),
  }),
});

const exchangeResponseSchema = z.object({
  refreshToken: z.string().min(1),
  idToken: z.string().optional(),
});

const grantResponseSchema = z.object({
  id_token: z.string().optional(),
  access_token: z.string().optional(),
  refresh_token: z.string().optional(),
});

const RATE_LIMIT_MARKERS = ["rate_limit_exceeded", "TOO_MANY_ATTEMPTS_TRY_LATER"];

export interface CredentialAcquirerOptions {
  upstream: GraphQLClientConfig;
  credentials: CredentialsConfig;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  policy?: RetryPolicy;
}

export class CredentialAcquirer {
  private readonly fetchImpl: FetchLike;
  private readonly policy: RetryPolicy;

  constructor(private readonly options: CredentialAcquirerOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.policy =
      options.policy ??
      createRetryPolicy({
        maxAttempts: options.credentials.maxAttempts,
        backoffBaseMs: options.credentials.backoffBaseMs,
        backoffMaxMs: options.credentials.backoffMaxMs,
      });
  }

  /**
   * Full acquisition: anonymous principal, identity exchange, grant
   */
  async acquire(): Promise<Credential> {
    log.info("Acquiring anonymous upstream credential...");
    const assertion = await this.retry("create anonymous user", () => this.createAnonymousPrincipal());
    const refreshToken = await this.retry("identity exchange", () => this.exchangeIdentity(assertion));
    const credential = await this.retry("token grant", () => this.grant(refreshToken));
    log.info(`Credential acquired (expires ${new Date(credential.expiresAt).toISOString()})`);
    return credential;
  }

  /**
   * Grant phase alone, for an existing refresh token
   */
  async refresh(refreshToken: string): Promise<Credential> {
    return this.retry("token refresh", () => this.grant(refreshToken));
  }

  private retry<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return runWithRetry(this.policy, operation, { label, sleep: this.options.sleep });
  }

  // ============================================
  // Phase 1: anonymous principal
  // ============================================

  async createAnonymousPrincipal(): Promise<string> {
    const { upstream } = this.options;
    const data = await postGraphQL(
      upstream,
      {
        operationName: "CreateAnonymousUser",
        query: CREATE_ANONYMOUS_USER,
        variables: {
          input: {
            anonymousUserType: "NATIVE_CLIENT_ANONYMOUS_USER_FEATURE_GATED",
            expirationType: "NO_EXPIRATION",
            referralCode: null,
          },
          requestContext: {
            clientContext: { version: upstream.clientVersion },
            osContext: {
              category: upstream.osCategory,
              name: upstream.osName,
              version: upstream.osVersion,
            },
          },
        },
        schema: createAnonymousUserSchema,
        errorCode: "acquire_failed",
      },
      this.fetchImpl
    );

    const result = data.createAnonymousUser;
    if (result.__typename === "UserFacingError" || result.error) {
      throw new BridgeError(
        "acquire_failed",
        `Anonymous user creation rejected: ${result.error?.message ?? result.__typename}`
      );
    }
    if (!result.idToken) {
      throw new BridgeError("acquire_failed", "Anonymous user creation returned no identity assertion");
    }
    return result.idToken;
  }

  // ============================================
  // Phase 2: identity exchange
  // ============================================

  async exchangeIdentity(assertion: string): Promise<string> {
    const { identityUrl, identityApiKey } = this.options.credentials;
    const url = identityApiKey ? `${identityUrl}?key=${encodeURIComponent(identityApiKey)}` : identityUrl;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ token: assertion, returnSecureToken: true }),
      });
    } catch (error) {
      throw new BridgeError("exchange_failed", `Identity exchange request failed: ${errorMessage(error)}`, {
        transient: true,
        cause: error,
      });
    }

    const text = await response.text();
    if (!response.ok) {
      throw new BridgeError("exchange_failed", `Identity exchange failed with HTTP ${response.status}: ${text.slice(0, 200)}`, {
        details: { status: response.status },
        transient: response.status >= 500,
      });
    }

    const parsed = exchangeResponseSchema.safeParse(parseJson(text));
    if (!parsed.success) {
      throw new BridgeError("exchange_failed", "Identity exchange returned no refresh token");
    }
    return parsed.data.refreshToken;
  }

  // ============================================
  // Phase 3: grant
  // ============================================

  async grant(refreshToken: string): Promise<Credential> {
    const { tokenUrl, identityApiKey } = this.options.credentials;
    const url = identityApiKey ? `${tokenUrl}?key=${encodeURIComponent(identityApiKey)}` : tokenUrl;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({
          grant_type: "refresh_token",
          refresh_token: refreshToken,
        }).toString(),
      });
    } catch (error) {
      throw new BridgeError("grant_failed", `Token grant request failed: ${errorMessage(error)}`, {
        transient: true,
        cause: error,
      });
    }

    const text = await response.text();

    if (!response.ok) {
      if (response.status === 429 || RATE_LIMIT_MARKERS.some((marker) => text.includes(marker))) {
        const retryAfterMs = parseRetryAfterHeader(response.headers.get("retry-after")) ?? parseRetryDelay(text);
        throw new BridgeError("grant_failed", "Token grant rate limited", {
          details: { status: response.status },
          retryAfterMs,
          transient: true,
        });
      }
      if (text.includes("invalid_grant") || text.includes("INVALID_REFRESH_TOKEN") || text.includes("TOKEN_EXPIRED")) {
        throw new BridgeError("grant_failed", "Refresh token revoked or expired", {
          details: { status: response.status },
        });
      }
      throw new BridgeError("grant_failed", `Token grant failed with HTTP ${response.status}: ${text.slice(0, 200)}`, {
        details: { status: response.status },
        transient: response.status >= 500,
      });
    }

    const parsed = grantResponseSchema.safeParse(parseJson(text));
    const accessToken = parsed.success ? parsed.data.id_token ?? parsed.data.access_token : undefined;
    if (!parsed.success || !accessToken) {
      throw new BridgeError("grant_failed", "Token grant returned no access token");
    }

    // expires_in is not trusted; the token's own claims decide
    const lifetime = readTokenLifetime(accessToken);
    if (!lifetime) {
      throw new BridgeError("grant_failed", "Access token carries no decodable exp claim");
    }

    return {
      accessToken,
      refreshToken: parsed.data.refresh_token || refreshToken,
      expiresAt: lifetime.expiresAt,
      ...(lifetime.issuedAt !== undefined && { issuedAt: lifetime.issuedAt }),
    };
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Usage Tracker
 *
 * 缓存上游配额快照（有界过期时间），并给出节流建议
 */

import { z } from "zod";
import { BridgeError } from "../../shared/errors.js";
import { logger } from "../../shared/logger.js";
import type { Credential, ThrottleKind, UsageConfig, UsageSnapshot } from "../../shared/types.js";
import { errorMessage } from "../../shared/utils.js";
import { postGraphQL, type FetchLike, type GraphQLClientConfig } from "./graphql.js";

const log = logger.scoped("usage");

export type UsageReading = Omit<UsageSnapshot, "fetchedAt" | "stale">;
export type UsageFetcher = () => Promise<UsageReading>;

export interface UsageTrackerOptions extends Omit<UsageConfig, "enforce"> {
  fetchUsage: UsageFetcher;
  now?: () => number;
}

export class UsageTracker {
  private last: UsageSnapshot | undefined;
  private inflight: Promise<UsageSnapshot> | undefined;
  private lastAttemptAt: number | undefined;
  private readonly now: () => number;

  constructor(private readonly options: UsageTrackerOptions) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Cached snapshot while younger than the staleness window, otherwise a fresh query
   */
  async snapshot(): Promise<UsageSnapshot> {
    const last = this.last;
    if (last && !last.stale && this.now() - last.fetchedAt < this.options.stalenessMs) {
      return last;
    }

    if (!this.inflight) {
      this.inflight = this.fetch().finally(() => {
        this.inflight = undefined;
      });
    }
    return this.inflight;
  }

  /**
   * Start a query without waiting when the snapshot is missing or old.
   * At most one attempt per staleness window; failures are only logged.
   */
  refreshInBackground(): void {
    if (this.inflight || !this.isStale()) return;
    const attempted = this.lastAttemptAt;
    if (attempted !== undefined && this.now() - attempted < this.options.stalenessMs) return;

    this.snapshot().catch((error: unknown) => {
      log.debug(`Background usage query failed: ${errorMessage(error)}`);
    });
  }

  isStale(): boolean {
    const last = this.last;
    return !last || last.stale || this.now() - last.fetchedAt >= this.options.stalenessMs;
  }

  /** Last known snapshot without querying */
  peek(): UsageSnapshot | undefined {
    return this.last;
  }

  shouldThrottle(kind: ThrottleKind): boolean {
    const last = this.last;
    if (!last || last.isUnlimited || last.windowLimit <= 0) return false;
    if (this.now() >= last.resetsAt) return false;

    const threshold = kind === "chat" ? this.options.chatThreshold : this.options.backgroundThreshold;
    return last.windowUsed / last.windowLimit > threshold;
  }

  /**
   * Count a completed request locally until the next query
   */
  recordRequest(): void {
    const last = this.last;
    if (!last || this.now() >= last.resetsAt) return;
    this.last = { ...last, windowUsed: last.windowUsed + 1 };
  }

  private async fetch(): Promise<UsageSnapshot> {
    this.lastAttemptAt = this.now();
    let reading: UsageReading;
    try {
      reading = await this.options.fetchUsage();
    } catch (error) {
      if (this.last) {
        log.warn(`Usage query failed, serving last known snapshot: ${errorMessage(error)}`);
        this.last = { ...this.last, stale: true };
        return this.last;
      }
      throw new BridgeError("usage_unavailable", `Usage information unavailable: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const now = this.now();
    const previous = this.last;
    // 同一窗口内 windowUsed 不回退
    const windowUsed =
      previous && now < previous.resetsAt ? Math.max(previous.windowUsed, reading.windowUsed) : reading.windowUsed;

    this.last = { ...reading, windowUsed, fetchedAt: now, stale: false };
    log.debug(
      this.last.isUnlimited
        ? "Usage: unlimited"
        : `Usage: ${this.last.windowUsed}/${this.last.windowLimit}, resets ${new Date(this.last.resetsAt).toISOString()}`
    );
    return this.last;
  }
}

// ============================================
// Upstream query
// ============================================

const GET_REQUEST_LIMIT_INFO = `query GetRequestLimitInfo($requestContext: RequestContext!) {
  user(requestContext: $requestContext) {
    __typename
    ... on UserOutput {
      user {
        requestLimitInfo {
          isUnlimited
          nextRefreshTime
          requestLimit
          requestsUsedSinceLastRefresh
        }
      }
    }
    ... on UserFacingError {
      error {
        message
      }
    }
  }
}`;

const requestLimitSchema = z.object({
  user: z.object({
    user: z
      .object({
        requestLimitInfo: z.object({
          isUnlimited: z.boolean(),
          nextRefreshTime: z.string(),
          requestLimit: z.number(),
          requestsUsedSinceLastRefresh: z.number(),
        }),
      })
      .optional(),
    error: z.object({ message: z.string() }).optional(),
  }),
});

export function createUsageFetcher(
  upstream: GraphQLClientConfig,
  credentials: { acquire(): Promise<Credential> },
  fetchImpl?: FetchLike
): UsageFetcher {
  return async () => {
    const credential = await credentials.acquire();
    const data = await postGraphQL(
      upstream,
      {
        operationName: "GetRequestLimitInfo",
        query: GET_REQUEST_LIMIT_INFO,
        variables: {
          requestContext: {
            clientContext: { version: upstream.clientVersion },
            osContext: {
              category: upstream.osCategory,
              name: upstream.osName,
              version: upstream.osVersion,
            },
          },
        },
        schema: requestLimitSchema,
        accessToken: credential.accessToken,
        errorCode: "usage_unavailable",
      },
      fetchImpl
    );

    const info = data.user.user?.requestLimitInfo;
    if (!info) {
      throw new BridgeError("usage_unavailable", data.user.error?.message ?? "Usage query returned no limit info");
    }

    const resetsAt = Date.parse(info.nextRefreshTime);
    return {
      windowLimit: info.requestLimit,
      windowUsed: info.requestsUsedSinceLastRefresh,
      resetsAt: Number.isNaN(resetsAt) ? 0 : resetsAt,
      isUnlimited: info.isUnlimited,
    };
  };
}

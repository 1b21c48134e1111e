import { describe, it, expect, vi } from "vitest";

vi.mock("../../src/shared/logger.js", () => {
  const mock = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    success: vi.fn(),
    print: vi.fn(),
    scoped: vi.fn(),
  };
  mock.scoped.mockReturnValue(mock);
  return { logger: mock };
});

import {
  createUsageFetcher,
  UsageTracker,
  type UsageFetcher,
  type UsageReading,
} from "../../src/server/services/usageTracker.js";
import { fakeFetch, jsonResponse } from "../helpers/fakes.js";

const T0 = 1_800_000_000_000;
const RESETS_AT = T0 + 3_600_000;

function reading(windowUsed: number, overrides: Partial<UsageReading> = {}): UsageReading {
  return { windowLimit: 100, windowUsed, resetsAt: RESETS_AT, isUnlimited: false, ...overrides };
}

function setup(fetchUsage: UsageFetcher) {
  const clock = { now: T0 };
  const tracker = new UsageTracker({
    fetchUsage,
    stalenessMs: 60_000,
    chatThreshold: 0.95,
    backgroundThreshold: 0.8,
    now: () => clock.now,
  });
  return { tracker, clock };
}

describe("UsageTracker", () => {
  it("should serve the cached snapshot within the staleness window", async () => {
    const fetchUsage = vi.fn<UsageFetcher>().mockResolvedValue(reading(10));
    const { tracker, clock } = setup(fetchUsage);

    await tracker.snapshot();
    clock.now = T0 + 59_999;
    await tracker.snapshot();
    expect(fetchUsage).toHaveBeenCalledTimes(1);

    clock.now = T0 + 60_000;
    await tracker.snapshot();
    expect(fetchUsage).toHaveBeenCalledTimes(2);
  });

  describe("refreshInBackground", () => {
    const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

    it("should query a missing snapshot without waiting", async () => {
      const fetchUsage = vi.fn<UsageFetcher>().mockResolvedValue(reading(97));
      const { tracker } = setup(fetchUsage);

      tracker.refreshInBackground();
      expect(fetchUsage).toHaveBeenCalledTimes(1);
      await flush();

      expect(tracker.peek()?.windowUsed).toBe(97);
      expect(tracker.shouldThrottle("chat")).toBe(true);
      tracker.refreshInBackground();
      expect(fetchUsage).toHaveBeenCalledTimes(1);
    });

    it("should try a failing query at most once per staleness window", async () => {
      const fetchUsage = vi.fn<UsageFetcher>().mockRejectedValue(new Error("offline"));
      const { tracker, clock } = setup(fetchUsage);

      tracker.refreshInBackground();
      await flush();
      clock.now = T0 + 59_999;
      tracker.refreshInBackground();
      expect(fetchUsage).toHaveBeenCalledTimes(1);

      clock.now = T0 + 60_000;
      tracker.refreshInBackground();
      await flush();
      expect(fetchUsage).toHaveBeenCalledTimes(2);
      expect(tracker.peek()).toBeUndefined();
    });
  });

  it("should share one query between concurrent callers", async () => {
    const fetchUsage = vi.fn<UsageFetcher>().mockResolvedValue(reading(10));
    const { tracker } = setup(fetchUsage);

    await Promise.all([tracker.snapshot(), tracker.snapshot(), tracker.snapshot()]);

    expect(fetchUsage).toHaveBeenCalledTimes(1);
  });

  it("should serve the last snapshot marked stale when a query fails", async () => {
    const fetchUsage = vi
      .fn<UsageFetcher>()
      .mockResolvedValueOnce(reading(10))
      .mockRejectedValueOnce(new Error("network down"));
    const { tracker, clock } = setup(fetchUsage);

    await tracker.snapshot();
    clock.now = T0 + 120_000;
    const snapshot = await tracker.snapshot();

    expect(snapshot).toEqual({ ...reading(10), fetchedAt: T0, stale: true });
  });

  it("should fail with usage_unavailable when nothing was ever fetched", async () => {
    const { tracker } = setup(vi.fn<UsageFetcher>().mockRejectedValue(new Error("network down")));

    await expect(tracker.snapshot()).rejects.toMatchObject({
      code: "usage_unavailable",
      message: "Usage information unavailable: network down",
    });
  });

  it("should not let used count go backwards within a window", async () => {
    const fetchUsage = vi
      .fn<UsageFetcher>()
      .mockResolvedValueOnce(reading(50))
      .mockResolvedValueOnce(reading(40))
      .mockResolvedValueOnce(reading(3, { resetsAt: RESETS_AT + 3_600_000 }));
    const { tracker, clock } = setup(fetchUsage);

    await tracker.snapshot();
    clock.now = T0 + 60_000;
    expect((await tracker.snapshot()).windowUsed).toBe(50);

    // past the reset the new window starts over
    clock.now = RESETS_AT;
    expect((await tracker.snapshot()).windowUsed).toBe(3);
  });

  it("should count recorded requests until the next query", async () => {
    const { tracker } = setup(vi.fn<UsageFetcher>().mockResolvedValue(reading(10)));
    tracker.recordRequest();
    expect(tracker.peek()).toBeUndefined();

    await tracker.snapshot();
    tracker.recordRequest();
    tracker.recordRequest();

    expect(tracker.peek()?.windowUsed).toBe(12);
  });

  describe("shouldThrottle", () => {
    it("should not throttle without a snapshot", () => {
      const { tracker } = setup(vi.fn<UsageFetcher>());

      expect(tracker.shouldThrottle("chat")).toBe(false);
    });

    it("should apply the per-kind threshold", async () => {
      const { tracker } = setup(vi.fn<UsageFetcher>().mockResolvedValue(reading(90)));
      await tracker.snapshot();

      expect(tracker.shouldThrottle("chat")).toBe(false);
      expect(tracker.shouldThrottle("background")).toBe(true);
    });

    it("should not throttle an unlimited account or an elapsed window", async () => {
      const unlimited = setup(vi.fn<UsageFetcher>().mockResolvedValue(reading(100, { isUnlimited: true })));
      await unlimited.tracker.snapshot();
      expect(unlimited.tracker.shouldThrottle("chat")).toBe(false);

      const exhausted = setup(vi.fn<UsageFetcher>().mockResolvedValue(reading(100)));
      await exhausted.tracker.snapshot();
      expect(exhausted.tracker.shouldThrottle("chat")).toBe(true);
      exhausted.clock.now = RESETS_AT;
      expect(exhausted.tracker.shouldThrottle("chat")).toBe(false);
    });
  });
});

describe("createUsageFetcher", () => {
  const upstream = {
    graphqlUrl: "https://upstream.test/graphql",
    clientVersion: "v-test",
    osCategory: "Linux",
    osName: "Linux",
    osVersion: "6.0",
  };
  const credentials = {
    acquire: async () => ({ accessToken: "access-1", refreshToken: "refresh-1", expiresAt: T0 + 3_600_000 }),
  };

  it("should query request limit info with the access token", async () => {
    const { fetchImpl, calls } = fakeFetch(() =>
      jsonResponse({
        data: {
          user: {
            __typename: "UserOutput",
            user: {
              requestLimitInfo: {
                isUnlimited: false,
                nextRefreshTime: "2027-01-15T10:00:00Z",
                requestLimit: 150,
                requestsUsedSinceLastRefresh: 42,
              },
            },
          },
        },
      })
    );

    const result = await createUsageFetcher(upstream, credentials, fetchImpl)();

    expect(result).toEqual({
      windowLimit: 150,
      windowUsed: 42,
      resetsAt: Date.UTC(2027, 0, 15, 10, 0, 0),
      isUnlimited: false,
    });
    expect(calls[0]?.url).toBe("https://upstream.test/graphql?op=GetRequestLimitInfo");
    expect(calls[0]?.init?.headers).toMatchObject({ Authorization: "Bearer access-1" });
  });

  it("should surface GraphQL errors as usage_unavailable", async () => {
    const { fetchImpl } = fakeFetch(() => jsonResponse({ errors: [{ message: "Unauthorized" }] }));

    await expect(createUsageFetcher(upstream, credentials, fetchImpl)()).rejects.toMatchObject({
      code: "usage_unavailable",
      message: "GetRequestLimitInfo failed: Unauthorized",
    });
  });
});

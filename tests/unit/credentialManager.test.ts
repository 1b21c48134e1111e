import { describe, it, expect, vi, beforeEach } from "vitest";

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

import { CredentialManager, type CredentialSource } from "../../src/server/services/credentialManager.js";
import { CredentialStore } from "../../src/server/services/credentialStore.js";
import { BridgeError } from "../../src/shared/errors.js";
import { logger } from "../../src/shared/logger.js";
import type { Credential } from "../../src/shared/types.js";
import { deferred } from "../helpers/fakes.js";

const NOW = 1_800_000_000_000;

function credential(name: string, expiresInMs: number, refreshToken = `refresh-${name}`): Credential {
  return { accessToken: `access-${name}`, refreshToken, expiresAt: NOW + expiresInMs };
}

function setup(options: { initial?: Credential; refreshBufferMs?: number; backgroundRefreshBufferMs?: number } = {}) {
  const store = new CredentialStore({ persist: false });
  if (options.initial) store.replace(options.initial);

  const acquirer = {
    acquire: vi.fn<CredentialSource["acquire"]>(),
    refresh: vi.fn<CredentialSource["refresh"]>(),
  };
  const manager = new CredentialManager({
    acquirer,
    store,
    refreshBufferMs: options.refreshBufferMs ?? 120_000,
    backgroundRefreshBufferMs: options.backgroundRefreshBufferMs,
    now: () => NOW,
  });
  return { store, acquirer, manager };
}

describe("CredentialManager", () => {
  beforeEach(() => {
    vi.mocked(logger.info).mockClear();
  });

  it("should share one acquisition between concurrent callers", async () => {
    const { acquirer, manager } = setup();
    const pending = deferred<Credential>();
    acquirer.acquire.mockReturnValueOnce(pending.promise);

    const callers = Array.from({ length: 10 }, () => manager.acquire());
    pending.resolve(credential("a", 3_600_000));
    const results = await Promise.all(callers);

    expect(acquirer.acquire).toHaveBeenCalledTimes(1);
    expect(new Set(results.map((c) => c.accessToken))).toEqual(new Set(["access-a"]));
  });

  it("should share one failed acquisition between concurrent callers", async () => {
    const { acquirer, manager } = setup();
    const pending = deferred<Credential>();
    acquirer.acquire.mockReturnValueOnce(pending.promise);

    const callers = Array.from({ length: 10 }, () => manager.acquire());
    pending.reject(new BridgeError("acquire_failed", "Anonymous sign-up failed"));
    const results = await Promise.allSettled(callers);

    expect(acquirer.acquire).toHaveBeenCalledTimes(1);
    expect(results.map((r) => r.status)).toEqual(Array.from({ length: 10 }, () => "rejected"));
    expect(results[0]).toMatchObject({
      reason: { code: "credential_unavailable", details: { phase: "acquire_failed" } },
    });
    expect(new Set(results.map((r) => (r.status === "rejected" ? r.reason : undefined))).size).toBe(1);
  });

  it("should try again after a failed acquisition has settled", async () => {
    const { acquirer, manager } = setup();
    acquirer.acquire
      .mockRejectedValueOnce(new BridgeError("acquire_failed", "Anonymous sign-up failed"))
      .mockResolvedValueOnce(credential("b", 3_600_000));

    await expect(manager.acquire()).rejects.toMatchObject({ code: "credential_unavailable" });
    const result = await manager.acquire();

    expect(result.accessToken).toBe("access-b");
    expect(acquirer.acquire).toHaveBeenCalledTimes(2);
  });

  it("should share one failed invalidation between callers of the same token", async () => {
    const { acquirer, manager } = setup({ initial: credential("old", 3_600_000) });
    acquirer.acquire.mockRejectedValueOnce(new BridgeError("acquire_failed", "Anonymous sign-up failed"));

    const results = await Promise.allSettled([manager.invalidate("access-old"), manager.invalidate("access-old")]);

    expect(acquirer.acquire).toHaveBeenCalledTimes(1);
    expect(results.map((r) => r.status)).toEqual(["rejected", "rejected"]);
  });

  it("should refresh a credential inside the refresh buffer", async () => {
    const { acquirer, manager, store } = setup({ initial: credential("old", 90_000, "refresh-keep") });
    acquirer.refresh.mockResolvedValueOnce(credential("new", 3_600_000, "refresh-keep"));

    const result = await manager.acquire();

    expect(acquirer.refresh).toHaveBeenCalledWith("refresh-keep");
    expect(result.accessToken).toBe("access-new");
    expect(store.get()?.accessToken).toBe("access-new");
    expect(logger.info).not.toHaveBeenCalledWith("Refresh token rotated");
  });

  it("should reuse a credential outside the refresh buffer", async () => {
    const { acquirer, manager } = setup({ initial: credential("old", 90_000), refreshBufferMs: 30_000 });

    const result = await manager.acquire();

    expect(result.accessToken).toBe("access-old");
    expect(acquirer.refresh).not.toHaveBeenCalled();
    expect(acquirer.acquire).not.toHaveBeenCalled();
  });

  it("should keep a rotated refresh token", async () => {
    const { acquirer, manager, store } = setup({ initial: credential("old", 1_000) });
    acquirer.refresh.mockResolvedValueOnce(credential("new", 3_600_000, "refresh-rotated"));

    await manager.acquire();

    expect(store.get()?.refreshToken).toBe("refresh-rotated");
    expect(logger.info).toHaveBeenCalledWith("Refresh token rotated");
  });

  it("should fall back to full acquisition when refresh fails", async () => {
    const { acquirer, manager } = setup({ initial: credential("old", 1_000) });
    acquirer.refresh.mockRejectedValueOnce(new BridgeError("grant_failed", "Refresh token revoked or expired"));
    acquirer.acquire.mockResolvedValueOnce(credential("fresh", 3_600_000));

    const result = await manager.acquire();

    expect(result.accessToken).toBe("access-fresh");
    expect(acquirer.acquire).toHaveBeenCalledTimes(1);
  });

  it("should collapse concurrent invalidations of the same token", async () => {
    const { acquirer, manager } = setup({ initial: credential("old", 3_600_000) });
    acquirer.acquire.mockResolvedValueOnce(credential("fresh", 3_600_000));

    const [first, second] = await Promise.all([
      manager.invalidate("access-old"),
      manager.invalidate("access-old"),
    ]);

    expect(acquirer.acquire).toHaveBeenCalledTimes(1);
    expect(first.accessToken).toBe("access-fresh");
    expect(second.accessToken).toBe("access-fresh");
  });

  it("should report acquisition failure as credential_unavailable", async () => {
    const { acquirer, manager } = setup();
    acquirer.acquire.mockRejectedValueOnce(
      new BridgeError("grant_failed", "Token grant rate limited", { retryAfterMs: 7000 })
    );

    await expect(manager.acquire()).rejects.toMatchObject({
      code: "credential_unavailable",
      message: "No upstream credential available: Token grant rate limited",
      details: { phase: "grant_failed" },
      retryAfterMs: 7000,
    });
  });

  it("should report status", () => {
    expect(setup().manager.status()).toEqual({ present: false });
    expect(setup({ initial: credential("a", 5_000) }).manager.status()).toEqual({
      present: true,
      expiresAt: NOW + 5_000,
      expiresInMs: 5_000,
    });
  });

  describe("refreshInBackground", () => {
    it("should refresh with the larger background buffer", async () => {
      const { acquirer, manager } = setup({
        initial: credential("old", 300_000),
        backgroundRefreshBufferMs: 600_000,
      });
      acquirer.refresh.mockResolvedValueOnce(credential("new", 3_600_000));

      await manager.refreshInBackground();

      expect(acquirer.refresh).toHaveBeenCalledWith("refresh-old");
    });

    it("should do nothing without a credential", async () => {
      const { acquirer, manager } = setup({ backgroundRefreshBufferMs: 600_000 });

      await manager.refreshInBackground();

      expect(acquirer.refresh).not.toHaveBeenCalled();
      expect(acquirer.acquire).not.toHaveBeenCalled();
    });
  });
});

/**
 * Credential Lifecycle Manager
 *
 * 所有 check-then-mutate 都在同一个 Mutex 下执行：
 * 同一时刻最多一个获取/刷新在进行，并发调用方共享其结果（成功或失败）
 */

import { BridgeError, isBridgeError } from "../../shared/errors.js";
import { logger } from "../../shared/logger.js";
import type { Credential } from "../../shared/types.js";
import { errorMessage } from "../../shared/utils.js";
import { Mutex } from "../utils/mutex.js";

const log = logger.scoped("credentials");

export interface CredentialSource {
  acquire(): Promise<Credential>;
  refresh(refreshToken: string): Promise<Credential>;
}

export interface CredentialHolder {
  get(): Credential | undefined;
  replace(credential: Credential): void;
  clear(): void;
}

export interface CredentialManagerOptions {
  acquirer: CredentialSource;
  store: CredentialHolder;
  refreshBufferMs: number;
  backgroundRefreshBufferMs?: number;
  backgroundRefreshIntervalMs?: number;
  now?: () => number;
}

export interface CredentialStatus {
  present: boolean;
  expiresAt?: number;
  expiresInMs?: number;
}

export class CredentialManager {
  private readonly mutex = new Mutex();
  private readonly now: () => number;
  private inflight: Promise<Credential> | undefined;
  private invalidation: { staleAccessToken: string; result: Promise<Credential> } | undefined;
  private backgroundTimer: NodeJS.Timeout | undefined;

  constructor(private readonly options: CredentialManagerOptions) {
    this.now = options.now ?? Date.now;
  }

  /**
   * A credential valid for at least the refresh buffer
   */
  async acquire(): Promise<Credential> {
    const current = this.options.store.get();
    if (current && this.isFresh(current, this.options.refreshBufferMs)) {
      return current;
    }
    return this.shared(() => this.ensureFresh(this.options.refreshBufferMs));
  }

  /**
   * Replace a credential the upstream rejected; concurrent calls for the same token share one acquisition
   */
  async invalidate(staleAccessToken: string): Promise<Credential> {
    if (this.invalidation?.staleAccessToken === staleAccessToken) {
      return this.invalidation.result;
    }

    const result = this.mutex.runExclusive(async () => {
      const current = this.options.store.get();
      if (current && current.accessToken !== staleAccessToken) {
        return current;
      }

      log.warn("Upstream rejected the current credential, acquiring a new one");
      this.options.store.clear();
      return this.acquireFresh(undefined);
    });
    const entry = { staleAccessToken, result };
    this.invalidation = entry;
    try {
      return await result;
    } finally {
      if (this.invalidation === entry) this.invalidation = undefined;
    }
  }

  status(): CredentialStatus {
    const current = this.options.store.get();
    if (!current) return { present: false };
    return {
      present: true,
      expiresAt: current.expiresAt,
      expiresInMs: current.expiresAt - this.now(),
    };
  }

  // ============================================
  // Background refresh
  // ============================================

  startBackgroundRefresh(): void {
    if (this.backgroundTimer) return;
    const interval = this.options.backgroundRefreshIntervalMs ?? 60_000;

    this.backgroundTimer = setInterval(() => {
      this.refreshInBackground().catch((error: unknown) => {
        log.warn(`Background refresh failed: ${errorMessage(error)}`);
      });
    }, interval);
    this.backgroundTimer.unref();
    log.debug(`Background refresh every ${interval}ms`);
  }

  stopBackgroundRefresh(): void {
    if (!this.backgroundTimer) return;
    clearInterval(this.backgroundTimer);
    this.backgroundTimer = undefined;
  }

  /**
   * Refresh ahead of time using the larger background buffer; no-op without a credential
   */
  async refreshInBackground(): Promise<void> {
    const buffer = this.options.backgroundRefreshBufferMs ?? this.options.refreshBufferMs;
    const current = this.options.store.get();
    if (!current || this.isFresh(current, buffer)) return;

    await this.shared(() => this.ensureFresh(buffer));
  }

  // ============================================
  // Internals
  // ============================================

  /**
   * Callers arriving while a task is in flight settle with that task, rejection included
   */
  private shared(task: () => Promise<Credential>): Promise<Credential> {
    if (this.inflight) return this.inflight;

    const run = this.mutex.runExclusive(task).finally(() => {
      if (this.inflight === run) this.inflight = undefined;
    });
    this.inflight = run;
    return run;
  }

  private isFresh(credential: Credential, bufferMs: number): boolean {
    return credential.expiresAt - this.now() > bufferMs;
  }

  private async ensureFresh(bufferMs: number): Promise<Credential> {
    const current = this.options.store.get();
    if (current && this.isFresh(current, bufferMs)) {
      return current;
    }

    if (current) {
      try {
        const refreshed = await this.options.acquirer.refresh(current.refreshToken);
        this.install(refreshed, current);
        log.debug("Credential refreshed");
        return refreshed;
      } catch (error) {
        log.warn(`Credential refresh failed, falling back to full acquisition: ${errorMessage(error)}`);
      }
    }

    return this.acquireFresh(current);
  }

  private async acquireFresh(previous: Credential | undefined): Promise<Credential> {
    let fresh: Credential;
    try {
      fresh = await this.options.acquirer.acquire();
    } catch (error) {
      throw new BridgeError("credential_unavailable", `No upstream credential available: ${errorMessage(error)}`, {
        cause: error,
        details: isBridgeError(error) ? { phase: error.code } : undefined,
        retryAfterMs: isBridgeError(error) ? error.retryAfterMs : undefined,
      });
    }
    this.install(fresh, previous);
    return fresh;
  }

  private install(next: Credential, previous: Credential | undefined): void {
    if (previous && next.refreshToken !== previous.refreshToken) {
      log.info("Refresh token rotated");
    }
    this.options.store.replace(next);
  }
}

import { hashText } from "../../shared/utils.js";
import { logger } from "../../shared/logger.js";
import type { SessionState } from "../translator/types.js";
import type { SessionUpdate } from "../stream/types.js";
import { KeyedMutex } from "../utils/mutex.js";

const DEFAULT_TTL_MS = 60 * 60 * 1000;

interface SessionEntry {
  state: SessionState;
  touchedAt: number;
}

export interface SessionLease {
  key: string;
  state: SessionState;
  release(): void;
}

export interface SessionStoreOptions {
  /** Idle sessions older than this are dropped */
  ttlMs?: number;
  now?: () => number;
}

/**
 * Upstream session state per logical conversation.
 * All reads and writes of one session happen under that session's lock.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly locks = new KeyedMutex();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private cleanupTimer: NodeJS.Timeout | undefined;

  constructor(options: SessionStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Exclusive access to the session until `release()` is called
   */
  async lease(key: string): Promise<SessionLease> {
    const unlock = await this.locks.acquire(key);
    let entry = this.sessions.get(key);
    if (!entry) {
      entry = { state: { toolNames: {} }, touchedAt: this.now() };
      this.sessions.set(key, entry);
    }
    const held = entry;

    return {
      key,
      state: held.state,
      release: () => {
        held.touchedAt = this.now();
        unlock();
      },
    };
  }

  /**
   * Run `fn` with exclusive access to the session; changes made to the state are kept
   */
  async withSession<T>(key: string, fn: (state: SessionState) => Promise<T>): Promise<T> {
    const lease = await this.lease(key);
    try {
      return await fn(lease.state);
    } finally {
      lease.release();
    }
  }

  get(key: string): SessionState | undefined {
    const entry = this.sessions.get(key);
    return entry ? { ...entry.state, toolNames: { ...entry.state.toolNames } } : undefined;
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Drop sessions idle for longer than the TTL; leased sessions are kept
   */
  prune(): number {
    const cutoff = this.now() - this.ttlMs;
    let removed = 0;
    for (const [key, entry] of this.sessions) {
      if (entry.touchedAt < cutoff && !this.locks.isHeld(key)) {
        this.sessions.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      logger.debug(`Pruned ${removed} idle session(s)`);
    }
    return removed;
  }

  startCleanup(intervalMs: number = 5 * 60 * 1000): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => this.prune(), intervalMs);
    this.cleanupTimer.unref();
  }

  stopCleanup(): void {
    if (!this.cleanupTimer) return;
    clearInterval(this.cleanupTimer);
    this.cleanupTimer = undefined;
  }
}

export function applySessionUpdate(state: SessionState, update: SessionUpdate): void {
  if (update.conversationId) state.conversationId = update.conversationId;
  if (update.taskId) state.priorTaskId = update.taskId;
  if (update.toolNames) Object.assign(state.toolNames, update.toolNames);
}

/**
 * Session key from an explicit id, or from the conversation's first user message
 */
export function deriveSessionKey(explicitId: string | undefined, firstUserText: string | undefined): string {
  if (explicitId && explicitId.trim() !== "") {
    return `id:${explicitId.trim()}`;
  }
  return `conv:${hashText(firstUserText ?? "")}`;
}

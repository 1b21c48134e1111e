import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { CREDENTIALS_FILE } from "../../shared/constants.js";
import { logger } from "../../shared/logger.js";
import { errorMessage } from "../../shared/utils.js";
import type { Credential } from "../../shared/types.js";
import { readTokenLifetime } from "../translator/utils/jwt.js";

const credentialFileSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1),
  expiresAt: z.number().optional(),
  issuedAt: z.number().optional(),
});

export interface CredentialStoreOptions {
  /** Durable cache location; omitted or `persist: false` keeps the credential in memory only */
  filePath?: string;
  persist?: boolean;
  now?: () => number;
}

/**
 * Holds the current upstream credential, optionally cached on disk
 */
export class CredentialStore {
  private current: Credential | undefined;
  private loaded = false;
  private readonly filePath: string | undefined;
  private readonly now: () => number;

  constructor(options: CredentialStoreOptions = {}) {
    this.filePath = options.persist === false ? undefined : options.filePath ?? CREDENTIALS_FILE;
    this.now = options.now ?? Date.now;
  }

  get(): Credential | undefined {
    this.load();
    return this.current;
  }

  replace(credential: Credential): void {
    this.loaded = true;
    this.current = credential;
    this.save();
  }

  clear(): void {
    this.loaded = true;
    this.current = undefined;
    if (this.filePath && existsSync(this.filePath)) {
      rmSync(this.filePath, { force: true });
    }
  }

  private load(): void {
    if (this.loaded) return;
    this.loaded = true;

    if (!this.filePath || !existsSync(this.filePath)) {
      return;
    }

    let data: unknown;
    try {
      data = JSON.parse(readFileSync(this.filePath, "utf-8"));
    } catch (error) {
      logger.warn(`Ignoring unreadable credential cache: ${errorMessage(error)}`);
      return;
    }

    const parsed = credentialFileSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn("Ignoring malformed credential cache");
      return;
    }

    // 过期时间只取自 access token 自身的 exp claim
    const lifetime = readTokenLifetime(parsed.data.accessToken);
    if (!lifetime) {
      logger.warn("Ignoring cached credential without a readable expiry claim");
      return;
    }
    if (lifetime.expiresAt <= this.now()) {
      logger.debug("Cached credential has expired, ignoring it");
      return;
    }

    this.current = {
      accessToken: parsed.data.accessToken,
      refreshToken: parsed.data.refreshToken,
      expiresAt: lifetime.expiresAt,
      ...(lifetime.issuedAt !== undefined && { issuedAt: lifetime.issuedAt }),
    };
    logger.debug(`Loaded cached credential (expires ${new Date(lifetime.expiresAt).toISOString()})`);
  }

  private save(): void {
    if (!this.filePath || !this.current) return;

    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(this.filePath, JSON.stringify(this.current, null, 2), { encoding: "utf-8", mode: 0o600 });
    } catch (error) {
      logger.warn(`Failed to persist credential: ${errorMessage(error)}`);
    }
  }
}

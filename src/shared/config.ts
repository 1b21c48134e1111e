import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { z } from "zod";
import {
  CONFIG_DIR,
  CONFIG_FILE,
  DEFAULT_CREDENTIALS_CONFIG,
  DEFAULT_MODEL_SELECTION,
  DEFAULT_SERVER_CONFIG,
  DEFAULT_STREAM_CONFIG,
  DEFAULT_UPSTREAM_CONFIG,
  DEFAULT_USAGE_CONFIG,
} from "./constants.js";
import type { AppConfig } from "./types.js";
import { logger } from "./logger.js";
import { isRecord } from "./utils.js";

const configFileSchema = z.object({
  server: z
    .object({
      host: z.string(),
      port: z.number().int().min(1).max(65535),
      apiKey: z.string().optional(),
    })
    .partial()
    .optional(),
  upstream: z
    .object({
      codecUrl: z.string().url(),
      streamPath: z.string(),
      messageType: z.string(),
      graphqlUrl: z.string().url(),
      clientVersion: z.string(),
      osCategory: z.string(),
      osName: z.string(),
      osVersion: z.string(),
    })
    .partial()
    .optional(),
  credentials: z
    .object({
      identityUrl: z.string().url(),
      tokenUrl: z.string().url(),
      identityApiKey: z.string(),
      refreshBufferMs: z.number().nonnegative(),
      backgroundRefreshBufferMs: z.number().nonnegative(),
      backgroundRefreshIntervalMs: z.number().positive(),
      persist: z.boolean(),
      maxAttempts: z.number().int().min(1),
      backoffBaseMs: z.number().nonnegative(),
      backoffMaxMs: z.number().nonnegative(),
    })
    .partial()
    .optional(),
  usage: z
    .object({
      stalenessMs: z.number().nonnegative(),
      chatThreshold: z.number().min(0).max(1),
      backgroundThreshold: z.number().min(0).max(1),
      enforce: z.boolean(),
    })
    .partial()
    .optional(),
  stream: z
    .object({
      idleTimeoutMs: z.number().positive(),
      deadlineMs: z.number().positive(),
    })
    .partial()
    .optional(),
  models: z
    .object({
      base: z.string(),
      planning: z.string(),
      coding: z.string(),
    })
    .partial()
    .optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

export function ensureConfigDir(): void {
  if (!existsSync(CONFIG_DIR)) {
    mkdirSync(CONFIG_DIR, { recursive: true });
  }
}

export function getDefaultConfig(): AppConfig {
  return {
    server: { ...DEFAULT_SERVER_CONFIG },
    upstream: { ...DEFAULT_UPSTREAM_CONFIG },
    credentials: { ...DEFAULT_CREDENTIALS_CONFIG },
    usage: { ...DEFAULT_USAGE_CONFIG },
    stream: { ...DEFAULT_STREAM_CONFIG },
    models: { ...DEFAULT_MODEL_SELECTION },
  };
}

/**
 * Merge a partial config over a complete one, section by section
 */
export function mergeConfig(base: AppConfig, updates: ConfigFile): AppConfig {
  return {
    server: { ...base.server, ...updates.server },
    upstream: { ...base.upstream, ...updates.upstream },
    credentials: { ...base.credentials, ...updates.credentials },
    usage: { ...base.usage, ...updates.usage },
    stream: { ...base.stream, ...updates.stream },
    models: { ...base.models, ...updates.models },
  };
}

export function loadConfig(): AppConfig {
  ensureConfigDir();

  if (!existsSync(CONFIG_FILE)) {
    const defaultConfig = getDefaultConfig();
    saveConfig(defaultConfig);
    return defaultConfig;
  }

  try {
    const content = readFileSync(CONFIG_FILE, "utf-8");
    const parsed = configFileSchema.parse(JSON.parse(content));

    // Merge with defaults to ensure all fields exist
    return mergeConfig(getDefaultConfig(), parsed);
  } catch (error) {
    logger.warn("Failed to load config, using defaults:", error);
    return getDefaultConfig();
  }
}

export function saveConfig(config: AppConfig): void {
  ensureConfigDir();
  writeFileSync(CONFIG_FILE, JSON.stringify(config, null, 2), "utf-8");
}

export function updateConfig(updates: ConfigFile): AppConfig {
  const updated = mergeConfig(loadConfig(), updates);
  saveConfig(updated);
  return updated;
}

/**
 * Parse a `section.field` assignment against the type of its current value.
 * Returns the partial config to merge, or an error message.
 */
export function parseConfigAssignment(
  config: AppConfig,
  key: string,
  value: string
): { ok: true; updates: ConfigFile } | { ok: false; message: string } {
  const parts = key.split(".");
  if (parts.length !== 2) {
    return { ok: false, message: "Invalid key format. Use: section.key (e.g., server.port)" };
  }

  const [section, field] = parts;
  const current: unknown = Object.entries(config).find(([name]) => name === section)?.[1];
  if (!isRecord(current)) {
    return { ok: false, message: `Unknown section: ${section}` };
  }

  // apiKey is the only optional field and starts out unset
  const existing = field === "apiKey" && section === "server" ? "" : current[field];
  let parsedValue: unknown;

  if (typeof existing === "number") {
    parsedValue = Number(value);
    if (!Number.isFinite(parsedValue)) {
      return { ok: false, message: `${key} must be a number` };
    }
  } else if (typeof existing === "boolean") {
    if (value !== "true" && value !== "false") {
      return { ok: false, message: `${key} must be true or false` };
    }
    parsedValue = value === "true";
  } else if (typeof existing === "string") {
    parsedValue = field === "apiKey" && value === "" ? undefined : value;
  } else {
    return { ok: false, message: `Unknown ${section} field: ${field}` };
  }

  const result = configFileSchema.safeParse({ [section]: { [field]: parsedValue } });
  if (!result.success) {
    return { ok: false, message: result.error.issues.map((issue) => issue.message).join("; ") };
  }
  return { ok: true, updates: result.data };
}

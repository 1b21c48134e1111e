import type {
  CredentialsConfig,
  ModelInfo,
  ModelRole,
  ModelSelection,
  ServerConfig,
  StreamConfig,
  UpstreamConfig,
  UsageConfig,
} from "./types.js";
import { homedir } from "node:os";
import { join } from "node:path";

export const VERSION = "0.1.0";

// ============================================
// Config Paths
// ============================================

export const CONFIG_DIR = join(homedir(), ".chat-bridge");
export const CONFIG_FILE = join(CONFIG_DIR, "config.json");
export const CREDENTIALS_FILE = join(CONFIG_DIR, "credentials.json");

// ============================================
// Upstream Protocol
// ============================================

export const UPSTREAM_MESSAGE_TYPE = "warp.multi_agent.v1.Request";

// Quota-exhausted bodies the upstream returns alongside HTTP 429
export const QUOTA_EXHAUSTED_MARKERS = [
  "No remaining quota",
  "No AI requests remaining",
];

// ============================================
// Default Configs
// ============================================

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  host: "127.0.0.1",
  port: 28080,
};

export const DEFAULT_UPSTREAM_CONFIG: UpstreamConfig = {
  codecUrl: "http://127.0.0.1:8000",
  streamPath: "/api/warp/send_stream_sse",
  messageType: UPSTREAM_MESSAGE_TYPE,
  graphqlUrl: "https://app.warp.dev/graphql/v2",
  clientVersion: "v0.2025.08.06.08.12.stable_02",
  osCategory: "Linux",
  osName: "Linux",
  osVersion: "6.0",
};

export const DEFAULT_CREDENTIALS_CONFIG: CredentialsConfig = {
  identityUrl: "https://identitytoolkit.googleapis.com/v1/accounts:signInWithCustomToken",
  tokenUrl: "https://securetoken.googleapis.com/v1/token",
  // Public web API key of the identity provider; set via `config set credentials.identityApiKey`
  identityApiKey: "",
  refreshBufferMs: 2 * 60 * 1000,
  backgroundRefreshBufferMs: 10 * 60 * 1000,
  backgroundRefreshIntervalMs: 60 * 1000,
  persist: true,
  maxAttempts: 3,
  backoffBaseMs: 500,
  backoffMaxMs: 30 * 1000,
};

export const DEFAULT_USAGE_CONFIG: UsageConfig = {
  stalenessMs: 5 * 60 * 1000,
  chatThreshold: 0.95,
  backgroundThreshold: 0.8,
  enforce: false,
};

export const DEFAULT_STREAM_CONFIG: StreamConfig = {
  idleTimeoutMs: 60 * 1000,
  deadlineMs: 10 * 60 * 1000,
};

export const DEFAULT_MODEL_SELECTION: ModelSelection = {
  base: "claude-4.1-opus",
  planning: "o3",
  coding: "auto",
};

// ============================================
// Model Definitions
// ============================================

export const MODELS: ModelInfo[] = [
  { id: "auto", name: "Auto", vendor: "upstream", roles: ["base", "planning", "coding"] },
  { id: "claude-4-sonnet", name: "Claude 4 Sonnet", vendor: "anthropic", roles: ["base", "coding"], vision: true },
  { id: "claude-4-opus", name: "Claude 4 Opus", vendor: "anthropic", roles: ["base", "coding"], vision: true },
  { id: "claude-4.1-opus", name: "Claude 4.1 Opus", vendor: "anthropic", roles: ["base", "planning", "coding"], vision: true },
  { id: "gpt-4o", name: "GPT-4o", vendor: "openai", roles: ["base", "coding"], vision: true },
  { id: "gpt-4.1", name: "GPT-4.1", vendor: "openai", roles: ["base", "planning", "coding"], vision: true },
  { id: "gpt-5", name: "GPT-5", vendor: "openai", roles: ["base", "planning", "coding"], vision: true },
  { id: "o3", name: "o3", vendor: "openai", roles: ["base", "planning"] },
  { id: "o4-mini", name: "o4-mini", vendor: "openai", roles: ["base", "planning", "coding"] },
  { id: "gemini-2.5-pro", name: "Gemini 2.5 Pro", vendor: "google", roles: ["base", "coding"], vision: true },
];

// Model ID mappings for OpenAI compatibility
export const MODEL_ALIASES: Record<string, string> = {
  "claude-sonnet-4": "claude-4-sonnet",
  "claude-opus-4": "claude-4-opus",
  "claude-opus-4-1": "claude-4.1-opus",
  "claude-opus-4.1": "claude-4.1-opus",
  "warp-default": "auto",
};

export function resolveModelId(modelId: string): string {
  return MODEL_ALIASES[modelId] ?? modelId;
}

export function getModelInfo(modelId: string): ModelInfo | undefined {
  const resolved = resolveModelId(modelId);
  return MODELS.find((m) => m.id === resolved);
}

/**
 * Check whether a model may fill the given slot of the model selection
 */
export function supportsRole(modelId: string, role: ModelRole): boolean {
  return getModelInfo(modelId)?.roles.includes(role) ?? false;
}

// ============================================
// Config Types
// ============================================

export interface ServerConfig {
  host: string;
  port: number;
  apiKey?: string;
}

export interface UpstreamConfig {
  /** Base URL of the structured-message codec service */
  codecUrl: string;
  /** Path of the SSE streaming endpoint on the codec service */
  streamPath: string;
  /** Fully-qualified message type the codec encodes the request as */
  messageType: string;
  /** GraphQL endpoint used for anonymous sign-up and usage queries */
  graphqlUrl: string;
  clientVersion: string;
  osCategory: string;
  osName: string;
  osVersion: string;
}

export interface CredentialsConfig {
  identityUrl: string;
  tokenUrl: string;
  identityApiKey: string;
  refreshBufferMs: number;
  backgroundRefreshBufferMs: number;
  backgroundRefreshIntervalMs: number;
  persist: boolean;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export interface UsageConfig {
  stalenessMs: number;
  chatThreshold: number;
  backgroundThreshold: number;
  enforce: boolean;
}

export interface StreamConfig {
  idleTimeoutMs: number;
  deadlineMs: number;
}

export interface ModelSelection {
  base: string;
  planning: string;
  coding: string;
}

export interface AppConfig {
  server: ServerConfig;
  upstream: UpstreamConfig;
  credentials: CredentialsConfig;
  usage: UsageConfig;
  stream: StreamConfig;
  models: ModelSelection;
}

// ============================================
// Model Types
// ============================================

export type ModelRole = keyof ModelSelection;

export interface ModelInfo {
  id: string;
  name: string;
  vendor: string;
  roles: ModelRole[];
  vision?: boolean;
}

// ============================================
// OpenAI Response Types
// ============================================

export type OpenAIFinishReason = "stop" | "length" | "tool_calls";

export interface OpenAIToolCall {
  id: string;
  type: "function";
  function: {
    name: string;
    arguments: string;
  };
}

export interface OpenAIToolCallDelta {
  index: number;
  id?: string;
  type?: "function";
  function?: {
    name?: string;
    arguments?: string;
  };
}

export interface OpenAIChatResponse {
  id: string;
  object: "chat.completion";
  created: number;
  model: string;
  choices: Array<{
    index: number;
    message: {
      role: "assistant";
      content: string | null;
      tool_calls?: OpenAIToolCall[];
    };
    finish_reason: OpenAIFinishReason;
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

export interface OpenAIChatChunk {
  id: string;
  object: "chat.completion.chunk";
  created: number;
  model: string;
  choices: Array<{
    index: number;
    delta: {
      role?: "assistant";
      content?: string;
      tool_calls?: OpenAIToolCallDelta[];
    };
    finish_reason: OpenAIFinishReason | "error" | null;
  }>;
  error?: {
    message: string;
    type: string;
    code: string;
  };
}

export interface OpenAIErrorBody {
  error: {
    message: string;
    type: string;
    code: string;
  };
}

// ============================================
// Credential Types
// ============================================

export interface Credential {
  accessToken: string;
  refreshToken: string;
  /** Epoch ms, from the access token's `exp` claim */
  expiresAt: number;
  issuedAt?: number;
}

// ============================================
// Usage Types
// ============================================

export type ThrottleKind = "chat" | "background";

export interface UsageSnapshot {
  windowLimit: number;
  windowUsed: number;
  /** Epoch ms */
  resetsAt: number;
  isUnlimited: boolean;
  fetchedAt: number;
  stale: boolean;
}

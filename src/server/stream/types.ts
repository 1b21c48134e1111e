import type { BridgeError } from "../../shared/errors.js";
import type { OpenAIFinishReason, OpenAIToolCall } from "../../shared/types.js";

// ============================================
// Stream Events (decoded upstream emissions)
// ============================================

export type UpstreamFinishReason = "content_complete" | "tool_invocation_requested" | "length_limited";

export interface Citation {
  url: string;
  title?: string;
}

export type StreamEvent =
  | { type: "text_delta"; text: string }
  | { type: "tool_call_delta"; id: string; name?: string; argumentsDelta: string }
  | { type: "citation"; citation: Citation }
  | { type: "finish"; reason: UpstreamFinishReason }
  | { type: "error"; message: string; code?: string };

/**
 * Session metadata reported alongside events
 */
export interface SessionUpdate {
  conversationId?: string;
  taskId?: string;
  /** tool_call_id -> tool name */
  toolNames?: Record<string, string>;
}

export interface DecodedEvent {
  events: StreamEvent[];
  session?: SessionUpdate;
}

// ============================================
// Output Chunks
// ============================================

/**
 * 每个 chunk 只携带一种内容
 */
export type OutputChunk =
  | { kind: "role" }
  | { kind: "text"; text: string }
  | { kind: "tool_call"; index: number; id?: string; name?: string; argumentsDelta: string }
  | { kind: "finish"; reason: OpenAIFinishReason }
  | { kind: "error"; error: BridgeError };

export type StreamState = "idle" | "streaming" | "tool_calling" | "finished" | "errored";

export interface AggregateResponse {
  content: string;
  toolCalls: OpenAIToolCall[];
  finishReason: OpenAIFinishReason;
  citations: Citation[];
}

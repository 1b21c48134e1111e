/**
 * Translator Types
 *
 * 转换架构：OpenAI Chat → ConversationTurn[] → NormalizedConversation → OutboundRequest
 *                    OpenAI Chat ← OutputChunk ← StreamEvent ← 上游事件流
 */

import type { ModelSelection } from "../../shared/types.js";
import type { SanitizedTool } from "./utils/schemaSanitizer.js";

// ============================================
// Conversation Types
// ============================================

export type TurnRole = "system" | "user" | "assistant" | "tool";

export interface TextPart {
  type: "text";
  text: string;
}

export interface ImagePart {
  type: "image";
  url: string;
  /** 仅 data URL 时存在 */
  mimeType?: string;
  data?: string;
}

export interface ToolCallPart {
  type: "tool_call";
  id: string;
  name: string;
  /** JSON 字符串，保持客户端原样 */
  arguments: string;
}

export interface ToolResultPart {
  type: "tool_result";
  toolCallId: string;
  name?: string;
  content: string;
}

export type ContentPart = TextPart | ImagePart | ToolCallPart | ToolResultPart;

export interface ConversationTurn {
  role: TurnRole;
  parts: ContentPart[];
}

/**
 * 规范化后的轮次：只有 user / assistant，严格交替，首轮为 user。
 * tool 结果挂在发起该调用的 assistant 轮次上。
 */
export interface NormalizedTurn {
  role: "user" | "assistant";
  parts: ContentPart[];
  toolResults: ToolResultPart[];
}

export interface NormalizedConversation {
  systemText?: string;
  turns: NormalizedTurn[];
}

// ============================================
// Session Types
// ============================================

/**
 * 单个逻辑会话的上游状态
 */
export interface SessionState {
  conversationId?: string;
  priorTaskId?: string;
  /** tool_call_id -> tool name */
  toolNames: Record<string, string>;
}

// ============================================
// Outbound Request Types
// ============================================

export interface UpstreamToolCallResult {
  tool_call_id: string;
  call_mcp_tool: {
    success: {
      results: Array<{ text: { text: string } }>;
    };
  };
}

export interface UpstreamMessage {
  id: string;
  task_id: string;
  server_message_data?: string;
  user_query?: { query: string };
  agent_output?: { text: string };
  tool_call?: {
    tool_call_id: string;
    call_mcp_tool: { name: string; args: Record<string, unknown> };
  };
  tool_call_result?: UpstreamToolCallResult;
}

export interface UpstreamImage {
  data: string;
  mime_type: string;
}

export type UpstreamInput =
  | {
      user_query: {
        query: string;
        referenced_attachments?: Record<string, { plain_text: string }>;
      };
    }
  | { tool_call_result: UpstreamToolCallResult };

export interface UpstreamFeatureFlags {
  rules_enabled: boolean;
  web_context_retrieval_enabled: boolean;
  supports_parallel_tool_calls: boolean;
  planning_enabled: boolean;
  warp_drive_context_enabled: boolean;
  supports_create_files: boolean;
  use_anthropic_text_editor_tools: boolean;
  supports_long_running_commands: boolean;
  should_preserve_file_content_in_history: boolean;
  supports_todos_ui: boolean;
  supports_linked_code_blocks: boolean;
}

export interface OutboundRequest {
  task_context: {
    tasks: Array<{
      id: string;
      description: string;
      status: { in_progress: Record<string, never> };
      messages: UpstreamMessage[];
    }>;
    active_task_id: string;
  };
  input: {
    context: { images?: UpstreamImage[] };
    user_inputs: { inputs: UpstreamInput[] };
  };
  settings: {
    model_config: ModelSelection;
  } & UpstreamFeatureFlags;
  metadata: {
    conversation_id?: string;
    logging: {
      is_autodetected_user_query: boolean;
      entrypoint: string;
    };
  };
  mcp_context?: {
    tools: SanitizedTool[];
  };
}

// ============================================
// Translate Options
// ============================================

export type ToolChoice =
  | "auto"
  | "none"
  | "required"
  | { type: "function"; function: { name: string } };

export interface TranslateOptions {
  toolChoice?: ToolChoice;
  /** 覆盖默认 feature flags */
  featureFlags?: Partial<UpstreamFeatureFlags>;
  now?: () => Date;
  generateId?: () => string;
}

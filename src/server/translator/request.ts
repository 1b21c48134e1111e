/**
 * Request Translator
 *
 * NormalizedConversation + 模型配置 + 工具定义 + 会话状态 → 上游请求包
 */

import { randomUUID } from "node:crypto";
import { BridgeError } from "../../shared/errors.js";
import { DEFAULT_MODEL_SELECTION, getModelInfo, resolveModelId, supportsRole } from "../../shared/constants.js";
import { logger } from "../../shared/logger.js";
import { isRecord } from "../../shared/utils.js";
import type { ModelRole, ModelSelection } from "../../shared/types.js";
import { TEXT_JOINER } from "./normalizer.js";
import type {
  ContentPart,
  ImagePart,
  NormalizedConversation,
  NormalizedTurn,
  OutboundRequest,
  SessionState,
  ToolChoice,
  ToolResultPart,
  TranslateOptions,
  UpstreamFeatureFlags,
  UpstreamImage,
  UpstreamInput,
  UpstreamMessage,
  UpstreamToolCallResult,
} from "./types.js";
import { encodeMessageData, messageDataFromDate } from "./utils/messageData.js";
import { sanitizeTools, type SanitizedTool, type ToolDefinition } from "./utils/schemaSanitizer.js";

export const SYSTEM_PROMPT_ATTACHMENT = "SYSTEM_PROMPT";

export const DEFAULT_FEATURE_FLAGS: UpstreamFeatureFlags = {
  rules_enabled: false,
  web_context_retrieval_enabled: false,
  supports_parallel_tool_calls: true,
  planning_enabled: false,
  warp_drive_context_enabled: false,
  supports_create_files: false,
  use_anthropic_text_editor_tools: false,
  supports_long_running_commands: false,
  should_preserve_file_content_in_history: true,
  supports_todos_ui: false,
  supports_linked_code_blocks: false,
};

const MODEL_ROLES: ModelRole[] = ["base", "planning", "coding"];

export interface ModelConfig {
  requested: Partial<ModelSelection>;
  defaults?: ModelSelection;
}

// ============================================
// Model Mapping
// ============================================

/**
 * Map requested model names onto known models; unknown names fall back to the default for that slot
 */
export function resolveModelSelection(
  requested: Partial<ModelSelection>,
  defaults: ModelSelection = DEFAULT_MODEL_SELECTION
): ModelSelection {
  const selection: ModelSelection = { ...defaults };

  for (const role of MODEL_ROLES) {
    const name = requested[role];
    if (!name) continue;

    const resolved = resolveModelId(name);
    if (supportsRole(resolved, role)) {
      selection[role] = resolved;
    } else {
      logger.warn(`Unknown ${role} model "${name}", falling back to ${defaults[role]}`);
    }
  }

  return selection;
}

// ============================================
// Tools
// ============================================

function selectTools(tools: ToolDefinition[], toolChoice: ToolChoice | undefined): SanitizedTool[] {
  if (toolChoice === "none" || tools.length === 0) {
    if (toolChoice === "none" && tools.length > 0) {
      logger.debug(`tool_choice "none": omitting ${tools.length} tool(s)`);
    }
    return [];
  }

  const { tools: valid, dropped } = sanitizeTools(tools);

  if (typeof toolChoice === "object") {
    const name = toolChoice.function.name;
    const forced = valid.find((tool) => tool.name === name);
    if (!forced) {
      throw new BridgeError("invalid_tool_schema", `tool_choice names tool "${name}", which has no usable schema`, {
        details: { dropped },
      });
    }
    return [forced];
  }

  if (toolChoice === "required" && valid.length === 0) {
    throw new BridgeError("invalid_tool_schema", "tool_choice is \"required\" but no tool has a usable schema", {
      details: { dropped },
    });
  }

  return valid;
}

// ============================================
// Message Mapping
// ============================================

function parseToolArguments(raw: string, toolName: string): Record<string, unknown> {
  if (raw.trim() === "") return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new BridgeError("translation_error", `Arguments of tool call "${toolName}" are not valid JSON`);
  }

  if (!isRecord(parsed)) {
    throw new BridgeError("translation_error", `Arguments of tool call "${toolName}" must be a JSON object`);
  }
  return parsed;
}

function toToolCallResult(result: ToolResultPart): UpstreamToolCallResult {
  return {
    tool_call_id: result.toolCallId,
    call_mcp_tool: {
      success: {
        results: [{ text: { text: result.content } }],
      },
    },
  };
}

function describeImage(image: ImagePart): string {
  return `[image: ${image.data !== undefined ? `inline ${image.mimeType ?? "image"}` : image.url}]`;
}

/**
 * Text of a user turn; images become references
 */
function renderUserQuery(parts: ContentPart[]): string {
  const segments: string[] = [];
  for (const part of parts) {
    if (part.type === "text") segments.push(part.text);
    else if (part.type === "image") segments.push(describeImage(part));
  }
  return segments.join(TEXT_JOINER);
}

class MessageBuilder {
  readonly messages: UpstreamMessage[] = [];

  constructor(
    private readonly taskId: string,
    private readonly session: SessionState,
    private readonly now: () => Date,
    private readonly generateId: () => string
  ) {}

  private push(message: Omit<UpstreamMessage, "id" | "task_id">): UpstreamMessage {
    const full: UpstreamMessage = { id: this.generateId(), task_id: this.taskId, ...message };
    this.messages.push(full);
    return full;
  }

  addUserTurn(turn: NormalizedTurn): void {
    this.push({ user_query: { query: renderUserQuery(turn.parts) } });
  }

  /**
   * Assistant parts in order; each tool call is followed by its result when one is present
   */
  addAssistantTurn(turn: NormalizedTurn, includeResults: boolean): void {
    let pendingText: string[] = [];

    const flushText = () => {
      if (pendingText.length === 0) return;
      const message = this.push({ agent_output: { text: pendingText.join(TEXT_JOINER) } });
      message.server_message_data = encodeMessageData(messageDataFromDate(message.id, this.now()));
      pendingText = [];
    };

    for (const part of turn.parts) {
      switch (part.type) {
        case "text":
          if (part.text !== "") pendingText.push(part.text);
          break;
        case "image":
          throw new BridgeError("translation_error", "Assistant messages cannot carry images");
        case "tool_result":
          throw new BridgeError("translation_error", "Tool results must be sent as tool messages");
        case "tool_call": {
          flushText();
          const name = part.name || this.session.toolNames[part.id];
          if (!name) {
            throw new BridgeError("translation_error", `Tool call "${part.id}" has no function name`);
          }
          this.push({
            tool_call: {
              tool_call_id: part.id,
              call_mcp_tool: { name, args: parseToolArguments(part.arguments, name) },
            },
          });
          if (includeResults) {
            for (const result of turn.toolResults.filter((r) => r.toolCallId === part.id)) {
              this.push({ tool_call_result: toToolCallResult(result) });
            }
          }
          break;
        }
      }
    }
    flushText();
  }
}

function collectImages(parts: ContentPart[]): UpstreamImage[] {
  const images: UpstreamImage[] = [];
  for (const part of parts) {
    if (part.type === "image" && part.data !== undefined) {
      images.push({ data: part.data, mime_type: part.mimeType ?? "image/png" });
    }
  }
  return images;
}

// ============================================
// Translate
// ============================================

export function translate(
  conversation: NormalizedConversation,
  modelConfig: ModelConfig,
  tools: ToolDefinition[],
  session: SessionState,
  options: TranslateOptions = {}
): OutboundRequest {
  const now = options.now ?? (() => new Date());
  const generateId = options.generateId ?? randomUUID;
  const turns = conversation.turns;
  const last = turns[turns.length - 1];

  if (!last) {
    throw new BridgeError("translation_error", "Conversation has no turns to translate");
  }

  const modelSelection = resolveModelSelection(modelConfig.requested, modelConfig.defaults);
  const mcpTools = selectTools(tools, options.toolChoice);

  // 新会话使用新的 task id
  const taskId = session.priorTaskId ?? generateId();
  const builder = new MessageBuilder(taskId, session, now, generateId);

  const inputs: UpstreamInput[] = [];
  let images: UpstreamImage[] = [];

  if (last.role === "user") {
    turns.slice(0, -1).forEach((turn) =>
      turn.role === "user" ? builder.addUserTurn(turn) : builder.addAssistantTurn(turn, true)
    );

    images = collectImages(last.parts);
    if (images.length > 0 && !supportsVision(modelSelection.base)) {
      throw new BridgeError(
        "translation_error",
        `Model "${modelSelection.base}" does not accept image input`
      );
    }

    const query = renderUserQuery(last.parts.filter((part) => part.type !== "image" || part.data === undefined));
    inputs.push({
      user_query: {
        query,
        ...(conversation.systemText !== undefined && {
          referenced_attachments: {
            [SYSTEM_PROMPT_ATTACHMENT]: { plain_text: conversation.systemText },
          },
        }),
      },
    });
  } else {
    // 以 assistant 结尾：只有在回传工具结果时才有可响应的内容
    if (last.toolResults.length === 0) {
      throw new BridgeError(
        "translation_error",
        "Conversation ends with an assistant message and carries no tool results to continue from"
      );
    }

    turns.slice(0, -1).forEach((turn) =>
      turn.role === "user" ? builder.addUserTurn(turn) : builder.addAssistantTurn(turn, true)
    );
    builder.addAssistantTurn(last, false);
    for (const result of last.toolResults) {
      inputs.push({ tool_call_result: toToolCallResult(result) });
    }
    if (conversation.systemText !== undefined) {
      logger.debug("System prompt not attached: request continues a tool call");
    }
  }

  const request: OutboundRequest = {
    task_context: {
      tasks: [
        {
          id: taskId,
          description: "",
          status: { in_progress: {} },
          messages: builder.messages,
        },
      ],
      active_task_id: taskId,
    },
    input: {
      context: images.length > 0 ? { images } : {},
      user_inputs: { inputs },
    },
    settings: {
      model_config: modelSelection,
      ...DEFAULT_FEATURE_FLAGS,
      ...options.featureFlags,
    },
    metadata: {
      ...(session.conversationId !== undefined && { conversation_id: session.conversationId }),
      logging: {
        is_autodetected_user_query: true,
        entrypoint: "USER_INITIATED",
      },
    },
  };

  if (mcpTools.length > 0) {
    request.mcp_context = { tools: mcpTools };
  }

  return request;
}

function supportsVision(modelId: string): boolean {
  // "auto" routes to a vision-capable model upstream
  return modelId === "auto" || (getModelInfo(modelId)?.vision ?? false);
}

/**
 * Translator Module Entry Point
 *
 * 导出规范化、请求转换、schema 清理与消息数据编解码
 */

// 导出类型
export type {
  TurnRole,
  TextPart,
  ImagePart,
  ToolCallPart,
  ToolResultPart,
  ContentPart,
  ConversationTurn,
  NormalizedTurn,
  NormalizedConversation,
  SessionState,
  OutboundRequest,
  UpstreamMessage,
  UpstreamInput,
  UpstreamFeatureFlags,
  ToolChoice,
  TranslateOptions,
} from "./types.js";

// 规范化
export { normalize, requireUserContent, renderText, TEXT_JOINER } from "./normalizer.js";

// 请求转换
export {
  translate,
  resolveModelSelection,
  DEFAULT_FEATURE_FLAGS,
  SYSTEM_PROMPT_ATTACHMENT,
  type ModelConfig,
} from "./request.js";

// 工具 schema
export {
  sanitizeTools,
  sanitizeToolSchema,
  cleanJSONSchema,
  inferRequired,
  SchemaError,
  type ToolDefinition,
  type SanitizedTool,
  type DroppedTool,
} from "./utils/schemaSanitizer.js";

// 消息数据编解码
export { encodeMessageData, decodeMessageData, messageDataFromDate, type MessageData } from "./utils/messageData.js";

export { decodeJwtClaims, readTokenLifetime } from "./utils/jwt.js";

// OpenAI Chat 格式
export * as openaiChat from "./openai-chat/index.js";

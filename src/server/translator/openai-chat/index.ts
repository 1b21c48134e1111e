/**
 * OpenAI Chat Translator
 *
 * 实现 OpenAI Chat Completions API 格式与内部结构的双向转换
 * - 请求: OpenAI Chat -> ConversationTurn[] / ToolDefinition[] / 模型选择
 * - 响应: OutputChunk / AggregateResponse -> OpenAI Chat
 */

import type {
  ModelSelection,
  OpenAIChatChunk,
  OpenAIChatResponse,
} from "../../../shared/types.js";
import type { AggregateResponse, OutputChunk } from "../../stream/types.js";
import type { ContentPart, ConversationTurn, ToolChoice } from "../types.js";
import type { ToolDefinition } from "../utils/schemaSanitizer.js";
import { errorTypeFor } from "../../../shared/errors.js";
import type { ChatCompletionRequest, ChatContent, ChatMessage, ChatTool } from "./schema.js";
import { z } from "zod";

export * from "./schema.js";

export interface ResponseContext {
  id: string;
  created: number;
  model: string;
}

// ============================================
// Request
// ============================================

const DATA_URL_PATTERN = /^data:([^;,]+);base64,(.+)$/;

const textPart = z.object({ type: z.literal("text"), text: z.string() });
const imagePart = z.object({
  type: z.literal("image_url"),
  image_url: z.union([z.string(), z.object({ url: z.string() })]),
});

function toContentParts(content: ChatContent): ContentPart[] {
  if (content === null || content === undefined) {
    return [];
  }
  if (typeof content === "string") {
    return [{ type: "text", text: content }];
  }

  const parts: ContentPart[] = [];
  for (const part of content) {
    const text = textPart.safeParse(part);
    if (text.success) {
      parts.push({ type: "text", text: text.data.text });
      continue;
    }

    const image = imagePart.safeParse(part);
    if (image.success) {
      const url = typeof image.data.image_url === "string" ? image.data.image_url : image.data.image_url.url;
      const match = url.match(DATA_URL_PATTERN);
      parts.push(match ? { type: "image", url, mimeType: match[1], data: match[2] } : { type: "image", url });
    }
    // 其它类型（input_audio 等）忽略
  }
  return parts;
}

function contentText(content: ChatContent): string {
  return toContentParts(content)
    .map((part) => (part.type === "text" ? part.text : ""))
    .join("");
}

export function toConversationTurns(messages: ChatMessage[]): ConversationTurn[] {
  return messages.map((message): ConversationTurn => {
    switch (message.role) {
      case "system":
      case "developer":
        return { role: "system", parts: toContentParts(message.content) };
      case "user":
        return { role: "user", parts: toContentParts(message.content) };
      case "assistant": {
        const parts = toContentParts(message.content);
        for (const call of message.tool_calls ?? []) {
          parts.push({
            type: "tool_call",
            id: call.id,
            name: call.function.name,
            arguments: call.function.arguments,
          });
        }
        return { role: "assistant", parts };
      }
      case "tool":
        return {
          role: "tool",
          parts: [
            {
              type: "tool_result",
              toolCallId: message.tool_call_id,
              ...(message.name !== undefined && { name: message.name }),
              content: contentText(message.content),
            },
          ],
        };
    }
  });
}

export function toToolDefinitions(tools: ChatTool[] | undefined): ToolDefinition[] {
  return (tools ?? []).map((tool) => ({
    name: tool.function.name,
    description: tool.function.description,
    parameters: tool.function.parameters,
  }));
}

export function toRequestedModels(request: ChatCompletionRequest): Partial<ModelSelection> {
  const requested: Partial<ModelSelection> = {};
  if (request.model) requested.base = request.model;
  if (request.planning_model) requested.planning = request.planning_model;
  if (request.coding_model) requested.coding = request.coding_model;
  return requested;
}

export function toToolChoice(request: ChatCompletionRequest): ToolChoice | undefined {
  return request.tool_choice;
}

/**
 * Text of the first user message; stable across turns of one conversation
 */
export function firstUserText(messages: ChatMessage[]): string | undefined {
  const first = messages.find((message) => message.role === "user");
  return first ? contentText(first.content) : undefined;
}

// ============================================
// Response
// ============================================

export function formatChunk(chunk: OutputChunk, context: ResponseContext): OpenAIChatChunk {
  const base = {
    id: context.id,
    object: "chat.completion.chunk" as const,
    created: context.created,
    model: context.model,
  };

  switch (chunk.kind) {
    case "role":
      return { ...base, choices: [{ index: 0, delta: { role: "assistant" }, finish_reason: null }] };
    case "text":
      return { ...base, choices: [{ index: 0, delta: { content: chunk.text }, finish_reason: null }] };
    case "tool_call":
      return {
        ...base,
        choices: [
          {
            index: 0,
            delta: {
              tool_calls: [
                {
                  index: chunk.index,
                  ...(chunk.id !== undefined && { id: chunk.id, type: "function" as const }),
                  function: {
                    ...(chunk.name !== undefined && { name: chunk.name }),
                    arguments: chunk.argumentsDelta,
                  },
                },
              ],
            },
            finish_reason: null,
          },
        ],
      };
    case "finish":
      return { ...base, choices: [{ index: 0, delta: {}, finish_reason: chunk.reason }] };
    case "error":
      return {
        ...base,
        choices: [{ index: 0, delta: {}, finish_reason: "error" }],
        error: {
          message: chunk.error.message,
          type: errorTypeFor(chunk.error.status),
          code: chunk.error.code,
        },
      };
  }
}

export function formatResponse(aggregate: AggregateResponse, context: ResponseContext): OpenAIChatResponse {
  const hasToolCalls = aggregate.toolCalls.length > 0;
  return {
    id: context.id,
    object: "chat.completion",
    created: context.created,
    model: context.model,
    choices: [
      {
        index: 0,
        message: {
          role: "assistant",
          content: aggregate.content === "" && hasToolCalls ? null : aggregate.content,
          ...(hasToolCalls && { tool_calls: aggregate.toolCalls }),
        },
        finish_reason: aggregate.finishReason,
      },
    ],
  };
}

/**
 * Upstream Event Decoder
 *
 * 上游事件 (codec 解码后的 JSON) → StreamEvent[] + 会话元数据
 * 上游字段名可能是 camelCase 或 snake_case，先统一为 snake_case 再校验
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { logger } from "../../shared/logger.js";
import { isRecord } from "../../shared/utils.js";
import type { DecodedEvent, SessionUpdate, StreamEvent, UpstreamFinishReason } from "./types.js";

// Values under these keys are caller-defined and keep their keys
const OPAQUE_KEYS = new Set(["args"]);

function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (ch) => `_${ch.toLowerCase()}`);
}

export function normalizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(normalizeKeys);
  }
  if (!isRecord(value)) {
    return value;
  }
  const result: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    const snake = toSnakeCase(key);
    result[snake] = OPAQUE_KEYS.has(snake) ? child : normalizeKeys(child);
  }
  return result;
}

// ============================================
// Schemas
// ============================================

const citationSchema = z.object({
  url: z.string(),
  title: z.string().optional(),
});

const agentOutputSchema = z.object({
  text: z.string().optional(),
  citations: z.array(citationSchema).optional(),
});

const toolCallSchema = z.object({
  tool_call_id: z.string().optional(),
  call_mcp_tool: z
    .object({
      name: z.string(),
      args: z.record(z.unknown()).nullish(),
    })
    .optional(),
});

const messageSchema = z.object({
  id: z.string().optional(),
  agent_output: agentOutputSchema.optional(),
  tool_call: toolCallSchema.optional(),
});

const actionSchema = z.object({
  create_task: z
    .object({ task: z.object({ id: z.string().optional() }).optional() })
    .optional(),
  append_to_message_content: z
    .object({ message: messageSchema.optional() })
    .optional(),
  add_messages_to_task: z
    .object({
      task_id: z.string().optional(),
      messages: z.array(messageSchema).optional(),
    })
    .optional(),
});

const finishedSchema = z.object({
  max_token_limit: z.unknown().optional(),
  quota_limit: z.unknown().optional(),
  internal_error: z.object({ message: z.string().optional() }).optional(),
});

export const upstreamEventSchema = z.object({
  init: z
    .object({
      conversation_id: z.string().optional(),
      task_id: z.string().optional(),
    })
    .optional(),
  client_actions: z
    .object({ actions: z.array(actionSchema).optional() })
    .optional(),
  finished: finishedSchema.optional(),
  error: z.union([z.string(), z.object({ message: z.string() })]).optional(),
});

export type UpstreamEvent = z.infer<typeof upstreamEventSchema>;

// ============================================
// Decode
// ============================================

function finishReasonOf(finished: z.infer<typeof finishedSchema>): UpstreamFinishReason {
  return finished.max_token_limit !== undefined ? "length_limited" : "content_complete";
}

function decodeMessage(
  message: z.infer<typeof messageSchema>,
  events: StreamEvent[],
  toolNames: Record<string, string>
): void {
  const call = message.tool_call?.call_mcp_tool;
  if (message.tool_call && call) {
    const id = message.tool_call.tool_call_id || `call_${randomUUID().replace(/-/g, "")}`;
    toolNames[id] = call.name;
    events.push({
      type: "tool_call_delta",
      id,
      name: call.name,
      argumentsDelta: JSON.stringify(call.args ?? {}),
    });
    return;
  }

  const output = message.agent_output;
  if (!output) return;
  if (output.text) {
    events.push({ type: "text_delta", text: output.text });
  }
  for (const citation of output.citations ?? []) {
    events.push({ type: "citation", citation });
  }
}

/**
 * Decode one codec event (`{ parsed_data: {...} }` or the bare event object)
 */
export function decodeUpstreamEvent(raw: unknown): DecodedEvent {
  const payload = isRecord(raw) && isRecord(raw.parsed_data) ? raw.parsed_data : raw;
  const parsed = upstreamEventSchema.safeParse(normalizeKeys(payload));

  if (!parsed.success) {
    logger.debug(`Skipping unrecognized upstream event: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    return { events: [] };
  }

  const event = parsed.data;
  const events: StreamEvent[] = [];
  const session: SessionUpdate = {};
  const toolNames: Record<string, string> = {};

  if (event.init) {
    session.conversationId = event.init.conversation_id;
    session.taskId = event.init.task_id;
  }

  for (const action of event.client_actions?.actions ?? []) {
    if (action.create_task?.task?.id) {
      session.taskId = action.create_task.task.id;
    }

    const appended = action.append_to_message_content?.message;
    if (appended) {
      decodeMessage(appended, events, toolNames);
    }

    const added = action.add_messages_to_task;
    if (added) {
      if (added.task_id) session.taskId = added.task_id;
      for (const message of added.messages ?? []) {
        decodeMessage(message, events, toolNames);
      }
    }
  }

  if (event.error !== undefined) {
    const message = typeof event.error === "string" ? event.error : event.error.message;
    events.push({ type: "error", message });
  }

  if (event.finished) {
    if (event.finished.internal_error) {
      events.push({
        type: "error",
        message: event.finished.internal_error.message ?? "Upstream reported an internal error",
      });
    } else if (event.finished.quota_limit !== undefined) {
      events.push({ type: "error", message: "Upstream request quota exhausted", code: "quota_exceeded" });
    } else {
      events.push({ type: "finish", reason: finishReasonOf(event.finished) });
    }
  }

  if (Object.keys(toolNames).length > 0) {
    session.toolNames = toolNames;
  }

  const hasSession =
    session.conversationId !== undefined || session.taskId !== undefined || session.toolNames !== undefined;
  return hasSession ? { events, session } : { events };
}

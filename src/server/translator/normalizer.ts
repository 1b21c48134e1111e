/**
 * Conversation Normalizer
 *
 * 将任意顺序的对话轮次整理为上游要求的严格交替结构：
 * 1. system 轮次按顺序合并为 systemText
 * 2. tool 轮次挂到发起对应调用的 assistant 轮次上
 * 3. 相邻同角色轮次合并（parts 按顺序拼接）
 * 4. 首轮为 assistant 时补一个空 user 轮次
 * 5. 校验严格交替（违反即为逻辑缺陷）
 */

import { BridgeError } from "../../shared/errors.js";
import type {
  ContentPart,
  ConversationTurn,
  NormalizedConversation,
  NormalizedTurn,
  ToolResultPart,
} from "./types.js";

/** Boundary placed between text parts when a turn is rendered as one string */
export const TEXT_JOINER = "\n\n";

export function renderText(parts: ContentPart[]): string {
  return parts
    .filter((part) => part.type === "text")
    .map((part) => (part.type === "text" ? part.text : ""))
    .join(TEXT_JOINER);
}

function syntheticUserTurn(): NormalizedTurn {
  return { role: "user", parts: [{ type: "text", text: "" }], toolResults: [] };
}

function findCallingTurn(turns: NormalizedTurn[], toolCallId: string): NormalizedTurn | undefined {
  for (let i = turns.length - 1; i >= 0; i--) {
    const turn = turns[i];
    if (turn.role !== "assistant") continue;
    if (turn.parts.some((part) => part.type === "tool_call" && part.id === toolCallId)) {
      return turn;
    }
  }
  return undefined;
}

function attachToolResults(turns: NormalizedTurn[], toolTurn: ConversationTurn): void {
  const results = toolTurn.parts.filter((part): part is ToolResultPart => part.type === "tool_result");
  if (results.length === 0) {
    throw new BridgeError("normalization_error", "Tool message carries no tool result");
  }

  for (const result of results) {
    const owner = findCallingTurn(turns, result.toolCallId);
    if (!owner) {
      throw new BridgeError(
        "normalization_error",
        `Tool result references unknown tool call id "${result.toolCallId}"`,
        { details: { toolCallId: result.toolCallId } }
      );
    }
    owner.toolResults.push(result);
  }
}

export function assertAlternating(turns: NormalizedTurn[]): void {
  turns.forEach((turn, i) => {
    const expected = i % 2 === 0 ? "user" : "assistant";
    if (turn.role !== expected) {
      throw new Error(
        `Normalized conversation breaks alternation at turn ${i}: expected ${expected}, got ${turn.role}`
      );
    }
  });
}

export function normalize(input: ConversationTurn[]): NormalizedConversation {
  if (input.length === 0) {
    return { turns: [syntheticUserTurn()] };
  }

  // 1. system
  const systemTexts = input
    .filter((turn) => turn.role === "system")
    .map((turn) => renderText(turn.parts))
    .filter((text) => text.trim() !== "");
  const systemText = systemTexts.length > 0 ? systemTexts.join(TEXT_JOINER) : undefined;

  // 2 + 3. attach tool results, merge same-role neighbours
  const turns: NormalizedTurn[] = [];
  for (const turn of input) {
    if (turn.role === "system") continue;

    if (turn.role === "tool") {
      attachToolResults(turns, turn);
      continue;
    }

    const last = turns[turns.length - 1];
    if (last && last.role === turn.role) {
      last.parts.push(...turn.parts);
    } else {
      turns.push({ role: turn.role, parts: [...turn.parts], toolResults: [] });
    }
  }

  // 4. leading assistant
  if (turns.length > 0 && turns[0].role === "assistant") {
    turns.unshift(syntheticUserTurn());
  }

  // 5. post-condition
  assertAlternating(turns);

  return systemText === undefined ? { turns } : { systemText, turns };
}

/**
 * Reject a conversation with nothing for the model to answer
 */
export function requireUserContent(conversation: NormalizedConversation): void {
  if (conversation.turns.length === 0) {
    throw new BridgeError(
      "normalization_error",
      "Conversation contains only system messages; at least one user message is required"
    );
  }
}

import { describe, it, expect, vi } from "vitest";

vi.mock("../../src/shared/logger.js", () => {
  const mock = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    success: vi.fn(),
    print: vi.fn(),
    scoped: vi.fn(),
  };
  mock.scoped.mockReturnValue(mock);
  return { logger: mock };
});

import {
  DEFAULT_FEATURE_FLAGS,
  decodeMessageData,
  resolveModelSelection,
  translate,
  type NormalizedConversation,
  type NormalizedTurn,
  type SessionState,
  type ToolDefinition,
  type TranslateOptions,
} from "../../src/server/translator/index.js";

const NOW = new Date(1_700_000_000_123);

function options(extra: TranslateOptions = {}): TranslateOptions {
  let counter = 0;
  return { now: () => NOW, generateId: () => `id-${++counter}`, ...extra };
}

function user(text: string): NormalizedTurn {
  return { role: "user", parts: [{ type: "text", text }], toolResults: [] };
}

function session(extra: Partial<SessionState> = {}): SessionState {
  return { toolNames: {}, ...extra };
}

const READ_FILE: ToolDefinition = {
  name: "read_file",
  description: "Read a file",
  parameters: { type: "object", properties: { path: { type: "string", description: "File path" } } },
};

describe("Request Translator", () => {
  it("should send a single user turn with the system prompt attached", () => {
    const conversation: NormalizedConversation = { systemText: "Be brief.", turns: [user("Hi")] };

    const request = translate(conversation, { requested: {} }, [], session(), options());

    expect(request).toEqual({
      task_context: {
        tasks: [{ id: "id-1", description: "", status: { in_progress: {} }, messages: [] }],
        active_task_id: "id-1",
      },
      input: {
        context: {},
        user_inputs: {
          inputs: [
            {
              user_query: {
                query: "Hi",
                referenced_attachments: { SYSTEM_PROMPT: { plain_text: "Be brief." } },
              },
            },
          ],
        },
      },
      settings: {
        model_config: { base: "claude-4.1-opus", planning: "o3", coding: "auto" },
        ...DEFAULT_FEATURE_FLAGS,
      },
      metadata: {
        logging: { is_autodetected_user_query: true, entrypoint: "USER_INITIATED" },
      },
    });
  });

  it("should replay history under the prior task with tool results after their calls", () => {
    const conversation: NormalizedConversation = {
      turns: [
        user("Q1"),
        {
          role: "assistant",
          parts: [
            { type: "text", text: "A1" },
            { type: "tool_call", id: "c1", name: "read_file", arguments: '{"path":"a.ts"}' },
          ],
          toolResults: [{ type: "tool_result", toolCallId: "c1", content: "file body" }],
        },
        user("Q2"),
      ],
    };

    const request = translate(
      conversation,
      { requested: {} },
      [],
      session({ priorTaskId: "task-prev", conversationId: "conv-1" }),
      options()
    );
    const messages = request.task_context.tasks[0]?.messages ?? [];

    expect(request.task_context.active_task_id).toBe("task-prev");
    expect(request.metadata.conversation_id).toBe("conv-1");
    expect(messages.map(({ server_message_data: _, ...rest }) => rest)).toEqual([
      { id: "id-1", task_id: "task-prev", user_query: { query: "Q1" } },
      { id: "id-2", task_id: "task-prev", agent_output: { text: "A1" } },
      {
        id: "id-3",
        task_id: "task-prev",
        tool_call: { tool_call_id: "c1", call_mcp_tool: { name: "read_file", args: { path: "a.ts" } } },
      },
      {
        id: "id-4",
        task_id: "task-prev",
        tool_call_result: {
          tool_call_id: "c1",
          call_mcp_tool: { success: { results: [{ text: { text: "file body" } }] } },
        },
      },
    ]);
    expect(decodeMessageData(messages[1]?.server_message_data ?? "")).toEqual({
      uuid: "id-2",
      seconds: 1_700_000_000,
      nanos: 123_000_000,
    });
    expect(request.input.user_inputs.inputs).toEqual([{ user_query: { query: "Q2" } }]);
  });

  it("should continue from tool results when the conversation ends with the assistant", () => {
    const conversation: NormalizedConversation = {
      systemText: "sys",
      turns: [
        user("List files"),
        {
          role: "assistant",
          parts: [{ type: "tool_call", id: "c1", name: "", arguments: "" }],
          toolResults: [{ type: "tool_result", toolCallId: "c1", content: "a.ts\nb.ts" }],
        },
      ],
    };

    const request = translate(conversation, { requested: {} }, [], session({ toolNames: { c1: "ls" } }), options());

    expect(request.task_context.tasks[0]?.messages).toEqual([
      { id: "id-2", task_id: "id-1", user_query: { query: "List files" } },
      { id: "id-3", task_id: "id-1", tool_call: { tool_call_id: "c1", call_mcp_tool: { name: "ls", args: {} } } },
    ]);
    expect(request.input.user_inputs.inputs).toEqual([
      {
        tool_call_result: {
          tool_call_id: "c1",
          call_mcp_tool: { success: { results: [{ text: { text: "a.ts\nb.ts" } }] } },
        },
      },
    ]);
  });

  it("should reject a trailing assistant turn without tool results", () => {
    const conversation: NormalizedConversation = {
      turns: [user("Hi"), { role: "assistant", parts: [{ type: "text", text: "Hello" }], toolResults: [] }],
    };

    expect(() => translate(conversation, { requested: {} }, [], session(), options())).toThrow(
      expect.objectContaining({ code: "translation_error" })
    );
  });

  it("should reject a tool call whose name cannot be recovered", () => {
    const conversation: NormalizedConversation = {
      turns: [
        user("Hi"),
        { role: "assistant", parts: [{ type: "tool_call", id: "c9", name: "", arguments: "{}" }], toolResults: [] },
        user("again"),
      ],
    };

    expect(() => translate(conversation, { requested: {} }, [], session(), options())).toThrow(
      'Tool call "c9" has no function name'
    );
  });

  it("should reject tool arguments that are not a JSON object", () => {
    const withArguments = (args: string): NormalizedConversation => ({
      turns: [
        user("Hi"),
        { role: "assistant", parts: [{ type: "tool_call", id: "c1", name: "read_file", arguments: args }], toolResults: [] },
        user("again"),
      ],
    });

    expect(() => translate(withArguments("{oops"), { requested: {} }, [], session(), options())).toThrow(
      'Arguments of tool call "read_file" are not valid JSON'
    );
    expect(() => translate(withArguments("[1]"), { requested: {} }, [], session(), options())).toThrow(
      'Arguments of tool call "read_file" must be a JSON object'
    );
  });

  it("should move inline images into the input context", () => {
    const conversation: NormalizedConversation = {
      turns: [
        {
          role: "user",
          parts: [
            { type: "text", text: "What is this?" },
            { type: "image", url: "data:image/png;base64,AAAA", mimeType: "image/png", data: "AAAA" },
            { type: "image", url: "https://example.com/cat.png" },
          ],
          toolResults: [],
        },
      ],
    };

    const request = translate(conversation, { requested: {} }, [], session(), options());

    expect(request.input).toEqual({
      context: { images: [{ data: "AAAA", mime_type: "image/png" }] },
      user_inputs: {
        inputs: [{ user_query: { query: "What is this?\n\n[image: https://example.com/cat.png]" } }],
      },
    });
    expect(() => translate(conversation, { requested: { base: "o3" } }, [], session(), options())).toThrow(
      'Model "o3" does not accept image input'
    );
  });

  it("should reject an empty conversation", () => {
    expect(() => translate({ turns: [] }, { requested: {} }, [], session(), options())).toThrow(
      "Conversation has no turns to translate"
    );
  });

  describe("tools", () => {
    const BROKEN: ToolDefinition = { name: "bad name" };
    const LS: ToolDefinition = { name: "ls", parameters: { type: "object", properties: {} } };
    const conversation: NormalizedConversation = { turns: [user("Hi")] };

    it("should attach sanitized tools and drop unusable ones", () => {
      const request = translate(conversation, { requested: {} }, [READ_FILE, BROKEN], session(), options());

      expect(request.mcp_context?.tools.map((tool) => tool.name)).toEqual(["read_file"]);
      expect(request.mcp_context?.tools[0]?.description).toBe("Read a file");
    });

    it("should omit tools for tool_choice none", () => {
      const request = translate(conversation, { requested: {} }, [READ_FILE], session(), options({ toolChoice: "none" }));

      expect(request.mcp_context).toBeUndefined();
    });

    it("should keep only the named tool", () => {
      const request = translate(
        conversation,
        { requested: {} },
        [READ_FILE, LS],
        session(),
        options({ toolChoice: { type: "function", function: { name: "ls" } } })
      );

      expect(request.mcp_context?.tools.map((tool) => tool.name)).toEqual(["ls"]);
    });

    it("should fail when a forced tool has no usable schema", () => {
      const forced = options({ toolChoice: { type: "function", function: { name: "bad name" } } });
      const required = options({ toolChoice: "required" });

      expect(() => translate(conversation, { requested: {} }, [READ_FILE, BROKEN], session(), forced)).toThrow(
        expect.objectContaining({ code: "invalid_tool_schema" })
      );
      expect(() => translate(conversation, { requested: {} }, [BROKEN], session(), required)).toThrow(
        expect.objectContaining({ code: "invalid_tool_schema" })
      );
    });
  });

  it("should let feature flags be overridden", () => {
    const request = translate(
      { turns: [user("Hi")] },
      { requested: {} },
      [],
      session(),
      options({ featureFlags: { planning_enabled: true } })
    );

    expect(request.settings.planning_enabled).toBe(true);
    expect(request.settings.supports_parallel_tool_calls).toBe(true);
  });

  describe("resolveModelSelection", () => {
    it("should resolve aliases and fall back per slot", () => {
      expect(resolveModelSelection({ base: "claude-opus-4.1", planning: "gpt-4o", coding: "nope" })).toEqual({
        base: "claude-4.1-opus",
        planning: "o3",
        coding: "auto",
      });
    });

    it("should fall back to configured defaults", () => {
      const defaults = { base: "gpt-5", planning: "gpt-5", coding: "gpt-5" };

      expect(resolveModelSelection({ base: "unknown-model" }, defaults)).toEqual(defaults);
    });
  });
});

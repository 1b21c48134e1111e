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

import { createApp } from "../../src/server/app.js";
import { BridgeService, type CredentialProvider } from "../../src/server/services/BridgeService.js";
import { deriveSessionKey, SessionStore } from "../../src/server/services/sessionStore.js";
import { UpstreamHttpError, type UpstreamTransport } from "../../src/server/services/UpstreamClient.js";
import { UsageTracker, type UsageFetcher } from "../../src/server/services/usageTracker.js";
import type { OutboundRequest } from "../../src/server/translator/types.js";
import { getDefaultConfig } from "../../src/shared/config.js";
import { MODELS, VERSION } from "../../src/shared/constants.js";
import { logger } from "../../src/shared/logger.js";
import type { Credential } from "../../src/shared/types.js";

const T0 = Date.UTC(2026, 9, 19, 12, 0, 0);

class FakeTransport implements UpstreamTransport {
  readonly requests: OutboundRequest[] = [];
  readonly tokens: string[] = [];

  constructor(private readonly script: Array<unknown[] | Error>) {}

  async open(request: OutboundRequest, accessToken: string): Promise<AsyncIterable<unknown>> {
    this.requests.push(request);
    this.tokens.push(accessToken);
    const next = this.script.shift() ?? [];
    if (next instanceof Error) throw next;
    return (async function* () {
      yield* next;
    })();
  }
}

class FakeCredentials implements CredentialProvider {
  readonly invalidated: string[] = [];
  private current: Credential = { accessToken: "access-1", refreshToken: "refresh-1", expiresAt: T0 + 3_600_000 };

  async acquire(): Promise<Credential> {
    return this.current;
  }

  async invalidate(staleAccessToken: string): Promise<Credential> {
    this.invalidated.push(staleAccessToken);
    this.current = { ...this.current, accessToken: "access-2" };
    return this.current;
  }
}

const text = (value: string) => ({ client_actions: { actions: [{ append_to_message_content: { message: { agent_output: { text: value } } } }] } });

const HELLO_WORLD = [
  { init: { conversation_id: "conv-1", task_id: "task-1" } },
  text("Hello"),
  text(" world"),
  { finished: {} },
];

function setup(
  script: Array<unknown[] | Error>,
  options: { apiKey?: string; fetchUsage?: UsageFetcher } = {}
) {
  const config = getDefaultConfig();
  const transport = new FakeTransport(script);
  const credentials = new FakeCredentials();
  const sessions = new SessionStore();
  const usage = new UsageTracker({
    fetchUsage: options.fetchUsage ?? (async () => Promise.reject(new Error("usage not scripted"))),
    stalenessMs: config.usage.stalenessMs,
    chatThreshold: config.usage.chatThreshold,
    backgroundThreshold: config.usage.backgroundThreshold,
    now: () => T0,
  });
  const bridge = new BridgeService({ config, credentials, usage, sessions, transport });
  const app = createApp({
    bridge,
    apiKey: options.apiKey,
    credentialStatus: () => ({ present: true, expiresAt: T0 + 3_600_000, expiresInMs: 3_600_000 }),
  });
  return { app, transport, credentials, sessions };
}

function post(body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: typeof body === "string" ? body : JSON.stringify(body),
  };
}

function sseData(body: string): string[] {
  return body
    .split("\n\n")
    .filter((frame) => frame.trim() !== "")
    .map((frame) => frame.replace(/^data: /, ""));
}

describe("HTTP routes", () => {
  describe("POST /v1/chat/completions", () => {
    it("should answer a non-streaming request", async () => {
      const { app, transport } = setup([HELLO_WORLD]);

      const res = await app.request(
        "/v1/chat/completions",
        post({ model: "gpt-5", messages: [{ role: "user", content: "Hi" }] })
      );
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({ object: "chat.completion", model: "gpt-5" });
      expect(body.id).toMatch(/^chatcmpl-/);
      expect(body.choices).toEqual([
        { index: 0, message: { role: "assistant", content: "Hello world" }, finish_reason: "stop" },
      ]);
      expect(transport.requests[0]?.settings.model_config.base).toBe("gpt-5");
    });

    it("should stream chunks as server-sent events", async () => {
      const { app } = setup([HELLO_WORLD]);

      const res = await app.request(
        "/v1/chat/completions",
        post({ stream: true, messages: [{ role: "user", content: "Hi" }] })
      );
      const frames = sseData(await res.text());

      expect(res.headers.get("content-type")).toContain("text/event-stream");
      expect(frames[frames.length - 1]).toBe("[DONE]");
      const chunks = frames.slice(0, -1).map((frame) => JSON.parse(frame));
      expect(chunks.map((chunk) => chunk.choices[0].delta)).toEqual([
        { role: "assistant" },
        { content: "Hello" },
        { content: " world" },
        {},
      ]);
      expect(chunks.map((chunk) => chunk.choices[0].finish_reason)).toEqual([null, null, null, "stop"]);
      expect(chunks[0].model).toBe("claude-4.1-opus");
    });

    it("should end a failing stream with an error chunk", async () => {
      const { app } = setup([[text("partial"), { error: "boom" }]]);

      const res = await app.request(
        "/v1/chat/completions",
        post({ stream: true, messages: [{ role: "user", content: "Hi" }] })
      );
      const frames = sseData(await res.text());
      const last = JSON.parse(frames[frames.length - 2] ?? "{}");

      expect(frames[frames.length - 1]).toBe("[DONE]");
      expect(last.choices[0].finish_reason).toBe("error");
      expect(last.error).toEqual({ message: "boom", type: "upstream_error", code: "upstream_error" });
    });

    it("should carry session state into the next turn", async () => {
      const { app, transport, sessions } = setup([HELLO_WORLD, HELLO_WORLD]);
      const first = [{ role: "user", content: "Hi" }];

      await app.request("/v1/chat/completions", post({ messages: first }));
      await app.request(
        "/v1/chat/completions",
        post({ messages: [...first, { role: "assistant", content: "Hello world" }, { role: "user", content: "More" }] })
      );

      expect(sessions.get(deriveSessionKey(undefined, "Hi"))).toEqual({
        conversationId: "conv-1",
        priorTaskId: "task-1",
        toolNames: {},
      });
      expect(transport.requests[1]?.task_context.active_task_id).toBe("task-1");
      expect(transport.requests[1]?.metadata.conversation_id).toBe("conv-1");
    });

    it("should retry once with a new credential after a 401", async () => {
      const { app, transport, credentials } = setup([new UpstreamHttpError(401, "unauthorized"), HELLO_WORLD]);

      const res = await app.request("/v1/chat/completions", post({ messages: [{ role: "user", content: "Hi" }] }));

      expect(res.status).toBe(200);
      expect(credentials.invalidated).toEqual(["access-1"]);
      expect(transport.tokens).toEqual(["access-1", "access-2"]);
    });

    it("should map an upstream rate limit to 429 with Retry-After", async () => {
      const { app } = setup([new UpstreamHttpError(429, "slow down", "7")]);

      const res = await app.request("/v1/chat/completions", post({ messages: [{ role: "user", content: "Hi" }] }));

      expect(res.status).toBe(429);
      expect(res.headers.get("retry-after")).toBe("7");
      expect(await res.json()).toEqual({
        error: {
          message: "Upstream rate limited the request: slow down",
          type: "rate_limit_error",
          code: "quota_exceeded",
        },
      });
    });

    it("should warn from a background usage query when quota runs low", async () => {
      const fetchUsage = vi.fn<UsageFetcher>().mockResolvedValue({
        windowLimit: 100,
        windowUsed: 97,
        resetsAt: T0 + 3_600_000,
        isUnlimited: false,
      });
      const { app } = setup([HELLO_WORLD, HELLO_WORLD], { fetchUsage });
      const warn = vi.mocked(logger.warn);
      warn.mockClear();

      const first = await app.request("/v1/chat/completions", post({ messages: [{ role: "user", content: "Hi" }] }));
      await new Promise<void>((resolve) => setTimeout(resolve, 0));
      const second = await app.request("/v1/chat/completions", post({ messages: [{ role: "user", content: "Hi" }] }));

      expect(first.status).toBe(200);
      expect(second.status).toBe(200);
      expect(fetchUsage).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(expect.stringContaining("Upstream request quota nearly exhausted"));
    });

    it("should reject an empty message list with 400", async () => {
      const { app, transport } = setup([]);

      const res = await app.request("/v1/chat/completions", post({ messages: [] }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          message: "Invalid request at messages: messages must contain at least one message",
          type: "invalid_request_error",
          code: "invalid_request",
        },
      });
      expect(transport.requests).toHaveLength(0);
    });

    it("should reject a body that is not JSON", async () => {
      const { app } = setup([]);

      const res = await app.request("/v1/chat/completions", post("{not json"));

      expect(res.status).toBe(400);
      expect((await res.json()).error.message).toBe("Request body must be valid JSON");
    });

    it("should reject a conversation of system messages only", async () => {
      const { app } = setup([]);

      const res = await app.request(
        "/v1/chat/completions",
        post({ messages: [{ role: "system", content: "rules" }] })
      );

      expect(res.status).toBe(400);
      expect((await res.json()).error.code).toBe("normalization_error");
    });
  });

  describe("authentication", () => {
    it("should reject a missing or wrong API key", async () => {
      const { app } = setup([HELLO_WORLD], { apiKey: "test-secret" });

      const missing = await app.request("/v1/chat/completions", post({ messages: [{ role: "user", content: "Hi" }] }));
      const wrong = await app.request("/v1/models", { headers: { "x-api-key": "nope" } });

      expect(missing.status).toBe(401);
      expect(await missing.json()).toEqual({
        error: { message: "Invalid API Key", type: "authentication_error", code: "401" },
      });
      expect(wrong.status).toBe(401);
    });

    it("should accept a bearer token and leave health open", async () => {
      const { app } = setup([HELLO_WORLD], { apiKey: "test-secret" });

      const ok = await app.request(
        "/v1/chat/completions",
        post({ messages: [{ role: "user", content: "Hi" }] }, { Authorization: "Bearer test-secret" })
      );
      const health = await app.request("/health");

      expect(ok.status).toBe(200);
      expect(health.status).toBe(200);
    });
  });

  it("should list models", async () => {
    const { app } = setup([]);

    const body = await (await app.request("/v1/models")).json();

    expect(body.object).toBe("list");
    expect(body.data).toHaveLength(MODELS.length);
    expect(body.data[0]).toMatchObject({
      id: "auto",
      object: "model",
      owned_by: "upstream",
      roles: ["base", "planning", "coding"],
      capabilities: { streaming: true, vision: false },
    });
  });

  it("should report usage", async () => {
    const { app } = setup([], {
      fetchUsage: async () => ({ windowLimit: 100, windowUsed: 10, resetsAt: T0 + 3_600_000, isUnlimited: false }),
    });

    const body = await (await app.request("/v1/usage")).json();

    expect(body).toEqual({
      object: "usage",
      window_limit: 100,
      window_used: 10,
      resets_at: "2026-10-19T13:00:00.000Z",
      is_unlimited: false,
      fetched_at: "2026-10-19T12:00:00.000Z",
      stale: false,
    });
  });

  it("should answer 503 when usage is unknown", async () => {
    const { app } = setup([]);

    const res = await app.request("/v1/usage");

    expect(res.status).toBe(503);
    expect((await res.json()).error.code).toBe("usage_unavailable");
  });

  it("should report health with credential status", async () => {
    const { app } = setup([]);

    expect(await (await app.request("/health")).json()).toEqual({
      status: "ok",
      version: VERSION,
      credential: { present: true, expiresAt: T0 + 3_600_000, expiresInMs: 3_600_000 },
    });
  });
});

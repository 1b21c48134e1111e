/**
 * Bridge Service
 *
 * 请求处理流程：
 * OpenAI 请求 → Normalizer → Request Translator → (凭证) → 上游 → Stream Transformer → OpenAI 响应
 */

import { BridgeError } from "../../shared/errors.js";
import { QUOTA_EXHAUSTED_MARKERS } from "../../shared/constants.js";
import { logger } from "../../shared/logger.js";
import type { AppConfig, Credential, OpenAIChatResponse, UsageSnapshot } from "../../shared/types.js";
import { errorMessage, generateRequestId, unixSeconds } from "../../shared/utils.js";
import { normalize, requireUserContent } from "../translator/normalizer.js";
import { translate } from "../translator/request.js";
import type { OutboundRequest, SessionState } from "../translator/types.js";
import {
  chatCompletionRequestSchema,
  firstUserText,
  formatResponse,
  toConversationTurns,
  toRequestedModels,
  toToolChoice,
  toToolDefinitions,
  type ChatCompletionRequest,
  type ResponseContext,
} from "../translator/openai-chat/index.js";
import { decodeUpstreamEvent } from "../stream/events.js";
import { aggregateChunks, ChunkStream } from "../stream/transformer.js";
import type { StreamEvent } from "../stream/types.js";
import { isQuotaExhausted, parseRetryAfterHeader, parseRetryDelay } from "../utils/errorParser.js";
import { applySessionUpdate, deriveSessionKey, type SessionStore } from "./sessionStore.js";
import { UpstreamHttpError, type UpstreamTransport } from "./UpstreamClient.js";
import type { UsageTracker } from "./usageTracker.js";

export interface CredentialProvider {
  acquire(): Promise<Credential>;
  invalidate(staleAccessToken: string): Promise<Credential>;
}

export interface BridgeDependencies {
  config: AppConfig;
  credentials: CredentialProvider;
  usage: UsageTracker;
  sessions: SessionStore;
  transport: UpstreamTransport;
}

export interface ChatOptions {
  /** Explicit logical conversation id (X-Session-Id) */
  sessionId?: string;
  signal?: AbortSignal;
}

/**
 * An accepted upstream stream; `close()` must be called once the chunks are consumed
 */
export interface OpenedChat {
  chunks: ChunkStream;
  context: ResponseContext;
  close(completed: boolean): void;
}

export class BridgeService {
  constructor(private readonly deps: BridgeDependencies) {}

  /**
   * Validate an inbound Chat Completions body
   */
  parseRequest(body: unknown): ChatCompletionRequest {
    const parsed = chatCompletionRequestSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const path = issue?.path.join(".") ?? "";
      throw new BridgeError(
        "invalid_request",
        `Invalid request${path ? ` at ${path}` : ""}: ${issue?.message ?? "malformed body"}`
      );
    }
    return parsed.data;
  }

  /**
   * Non-streaming completion
   */
  async complete(request: ChatCompletionRequest, options: ChatOptions = {}): Promise<OpenAIChatResponse> {
    const opened = await this.open(request, options);
    let completed = false;
    try {
      const aggregate = await aggregateChunks(opened.chunks, opened.chunks.citations);
      completed = true;
      return formatResponse(aggregate, opened.context);
    } finally {
      opened.close(completed);
    }
  }

  /**
   * Translate the request and open the upstream stream; nothing has been sent to the caller yet
   */
  async open(request: ChatCompletionRequest, options: ChatOptions = {}): Promise<OpenedChat> {
    const { config, sessions } = this.deps;
    await this.checkQuota();

    const conversation = normalize(toConversationTurns(request.messages));
    requireUserContent(conversation);

    const lease = await sessions.lease(deriveSessionKey(options.sessionId, firstUserText(request.messages)));
    try {
      const outbound = translate(
        conversation,
        { requested: toRequestedModels(request), defaults: config.models },
        toToolDefinitions(request.tools),
        lease.state,
        { toolChoice: toToolChoice(request) }
      );

      const context: ResponseContext = {
        id: generateRequestId(),
        created: unixSeconds(),
        model: request.model ?? outbound.settings.model_config.base,
      };
      logger.debug(
        `[${context.id}] model=${outbound.settings.model_config.base} history=${outbound.task_context.tasks[0]?.messages.length ?? 0} tools=${outbound.mcp_context?.tools.length ?? 0}`
      );

      const source = await this.openUpstream(outbound, options.signal);
      const chunks = new ChunkStream(this.decodeEvents(source, lease.state), {
        signal: options.signal,
        idleTimeoutMs: config.stream.idleTimeoutMs,
        deadlineMs: config.stream.deadlineMs,
      });

      return {
        chunks,
        context,
        close: (completed) => {
          if (completed) this.deps.usage.recordRequest();
          lease.release();
        },
      };
    } catch (error) {
      lease.release();
      throw error;
    }
  }

  async usage(): Promise<UsageSnapshot> {
    return this.deps.usage.snapshot();
  }

  // ============================================
  // Internals
  // ============================================

  private async checkQuota(): Promise<void> {
    const { usage, config } = this.deps;

    if (config.usage.enforce) {
      try {
        await usage.snapshot();
      } catch (error) {
        logger.debug(`Usage unknown, not throttling: ${errorMessage(error)}`);
      }
    } else {
      // 建议模式：不阻塞请求，只为后续的告警准备数据
      usage.refreshInBackground();
    }

    if (!usage.shouldThrottle("chat")) return;

    const snapshot = usage.peek();
    const detail = snapshot ? `${snapshot.windowUsed}/${snapshot.windowLimit}` : "unknown";
    if (config.usage.enforce) {
      throw new BridgeError("quota_exceeded", `Upstream request quota nearly exhausted (${detail})`, {
        retryAfterMs: snapshot ? Math.max(0, snapshot.resetsAt - Date.now()) : undefined,
      });
    }
    logger.warn(`Upstream request quota nearly exhausted (${detail})`);
  }

  /**
   * Open the upstream stream; a rejected credential is replaced and the request sent once more
   */
  private async openUpstream(request: OutboundRequest, signal?: AbortSignal): Promise<AsyncIterable<unknown>> {
    const { credentials, transport } = this.deps;
    const credential = await credentials.acquire();

    try {
      return await transport.open(request, credential.accessToken, signal);
    } catch (error) {
      if (!(error instanceof UpstreamHttpError) || !isCredentialRejection(error)) {
        throw toUpstreamError(error);
      }
      logger.warn(`Upstream rejected credential (HTTP ${error.status}), retrying with a new one`);
    }

    const fresh = await credentials.invalidate(credential.accessToken);
    try {
      return await transport.open(request, fresh.accessToken, signal);
    } catch (error) {
      throw toUpstreamError(error);
    }
  }

  private async *decodeEvents(
    source: AsyncIterable<unknown>,
    session: SessionState
  ): AsyncGenerator<StreamEvent, void, undefined> {
    for await (const raw of source) {
      const decoded = decodeUpstreamEvent(raw);
      if (decoded.session) {
        applySessionUpdate(session, decoded.session);
      }
      yield* decoded.events;
    }
  }
}

function isCredentialRejection(error: UpstreamHttpError): boolean {
  return error.status === 401 || isQuotaExhausted(error.status, error.body, QUOTA_EXHAUSTED_MARKERS);
}

function toUpstreamError(error: unknown): BridgeError {
  if (error instanceof UpstreamHttpError) {
    if (error.status === 429) {
      return new BridgeError("quota_exceeded", `Upstream rate limited the request: ${error.body.slice(0, 200)}`, {
        details: { status: error.status },
        retryAfterMs: parseRetryAfterHeader(error.retryAfter) ?? parseRetryDelay(error.body),
      });
    }
    return new BridgeError("upstream_error", error.message, {
      details: { status: error.status },
      transient: error.status >= 500,
    });
  }
  if (error instanceof BridgeError) {
    return error;
  }
  return new BridgeError("upstream_error", `Upstream request failed: ${errorMessage(error)}`, { cause: error });
}

import type { Context } from "hono";
import { streamSSE } from "hono/streaming";
import { BridgeError, toBridgeError } from "../../../shared/errors.js";
import { logger } from "../../../shared/logger.js";
import type { BridgeService } from "../../services/BridgeService.js";
import { formatChunk } from "../../translator/openai-chat/index.js";

/**
 * OpenAI Chat Completions API
 * POST /v1/chat/completions
 */
export function chatCompletions(bridge: BridgeService) {
  return async (c: Context) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      throw new BridgeError("invalid_request", "Request body must be valid JSON");
    }

    const request = bridge.parseRequest(body);
    const sessionId = c.req.header("x-session-id");

    if (!request.stream) {
      const response = await bridge.complete(request, { sessionId, signal: c.req.raw.signal });
      return c.json(response);
    }

    // 上游在发送任何数据前失败时，由 errorHandler 返回普通 HTTP 错误
    const controller = new AbortController();
    const opened = await bridge.open(request, { sessionId, signal: controller.signal });

    return streamSSE(
      c,
      async (stream) => {
        stream.onAbort(() => {
          logger.debug(`[${opened.context.id}] Client disconnected`);
          controller.abort();
        });

        let completed = false;
        try {
          for await (const chunk of opened.chunks) {
            await stream.writeSSE({ data: JSON.stringify(formatChunk(chunk, opened.context)) });
            if (chunk.kind === "finish") completed = true;
          }
        } finally {
          opened.close(completed);
        }

        if (!controller.signal.aborted) {
          await stream.writeSSE({ data: "[DONE]" });
        }
      },
      async (err, stream) => {
        const error = toBridgeError(err);
        logger.error(`[${opened.context.id}] Stream failed: ${error.message}`);
        await stream.writeSSE({
          data: JSON.stringify(formatChunk({ kind: "error", error }, opened.context)),
        });
        await stream.writeSSE({ data: "[DONE]" });
      }
    );
  };
}

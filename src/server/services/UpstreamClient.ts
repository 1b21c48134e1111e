import { EventSourceParserStream } from "eventsource-parser/stream";
import { BridgeError } from "../../shared/errors.js";
import { logger } from "../../shared/logger.js";
import type { UpstreamConfig } from "../../shared/types.js";
import { errorMessage } from "../../shared/utils.js";
import type { OutboundRequest } from "../translator/types.js";
import { clientHeaders, type FetchLike } from "./graphql.js";

/**
 * Non-2xx answer from the upstream when opening a stream
 */
export class UpstreamHttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string,
    public readonly retryAfter?: string
  ) {
    super(`Upstream returned HTTP ${status}: ${body.slice(0, 200)}`);
    this.name = "UpstreamHttpError";
  }
}

export interface UpstreamTransport {
  /**
   * Resolves once the upstream accepted the request; the iterable yields raw decoded events
   */
  open(request: OutboundRequest, accessToken: string, signal?: AbortSignal): Promise<AsyncIterable<unknown>>;
}

/**
 * Posts the JSON form of the request to the codec endpoint and reads back its SSE stream
 */
export class HttpUpstreamTransport implements UpstreamTransport {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly config: UpstreamConfig,
    fetchImpl?: FetchLike
  ) {
    this.fetchImpl = fetchImpl ?? fetch;
  }

  async open(request: OutboundRequest, accessToken: string, signal?: AbortSignal): Promise<AsyncIterable<unknown>> {
    const url = new URL(this.config.streamPath, this.config.codecUrl).toString();
    logger.debug(`Calling upstream stream: ${url}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "text/event-stream",
          Authorization: `Bearer ${accessToken}`,
          ...clientHeaders(this.config),
        },
        body: JSON.stringify({
          json_data: request,
          message_type: this.config.messageType,
        }),
        signal,
      });
    } catch (error) {
      throw new BridgeError("upstream_error", `Upstream request failed: ${errorMessage(error)}`, {
        transient: true,
        cause: error,
      });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw new UpstreamHttpError(response.status, text, response.headers.get("retry-after") ?? undefined);
    }

    if (!response.body) {
      throw new BridgeError("upstream_error", "Upstream returned an empty body");
    }

    return readEvents(response.body);
  }
}

/**
 * Raw events from an SSE body; `[DONE]` ends the stream
 */
export async function* readEvents(body: ReadableStream<Uint8Array>): AsyncGenerator<unknown, void, undefined> {
  const reader = body
    .pipeThrough(new TextDecoderStream())
    .pipeThrough(new EventSourceParserStream())
    .getReader();

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) return;

      const data = value.data.trim();
      if (!data) continue;
      if (data === "[DONE]") return;

      let event: unknown;
      try {
        event = JSON.parse(data);
      } catch {
        logger.debug(`Skipping non-JSON upstream frame: ${data.slice(0, 100)}`);
        continue;
      }
      yield event;
    }
  } finally {
    await reader.cancel().catch((error: unknown) => {
      logger.debug(`Cancelling upstream body failed: ${errorMessage(error)}`);
    });
  }
}

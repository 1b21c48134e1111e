/**
 * Stream Transformer
 *
 * StreamEvent 异步序列 → OutputChunk 异步序列（流式）或单个聚合响应（非流式）
 *
 * 状态: idle → streaming | tool_calling → finished | errored
 * 聚合模式直接折叠流式输出，两种模式的最终内容一致
 */

import { BridgeError, toBridgeError } from "../../shared/errors.js";
import { logger } from "../../shared/logger.js";
import type { OpenAIFinishReason, OpenAIToolCall } from "../../shared/types.js";
import type {
  AggregateResponse,
  Citation,
  OutputChunk,
  StreamEvent,
  StreamState,
  UpstreamFinishReason,
} from "./types.js";

export interface TransformOptions {
  signal?: AbortSignal;
  /** Longest gap between two upstream events */
  idleTimeoutMs?: number;
  /** Overall budget for the whole stream */
  deadlineMs?: number;
}

export type StreamingOptions = TransformOptions & { mode?: "streaming" };
export type AggregateOptions = TransformOptions & { mode: "aggregate" };

const ABORTED = Symbol("aborted");

type NextResult = IteratorResult<StreamEvent> | typeof ABORTED;

export function mapFinishReason(reason: UpstreamFinishReason, toolCallsEmitted: boolean): OpenAIFinishReason {
  switch (reason) {
    case "tool_invocation_requested":
      return "tool_calls";
    case "length_limited":
      return "length";
    case "content_complete":
      return toolCallsEmitted ? "tool_calls" : "stop";
  }
}

export class ChunkStream implements AsyncIterable<OutputChunk> {
  /** Citations seen so far; never emitted as chunks */
  readonly citations: Citation[] = [];
  private currentState: StreamState = "idle";
  private started = false;

  constructor(
    private readonly source: AsyncIterable<StreamEvent>,
    private readonly options: TransformOptions = {}
  ) {}

  get state(): StreamState {
    return this.currentState;
  }

  [Symbol.asyncIterator](): AsyncIterator<OutputChunk> {
    if (this.started) {
      throw new Error("ChunkStream can only be iterated once");
    }
    this.started = true;
    return this.run();
  }

  private async *run(): AsyncGenerator<OutputChunk, void, undefined> {
    const iterator = this.source[Symbol.asyncIterator]();
    const deadlineAt =
      this.options.deadlineMs !== undefined ? Date.now() + this.options.deadlineMs : undefined;
    const toolIndexes = new Map<string, number>();
    let roleSent = false;
    let upstreamDone = false;
    let interrupted = false;

    try {
      while (true) {
        let result: NextResult;
        try {
          result = await this.next(iterator, deadlineAt);
        } catch (error) {
          interrupted = true;
          yield this.fail(toBridgeError(error, "upstream_error", "Upstream stream failed"));
          return;
        }

        if (result === ABORTED) {
          interrupted = true;
          logger.debug("Stream cancelled by consumer");
          return;
        }

        if (result.done) {
          upstreamDone = true;
          if (!roleSent) yield { kind: "role" };
          yield this.finish(mapFinishReason("content_complete", toolIndexes.size > 0));
          return;
        }

        const event = result.value;
        switch (event.type) {
          case "citation":
            this.citations.push(event.citation);
            break;

          case "text_delta":
            if (!event.text) break;
            if (!roleSent) {
              roleSent = true;
              yield { kind: "role" };
            }
            this.currentState = "streaming";
            yield { kind: "text", text: event.text };
            break;

          case "tool_call_delta": {
            if (!roleSent) {
              roleSent = true;
              yield { kind: "role" };
            }
            this.currentState = "tool_calling";
            const known = toolIndexes.get(event.id);
            if (known === undefined) {
              const index = toolIndexes.size;
              toolIndexes.set(event.id, index);
              yield { kind: "tool_call", index, id: event.id, name: event.name, argumentsDelta: event.argumentsDelta };
            } else {
              yield { kind: "tool_call", index: known, argumentsDelta: event.argumentsDelta };
            }
            break;
          }

          case "finish":
            if (!roleSent) yield { kind: "role" };
            yield this.finish(mapFinishReason(event.reason, toolIndexes.size > 0));
            return;

          case "error":
            yield this.fail(
              new BridgeError(event.code === "quota_exceeded" ? "quota_exceeded" : "upstream_error", event.message)
            );
            return;
        }
      }
    } finally {
      if (!upstreamDone) {
        this.closeSource(iterator, interrupted);
      }
    }
  }

  private finish(reason: OpenAIFinishReason): OutputChunk {
    this.currentState = "finished";
    return { kind: "finish", reason };
  }

  private fail(error: BridgeError): OutputChunk {
    this.currentState = "errored";
    logger.warn(`Stream ended with error [${error.code}]: ${error.message}`);
    return { kind: "error", error };
  }

  /**
   * Stop pulling upstream; a source with a pending read is not awaited
   */
  private closeSource(iterator: AsyncIterator<StreamEvent>, interrupted: boolean): void {
    if (!iterator.return) return;
    const closing = iterator.return();
    closing.then(
      () => undefined,
      (error: unknown) => logger.debug(`Closing upstream stream failed: ${String(error)}`)
    );
    if (!interrupted) {
      logger.debug("Upstream stream closed before exhaustion");
    }
  }

  /**
   * Next upstream event, bounded by the idle timeout, the deadline and the abort signal
   */
  private next(iterator: AsyncIterator<StreamEvent>, deadlineAt: number | undefined): Promise<NextResult> {
    const { signal, idleTimeoutMs } = this.options;

    if (signal?.aborted) {
      return Promise.resolve(ABORTED);
    }

    const remaining = deadlineAt !== undefined ? deadlineAt - Date.now() : undefined;
    if (remaining !== undefined && remaining <= 0) {
      return Promise.reject(deadlineError(this.options.deadlineMs));
    }

    return new Promise<NextResult>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const cleanup = () => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };
      const onAbort = () => {
        cleanup();
        resolve(ABORTED);
      };

      const useDeadline = remaining !== undefined && (idleTimeoutMs === undefined || remaining < idleTimeoutMs);
      const wait = useDeadline ? remaining : idleTimeoutMs;
      if (wait !== undefined) {
        timer = setTimeout(() => {
          cleanup();
          reject(
            useDeadline
              ? deadlineError(this.options.deadlineMs)
              : new BridgeError("stream_stalled", `No upstream event received for ${wait}ms`)
          );
        }, wait);
      }

      signal?.addEventListener("abort", onAbort, { once: true });

      iterator.next().then(
        (result) => {
          cleanup();
          resolve(result);
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        }
      );
    });
  }
}

function deadlineError(deadlineMs: number | undefined): BridgeError {
  return new BridgeError("deadline_exceeded", `Upstream stream exceeded its ${deadlineMs ?? 0}ms deadline`);
}

// ============================================
// Aggregate
// ============================================

/**
 * Fold streaming chunks into one response; an error chunk is thrown
 */
export async function aggregateChunks(
  chunks: AsyncIterable<OutputChunk>,
  citations: Citation[] = []
): Promise<AggregateResponse> {
  let content = "";
  let finishReason: OpenAIFinishReason = "stop";
  const toolCalls: OpenAIToolCall[] = [];

  for await (const chunk of chunks) {
    switch (chunk.kind) {
      case "role":
        break;
      case "text":
        content += chunk.text;
        break;
      case "tool_call": {
        const existing = toolCalls[chunk.index];
        if (existing) {
          existing.function.arguments += chunk.argumentsDelta;
        } else {
          toolCalls[chunk.index] = {
            id: chunk.id ?? `call_${chunk.index}`,
            type: "function",
            function: { name: chunk.name ?? "", arguments: chunk.argumentsDelta },
          };
        }
        break;
      }
      case "finish":
        finishReason = chunk.reason;
        break;
      case "error":
        throw chunk.error;
    }
  }

  return { content, toolCalls, finishReason, citations };
}

export function transformStream(source: AsyncIterable<StreamEvent>, options?: StreamingOptions): ChunkStream;
export function transformStream(
  source: AsyncIterable<StreamEvent>,
  options: AggregateOptions
): Promise<AggregateResponse>;
export function transformStream(
  source: AsyncIterable<StreamEvent>,
  options: StreamingOptions | AggregateOptions = {}
): ChunkStream | Promise<AggregateResponse> {
  const stream = new ChunkStream(source, options);
  return options.mode === "aggregate" ? aggregateChunks(stream, stream.citations) : stream;
}

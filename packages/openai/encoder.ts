/**
 * OpenAI chat-completions chunk encoder.
 *
 * @module
 */

import { randomUUID } from "node:crypto";
import {
  applyAddition,
  jsonFrame,
  type ProtocolEncoder,
  rawFrame,
  type RunItem,
  type RunItemContext,
  type WireFrame,
} from "@agentwire/core";

export type FinishReason = "stop" | "tool_calls";

/** Fixed for the whole run: every chunk repeats it. */
export interface CompletionMeta {
  readonly id: string;
  readonly created: number;
  readonly model: string;
}

export type ChatCompletionChunk = {
  id: string;
  object: "chat.completion.chunk";
  created: number;
  model: string;
  choices: [{
    index: 0;
    delta: Record<string, unknown>;
    finish_reason: FinishReason | null;
  }];
};

export type OpenAIErrorBody = {
  error: { message: string; type: string; code: string };
};

export const DONE_MESSAGE = "data: [DONE]\n\n";

export function createCompletionId(): string {
  return `chatcmpl-${randomUUID().replaceAll("-", "").slice(0, 12)}`;
}

export function createCompletionMeta(model: string): CompletionMeta {
  return Object.freeze({
    id: createCompletionId(),
    created: Math.floor(Date.now() / 1000),
    model,
  });
}

export function createChunk(
  meta: CompletionMeta,
  delta: Record<string, unknown>,
  finishReason: FinishReason | null = null,
): ChatCompletionChunk {
  return {
    id: meta.id,
    object: "chat.completion.chunk",
    created: meta.created,
    model: meta.model,
    choices: [{ index: 0, delta, finish_reason: finishReason }],
  };
}

export function createErrorBody(message: string, code: string): OpenAIErrorBody {
  return { error: { message, type: "server_error", code } };
}

function withRole(
  delta: Record<string, unknown>,
  context: RunItemContext,
): Record<string, unknown> {
  return context.firstContent ? { role: "assistant", ...delta } : delta;
}

/**
 * Encodes run items as `chat.completion.chunk` frames. Text becomes
 * `delta.content`, tool calls become `delta.tool_calls` keyed by their
 * first-seen index, and the run ends with a finish chunk and `[DONE]`
 * (`[DONE]` alone when nothing was streamed).
 * An error produces a single error frame and nothing after it.
 */
export class OpenAIEncoder implements ProtocolEncoder {
  readonly meta: CompletionMeta;

  constructor(meta: CompletionMeta) {
    this.meta = meta;
  }

  encode(item: RunItem, context: RunItemContext): WireFrame[] {
    switch (item.type) {
      case "TEXT_MESSAGE_CONTENT": {
        if (!item.delta) return [];
        const delta = withRole({ content: item.delta }, context);
        return [this.#chunk(applyAddition(delta, item.event))];
      }

      case "TOOL_CALL_START":
        return [
          this.#chunk(withRole({
            tool_calls: [{
              index: item.index,
              id: item.toolCallId,
              type: "function",
              function: { name: item.name, arguments: "" },
            }],
          }, context)),
        ];

      case "TOOL_CALL_ARGS": {
        if (!item.delta) return [];
        const delta = {
          tool_calls: [{ index: item.index, function: { arguments: item.delta } }],
        };
        return [this.#chunk(applyAddition(delta, item.event))];
      }

      case "RAW":
        return [rawFrame(item.raw)];

      case "RUN_ERROR":
        return [jsonFrame(createErrorBody(item.message, item.code))];

      case "RUN_FINISHED":
        // A run that produced nothing ends with the done marker alone.
        if (!context.hasContent) return [rawFrame(DONE_MESSAGE)];
        return [
          this.#chunk({}, context.toolCallCount > 0 ? "tool_calls" : "stop"),
          rawFrame(DONE_MESSAGE),
        ];

      default:
        return [];
    }
  }

  #chunk(
    delta: Record<string, unknown>,
    finishReason: FinishReason | null = null,
  ): WireFrame {
    return jsonFrame(createChunk(this.meta, delta, finishReason));
  }
}

export function createOpenAIEncoder(options: { model: string }): OpenAIEncoder {
  return new OpenAIEncoder(createCompletionMeta(options.model));
}

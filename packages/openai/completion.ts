import type { RunStep } from "@agentwire/core";
import {
  type CompletionMeta,
  createErrorBody,
  type FinishReason,
  type OpenAIErrorBody,
} from "./encoder.ts";

export type CompletionToolCall = {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
};

export type ChatCompletion = {
  id: string;
  object: "chat.completion";
  created: number;
  model: string;
  choices: [{
    index: 0;
    message: {
      role: "assistant";
      content: string | null;
      tool_calls?: CompletionToolCall[];
    };
    finish_reason: FinishReason;
  }];
};

export type CompletionResult =
  | { ok: true; completion: ChatCompletion }
  | { ok: false; error: OpenAIErrorBody };

/**
 * Folds the steps of a finished run into one `chat.completion` object. Text
 * is concatenated; tool calls are listed in the order they started, with
 * their argument fragments joined. A run that errored yields the error body
 * instead.
 */
export function aggregateCompletion(
  steps: Iterable<RunStep>,
  meta: CompletionMeta,
): CompletionResult {
  let content: string | null = null;
  const toolCalls = new Map<string, CompletionToolCall>();

  for (const { item } of steps) {
    switch (item.type) {
      case "TEXT_MESSAGE_CONTENT":
        content = (content ?? "") + item.delta;
        break;
      case "TOOL_CALL_START":
        toolCalls.set(item.toolCallId, {
          id: item.toolCallId,
          type: "function",
          function: { name: item.name, arguments: "" },
        });
        break;
      case "TOOL_CALL_ARGS": {
        const call = toolCalls.get(item.toolCallId);
        if (call) call.function.arguments += item.delta;
        break;
      }
      case "RUN_ERROR":
        return { ok: false, error: createErrorBody(item.message, item.code) };
    }
  }

  const message: ChatCompletion["choices"][0]["message"] = {
    role: "assistant",
    content,
  };
  if (toolCalls.size > 0) message.tool_calls = [...toolCalls.values()];

  return {
    ok: true,
    completion: {
      id: meta.id,
      object: "chat.completion",
      created: meta.created,
      model: meta.model,
      choices: [{
        index: 0,
        message,
        finish_reason: toolCalls.size > 0 ? "tool_calls" : "stop",
      }],
    },
  };
}

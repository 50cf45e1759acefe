/**
 * Converts the streams of graph-based agent frameworks into agent output.
 *
 * Three stream shapes are recognized:
 *
 * - stream events: `{ event: "on_*", name?, run_id?, data }`
 * - node updates: `{ [nodeName]: stateUpdate }`
 * - state values: the full state, `{ messages: [...], ... }`
 *
 * @example
 * ```ts
 * const invoker = new Invoker((request) =>
 *   convertAgentStream(graph.streamEvents(toInput(request), { version: "v2" }))
 * );
 * ```
 *
 * @module
 */

import z from "zod";
import { getLogger } from "@logtape/logtape";
import { isObservable, type Observable } from "rxjs";
import { eachValueFrom } from "rxjs-for-await";
import {
  type AgentEvent,
  errorEvent,
  toolCallChunkEvent,
  toolResultEvent,
} from "@agentwire/core";
import { isRecord } from "@agentwire/utils";
import {
  extractText,
  getMessageContent,
  getMessageToolCalls,
  getMessageType,
  getToolCallChunks,
  getToolCallId,
} from "./message.ts";

const logger = getLogger(["agentwire", "adapter", "converter"]);

/** What the converter produces: text deltas and canonical events. */
export type ConvertedItem = string | AgentEvent;

export const StreamShape = {
  EVENTS: "events",
  UPDATES: "updates",
  VALUES: "values",
} as const;
export type StreamShape = typeof StreamShape[keyof typeof StreamShape];

const StreamEvent = z.object({
  event: z.string().startsWith("on_"),
  name: z.string().optional().catch(undefined),
  run_id: z.string().optional().catch(undefined),
  data: z.record(z.string(), z.unknown()).catch({}),
});
type StreamEvent = z.infer<typeof StreamEvent>;

/** Keys injected into tool inputs by the framework runtime. */
const INTERNAL_INPUT_KEYS: ReadonlySet<string> = new Set([
  "runtime",
  "__pregel_runtime",
  "__pregel_task_id",
  "__pregel_send",
  "__pregel_read",
  "__pregel_checkpointer",
  "__pregel_scratchpad",
  "__pregel_call",
  "config",
  "configurable",
]);

/** Failure notifications reported with the name of what failed. */
const NAMED_ERROR_EVENTS: Readonly<
  Record<string, { code: string; label: string }>
> = {
  on_tool_error: { code: "TOOL_ERROR", label: "Tool" },
  on_chain_error: { code: "CHAIN_ERROR", label: "Chain" },
  on_retriever_error: { code: "RETRIEVER_ERROR", label: "Retriever" },
};

export interface ConverterOptions {
  /** State key holding the message list. @default "messages" */
  messagesKey?: string;
}

/** Detects which of the three stream shapes `value` has. */
export function detectStreamShape(
  value: unknown,
  messagesKey = "messages",
): StreamShape | undefined {
  if (!isRecord(value)) return undefined;
  if ("event" in value) {
    return typeof value.event === "string" && value.event.startsWith("on_")
      ? StreamShape.EVENTS
      : undefined;
  }
  if (Array.isArray(value[messagesKey])) return StreamShape.VALUES;
  for (const [key, update] of Object.entries(value)) {
    if (key !== "__end__" && isRecord(update)) return StreamShape.UPDATES;
  }
  return undefined;
}

export function safeJsonStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch (error) {
    logger.debug("Value is not JSON-serializable: {message}", {
      message: error instanceof Error ? error.message : String(error),
    });
    return String(value);
  }
}

function stringifyArgs(args: unknown): string {
  if (args === undefined || args === null || args === "") return "";
  if (typeof args === "string") return args;
  if (isRecord(args) && Object.keys(args).length === 0) return "";
  return typeof args === "object" ? safeJsonStringify(args) : String(args);
}

/** Drops runtime-injected and underscore-prefixed keys from a tool input. */
export function filterToolInput(input: unknown): unknown {
  if (!isRecord(input)) return input;
  const filtered: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (INTERNAL_INPUT_KEYS.has(key) || key.startsWith("_")) continue;
    filtered[key] = value;
  }
  return filtered;
}

/** Original tool call id carried by an injected tool runtime, if any. */
function runtimeToolCallId(input: unknown): string | undefined {
  if (!isRecord(input) || !isRecord(input.runtime)) return undefined;
  const id = input.runtime.tool_call_id ?? input.runtime.toolCallId;
  return typeof id === "string" && id ? id : undefined;
}

/**
 * Text of a tool output: its `content`, `result` or `output` field when it
 * has one, otherwise the whole value.
 */
export function formatToolOutput(output: unknown): string {
  if (output === undefined || output === null) return "";
  if (typeof output === "string") return output;
  if (isRecord(output)) {
    for (const key of ["content", "result", "output"]) {
      if (!(key in output)) continue;
      const value = output[key];
      if (value === undefined || value === null) return "";
      return typeof value === "object" ? safeJsonStringify(value) : String(value);
    }
    return safeJsonStringify(output);
  }
  return typeof output === "object" ? safeJsonStringify(output) : String(output);
}

function formatErrorValue(error: unknown): string {
  if (error === undefined || error === null) return "";
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return typeof error === "string" ? error : safeJsonStringify(error);
}

/**
 * Stateful converter for one framework stream. Keeps the tables that
 * correlate tool calls across items:
 *
 * - stream index to tool call id, for argument fragments without an id
 * - tool name to the ids announced by the model, oldest first
 * - framework run id to tool call id, for tool start and end notifications
 *
 * Use one converter per stream.
 */
export class AgentStreamConverter {
  readonly messagesKey: string;

  readonly #indexToId = new Map<number, string>();
  readonly #started = new Set<string>();
  readonly #idsByName = new Map<string, string[]>();
  readonly #runToId = new Map<string, string>();

  constructor(options: ConverterOptions = {}) {
    this.messagesKey = options.messagesKey ?? "messages";
  }

  /** Converts one stream item. Items of no known shape yield nothing. */
  convert(item: unknown): ConvertedItem[] {
    const shape = detectStreamShape(item, this.messagesKey);
    if (!shape || !isRecord(item)) return [];

    switch (shape) {
      case StreamShape.EVENTS: {
        const parsed = StreamEvent.safeParse(item);
        if (!parsed.success) return [];
        logger.debug("Converting {event} event", {
          event: parsed.data.event,
          name: parsed.data.name,
          runId: parsed.data.run_id,
        });
        return this.#convertEvent(parsed.data);
      }
      case StreamShape.UPDATES:
        return this.#convertUpdates(item);
      case StreamShape.VALUES:
        return this.#convertValues(item);
    }
  }

  reset(): void {
    this.#indexToId.clear();
    this.#started.clear();
    this.#idsByName.clear();
    this.#runToId.clear();
  }

  // ===========================================================================
  // Stream events
  // ===========================================================================

  #convertEvent(event: StreamEvent): ConvertedItem[] {
    switch (event.event) {
      case "on_chat_model_stream":
        return this.#onModelStream(event.data.chunk);
      case "on_chain_stream":
        return event.name === "model" ? this.#onChainStream(event.data.chunk) : [];
      case "on_tool_start":
        return this.#onToolStart(event);
      case "on_tool_end":
        return this.#onToolEnd(event);
    }

    const detail = formatErrorValue(event.data.error);
    if (event.event === "on_llm_error") {
      return [errorEvent({ message: `LLM error: ${detail}`, code: "LLM_ERROR" })];
    }
    const named = NAMED_ERROR_EVENTS[event.event];
    if (!named) return [];
    return [errorEvent({
      message: event.name ? `${named.label} '${event.name}' error: ${detail}` : detail,
      code: named.code,
    })];
  }

  #onModelStream(chunk: unknown): ConvertedItem[] {
    if (!isRecord(chunk)) return [];
    const out: ConvertedItem[] = [];

    const text = extractText(chunk.content);
    if (text) out.push(text);

    for (const call of getToolCallChunks(chunk)) {
      const rawId = call.id || undefined;
      const index = call.index ?? undefined;
      let id: string;
      if (rawId) {
        id = rawId;
        if (index !== undefined) this.#indexToId.set(index, id);
      } else if (index !== undefined) {
        id = this.#indexToId.get(index) ?? String(index);
      } else {
        continue;
      }

      const name = call.name || undefined;
      const argsDelta = stringifyArgs(call.args);
      if (rawId && name && !this.#started.has(id)) {
        this.#announce(id, name);
        out.push(toolCallChunkEvent({ id, name, args_delta: argsDelta }));
      } else if (argsDelta) {
        out.push(toolCallChunkEvent({ id, args_delta: argsDelta }));
      }
    }
    return out;
  }

  #onChainStream(chunk: unknown): ConvertedItem[] {
    if (!isRecord(chunk) || !Array.isArray(chunk.messages)) return [];
    const out: ConvertedItem[] = [];

    for (const message of chunk.messages) {
      const text = getMessageContent(message);
      if (text) out.push(text);

      for (const call of getMessageToolCalls(message)) {
        if (!call.id || this.#started.has(call.id)) continue;
        this.#announce(call.id, call.name);
        out.push(toolCallChunkEvent({
          id: call.id,
          name: call.name,
          args_delta: stringifyArgs(call.args),
        }));
      }
    }
    return out;
  }

  /** Records a call the model announced, so tool start can find its id. */
  #announce(id: string, name: string) {
    this.#started.add(id);
    if (!name) return;
    const ids = this.#idsByName.get(name) ?? [];
    ids.push(id);
    this.#idsByName.set(name, ids);
  }

  #onToolStart(event: StreamEvent): ConvertedItem[] {
    const runId = event.run_id ?? "";
    const name = event.name ?? "";
    const input = event.data.input;

    const id = runtimeToolCallId(input) ??
      (name ? this.#idsByName.get(name)?.shift() : undefined) ??
      runId;
    if (!id) return [];
    if (runId) this.#runToId.set(runId, id);

    if (this.#started.has(id)) return [];
    this.#started.add(id);
    return [toolCallChunkEvent({
      id,
      name,
      args_delta: stringifyArgs(filterToolInput(input)),
    })];
  }

  #toolIdForRun(event: StreamEvent): string | undefined {
    const runId = event.run_id ?? "";
    return runtimeToolCallId(event.data.input) ??
      (runId ? this.#runToId.get(runId) : undefined) ??
      (runId || undefined);
  }

  #onToolEnd(event: StreamEvent): ConvertedItem[] {
    const id = this.#toolIdForRun(event);
    if (!id) return [];
    return [toolResultEvent({ id, result: formatToolOutput(event.data.output) })];
  }

  // ===========================================================================
  // State updates and values
  // ===========================================================================

  #messagesOf(state: Record<string, unknown>): unknown[] {
    const messages = state[this.messagesKey];
    if (Array.isArray(messages)) return messages;
    for (const key of ["message", "output", "response"]) {
      const value = state[key];
      if (Array.isArray(value)) return value;
      if (isRecord(value) && "content" in value) return [value];
    }
    return [];
  }

  #convertUpdates(updates: Record<string, unknown>): ConvertedItem[] {
    const out: ConvertedItem[] = [];
    for (const [node, update] of Object.entries(updates)) {
      if (node === "__end__" || !isRecord(update)) continue;
      for (const message of this.#messagesOf(update)) {
        out.push(...convertMessage(message));
      }
    }
    return out;
  }

  #convertValues(state: Record<string, unknown>): ConvertedItem[] {
    const messages = state[this.messagesKey];
    if (!Array.isArray(messages) || messages.length === 0) return [];
    return convertMessage(messages[messages.length - 1]);
  }
}

/**
 * Converts a complete message: assistant text and tool calls, or a tool
 * result.
 */
export function convertMessage(message: unknown): ConvertedItem[] {
  const out: ConvertedItem[] = [];
  switch (getMessageType(message)) {
    case "ai": {
      const text = getMessageContent(message);
      if (text) out.push(text);
      for (const call of getMessageToolCalls(message)) {
        if (!call.id) continue;
        out.push(toolCallChunkEvent({
          id: call.id,
          name: call.name,
          args_delta: stringifyArgs(call.args),
        }));
      }
      break;
    }
    case "tool": {
      const id = getToolCallId(message);
      if (id) {
        out.push(toolResultEvent({ id, result: getMessageContent(message) ?? "" }));
      }
      break;
    }
  }
  return out;
}

export type AgentStreamSource =
  | Iterable<unknown>
  | AsyncIterable<unknown>
  | Observable<unknown>;

/**
 * Converts a whole framework stream with a fresh converter. The result can
 * be returned directly from an agent callback.
 */
export async function* convertAgentStream(
  source: AgentStreamSource,
  options: ConverterOptions = {},
): AsyncGenerator<ConvertedItem, void, undefined> {
  const converter = new AgentStreamConverter(options);
  const items = isObservable(source) ? eachValueFrom(source) : source;
  for await (const item of items) {
    yield* converter.convert(item);
  }
}

/**
 * Readers for framework chat messages, which arrive either as class
 * instances or as their serialized plain-object form.
 *
 * @module
 */

import z from "zod";
import { isRecord } from "@agentwire/utils";

export type MessageType = "ai" | "human" | "tool" | "system" | "unknown";

const TYPE_ALIASES: Record<string, MessageType> = {
  ai: "ai",
  assistant: "ai",
  human: "human",
  user: "human",
  tool: "tool",
  system: "system",
};

const NullableString = z.string().nullish().catch(undefined);

const ToolCallSchema = z.object({
  id: NullableString,
  name: NullableString,
  args: z.unknown(),
});

export const ToolCallChunkSchema = z.object({
  id: NullableString,
  name: NullableString,
  args: z.unknown(),
  index: z.number().int().nullish().catch(undefined),
});
export type ToolCallChunk = z.infer<typeof ToolCallChunkSchema>;

export interface MessageToolCall {
  id: string;
  name: string;
  args: unknown;
}

function normalizeType(value: unknown): MessageType | undefined {
  if (typeof value !== "string") return undefined;
  return TYPE_ALIASES[value.toLowerCase()];
}

function constructorName(value: object): string {
  const ctor: unknown = Reflect.get(value, "constructor");
  return typeof ctor === "function" ? ctor.name.toLowerCase() : "";
}

/**
 * The kind of a message: its `type` or `role` field, then its `_getType()`
 * method, then its class name.
 */
export function getMessageType(message: unknown): MessageType {
  if (!isRecord(message)) return "unknown";

  const declared = normalizeType(message.type) ?? normalizeType(message.role);
  if (declared) return declared;

  const getType = message._getType;
  if (typeof getType === "function") {
    const reported = normalizeType(getType.call(message));
    if (reported) return reported;
  }

  const className = constructorName(message);
  if (className.includes("ai") || className.includes("assistant")) return "ai";
  if (className.includes("tool")) return "tool";
  if (className.includes("human") || className.includes("user")) return "human";
  return "unknown";
}

/**
 * Text of a content value. Multi-part content keeps its string and text
 * parts; other values yield `undefined`.
 */
export function extractText(content: unknown): string | undefined {
  if (typeof content === "string") return content || undefined;
  if (!Array.isArray(content)) return undefined;

  const parts: string[] = [];
  for (const part of content) {
    if (typeof part === "string") parts.push(part);
    else if (isRecord(part) && part.type === "text" && typeof part.text === "string") {
      parts.push(part.text);
    }
  }
  return parts.length > 0 ? parts.join("") : undefined;
}

export function getMessageContent(message: unknown): string | undefined {
  return isRecord(message) ? extractText(message.content) : undefined;
}

export function getMessageToolCalls(message: unknown): MessageToolCall[] {
  if (!isRecord(message) || !Array.isArray(message.tool_calls)) return [];

  const calls: MessageToolCall[] = [];
  for (const item of message.tool_calls) {
    const parsed = ToolCallSchema.safeParse(item);
    if (!parsed.success) continue;
    calls.push({
      id: parsed.data.id ?? "",
      name: parsed.data.name ?? "",
      args: parsed.data.args,
    });
  }
  return calls;
}

export function getToolCallChunks(chunk: unknown): ToolCallChunk[] {
  if (!isRecord(chunk) || !Array.isArray(chunk.tool_call_chunks)) return [];

  const chunks: ToolCallChunk[] = [];
  for (const item of chunk.tool_call_chunks) {
    const parsed = ToolCallChunkSchema.safeParse(item);
    if (parsed.success) chunks.push(parsed.data);
  }
  return chunks;
}

export function getToolCallId(message: unknown): string | undefined {
  if (!isRecord(message)) return undefined;
  const id = message.tool_call_id ?? message.toolCallId;
  return typeof id === "string" && id ? id : undefined;
}

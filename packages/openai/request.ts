import z from "zod";
import {
  type AgentRequest,
  parseMessages,
  parseRequestBody,
  parseTools,
  Protocol,
} from "@agentwire/core";
import { isRecord } from "@agentwire/utils";

/**
 * The fields of a chat-completions body the router reads. Everything else is
 * passed to the agent untouched through `rawRequest`.
 */
export const ChatCompletionRequest = z.object({
  messages: z.array(z.unknown()),
  model: z.string().min(1).optional().catch(undefined),
  stream: z.boolean().optional().catch(undefined),
  tools: z.array(z.unknown()).optional().catch(undefined),
});
export type ChatCompletionRequest = z.infer<typeof ChatCompletionRequest>;

/**
 * Parses a chat-completions body. Only a missing or non-array `messages`
 * field is rejected; malformed messages and tools are skipped.
 */
export function parseChatCompletionRequest(body: unknown): AgentRequest {
  const parsed = parseRequestBody(ChatCompletionRequest, body);
  return {
    protocol: Protocol.OPENAI,
    messages: parseMessages(parsed.messages),
    stream: parsed.stream ?? false,
    tools: parseTools(parsed.tools),
    model: parsed.model,
    rawRequest: isRecord(body) ? body : undefined,
  };
}

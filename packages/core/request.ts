/**
 * Protocol-neutral request model handed to agent callbacks, and the lenient
 * parsers both protocol routers share.
 *
 * @module
 */

import z from "zod";
import { getLogger } from "@logtape/logtape";

const logger = getLogger(["agentwire", "core", "request"]);

export const Protocol = {
  OPENAI: "openai",
  AGUI: "agui",
} as const;
export type Protocol = typeof Protocol[keyof typeof Protocol];

export const MESSAGE_ROLES = [
  "system",
  "developer",
  "user",
  "assistant",
  "tool",
] as const;
export type MessageRole = typeof MESSAGE_ROLES[number];

export interface MessageToolCall {
  id: string;
  name: string;
  /** JSON-encoded arguments. */
  arguments: string;
}

export interface AgentMessage {
  id?: string;
  role: MessageRole;
  content: string;
  name?: string;
  toolCalls?: MessageToolCall[];
  toolCallId?: string;
}

export interface ToolDefinition {
  name: string;
  description?: string;
  parameters?: Record<string, unknown>;
}

/** What an agent callback receives for one run. */
export interface AgentRequest {
  protocol: Protocol;
  messages: AgentMessage[];
  stream: boolean;
  tools?: ToolDefinition[];
  model?: string;
  threadId?: string;
  runId?: string;
  state?: Record<string, unknown>;
  /** The decoded request body, untouched. */
  rawRequest?: Record<string, unknown>;
}

// =============================================================================
// Validation
// =============================================================================

export interface RequestIssue {
  path: string;
  message: string;
}

/**
 * Thrown when a request body cannot be accepted. Raised before any streaming
 * starts, so routers answer it with a 4xx response.
 */
export class RequestValidationError extends Error {
  readonly issues: readonly RequestIssue[];

  constructor(message: string, issues: readonly RequestIssue[] = []) {
    super(message);
    this.name = "RequestValidationError";
    this.issues = issues;
  }
}

/**
 * Parses `body` with `schema`, converting failures into a
 * {@link RequestValidationError}.
 */
export function parseRequestBody<S extends z.ZodType>(
  schema: S,
  body: unknown,
): z.output<S> {
  const result = schema.safeParse(body);
  if (result.success) return result.data;

  const issues = result.error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
  }));
  const detail = issues
    .map(({ path, message }) => `${path || "body"}: ${message}`)
    .join("; ");
  throw new RequestValidationError(`Invalid request: ${detail}`, issues);
}

// =============================================================================
// Lenient message and tool parsing
// =============================================================================

const OptionalString = z.string().optional().catch(undefined);

const RawToolCall = z.object({
  id: OptionalString,
  function: z.object({
    name: z.string(),
    arguments: z.unknown().optional(),
  }),
});

const RawMessage = z.object({
  id: OptionalString,
  role: z.enum(MESSAGE_ROLES).catch("user"),
  content: z.unknown().optional(),
  name: OptionalString,
  tool_calls: z.array(z.unknown()).optional().catch(undefined),
  toolCalls: z.array(z.unknown()).optional().catch(undefined),
  tool_call_id: OptionalString,
  toolCallId: OptionalString,
});

const RawTool = z.union([
  z.object({
    function: z.object({
      name: z.string().min(1),
      description: OptionalString,
      parameters: z.record(z.string(), z.unknown()).optional().catch(undefined),
    }),
  }).transform(({ function: fn }) => fn),
  z.object({
    name: z.string().min(1),
    description: OptionalString,
    parameters: z.record(z.string(), z.unknown()).optional().catch(undefined),
  }),
]);

const ContentPart = z.object({ type: z.string().optional(), text: z.string() });

/**
 * Flattens message content to text. Multi-part content keeps its text parts.
 */
export function normalizeContent(content: unknown): string {
  if (content === undefined || content === null) return "";
  if (typeof content === "string") return content;
  if (Array.isArray(content)) {
    let text = "";
    for (const part of content) {
      const parsed = ContentPart.safeParse(part);
      if (!parsed.success) continue;
      if (parsed.data.type === undefined || parsed.data.type === "text") {
        text += parsed.data.text;
      }
    }
    return text;
  }
  return JSON.stringify(content);
}

function normalizeArguments(args: unknown): string {
  if (args === undefined || args === null) return "";
  return typeof args === "string" ? args : JSON.stringify(args);
}

function parseToolCalls(
  items: unknown[] | undefined,
): MessageToolCall[] | undefined {
  if (!items) return undefined;
  const calls: MessageToolCall[] = [];
  for (const item of items) {
    const parsed = RawToolCall.safeParse(item);
    if (!parsed.success) continue;
    calls.push({
      id: parsed.data.id ?? "",
      name: parsed.data.function.name,
      arguments: normalizeArguments(parsed.data.function.arguments),
    });
  }
  return calls.length > 0 ? calls : undefined;
}

/**
 * Parses chat messages in either the OpenAI (`tool_calls`, `tool_call_id`) or
 * the AG-UI (`toolCalls`, `toolCallId`) spelling. Entries that are not
 * objects are skipped and unknown roles become `"user"`.
 */
export function parseMessages(value: unknown): AgentMessage[] {
  if (!Array.isArray(value)) return [];

  const messages: AgentMessage[] = [];
  for (const item of value) {
    const parsed = RawMessage.safeParse(item);
    if (!parsed.success) continue;

    const raw = parsed.data;
    const message: AgentMessage = {
      role: raw.role,
      content: normalizeContent(raw.content),
    };
    if (raw.id) message.id = raw.id;
    if (raw.name) message.name = raw.name;

    const toolCalls = parseToolCalls(raw.tool_calls ?? raw.toolCalls);
    if (toolCalls) message.toolCalls = toolCalls;

    const toolCallId = raw.tool_call_id ?? raw.toolCallId;
    if (toolCallId) message.toolCallId = toolCallId;

    messages.push(message);
  }
  return messages;
}

/**
 * Parses tool definitions given either as OpenAI function tools or as bare
 * `{ name, description, parameters }` objects. Unusable entries are skipped.
 */
export function parseTools(value: unknown): ToolDefinition[] | undefined {
  if (!Array.isArray(value)) return undefined;

  const tools: ToolDefinition[] = [];
  for (const item of value) {
    const parsed = RawTool.safeParse(item);
    if (!parsed.success) continue;

    const tool: ToolDefinition = { name: parsed.data.name };
    if (parsed.data.description) tool.description = parsed.data.description;
    if (parsed.data.parameters) tool.parameters = parsed.data.parameters;
    tools.push(tool);
  }
  return tools.length > 0 ? tools : undefined;
}

/**
 * Reads a JSON request body. Malformed JSON is a validation error.
 */
export async function readJsonBody(request: Request): Promise<unknown> {
  const text = await request.text();
  try {
    return JSON.parse(text);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new RequestValidationError("Request body must be valid JSON");
    }
    throw error;
  }
}

export interface ErrorResponse {
  status: 400 | 500;
  body: { error: { message: string; type: string } };
}

/**
 * Maps an error raised before streaming starts to an HTTP status and JSON
 * body: 400 for validation errors, 500 for anything else.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof RequestValidationError) {
    return {
      status: 400,
      body: { error: { message: error.message, type: "invalid_request_error" } },
    };
  }
  return {
    status: 500,
    body: {
      error: {
        message: error instanceof Error ? error.message : String(error),
        type: "internal_error",
      },
    },
  };
}

/** Context provided to the error callback. */
export interface ErrorContext {
  /** The path of the endpoint where the error occurred. */
  endpoint: string;
}

export type ErrorHandler = (error: unknown, context: ErrorContext) => void;

/**
 * Logs an error raised by a route before its response started, reports
 * unexpected ones to `onError`, and maps it to a response.
 */
export function handleRouteError(
  error: unknown,
  endpoint: string,
  onError?: ErrorHandler,
): ErrorResponse {
  const response = toErrorResponse(error);
  if (response.status === 400) {
    logger.warn("Rejected request to {endpoint}: {message}", {
      endpoint,
      message: response.body.error.message,
    });
  } else {
    logger.error("Request to {endpoint} failed: {message}", {
      endpoint,
      message: response.body.error.message,
      error,
    });
    onError?.(error, { endpoint });
  }
  return response;
}

import { Hono } from "hono";
import { getLogger } from "@logtape/logtape";
import {
  collectRun,
  type ErrorHandler,
  handleRouteError,
  type Invoker,
  jsonFrame,
  readJsonBody,
  SSE_HEADERS,
  streamRun,
  type ToolCallPolicy,
} from "@agentwire/core";
import { errorCode, formatError } from "@agentwire/utils";
import { aggregateCompletion } from "./completion.ts";
import {
  createCompletionMeta,
  createErrorBody,
  OpenAIEncoder,
} from "./encoder.ts";
import { parseChatCompletionRequest } from "./request.ts";

const logger = getLogger(["agentwire", "openai", "router"]);

export interface OpenAIRouterOptions {
  invoker: Invoker;
  /** Listed by `/models` and used when a request names no model. */
  model: string;
  /** @default "parallel" */
  toolCallPolicy?: ToolCallPolicy;
  /** Called for unexpected errors raised before a response starts. */
  onError?: ErrorHandler;
}

/**
 * Creates the OpenAI-compatible routes:
 *
 * - `POST /chat/completions` streams `chat.completion.chunk` frames when the
 *   body sets `stream: true`, and answers one `chat.completion` otherwise.
 * - `GET /models` lists the configured model.
 */
export function createOpenAIRouter(options: OpenAIRouterOptions): Hono {
  const { invoker, model, toolCallPolicy, onError } = options;
  const app = new Hono();

  app
    .post("/chat/completions", async (c) => {
      const request = parseChatCompletionRequest(await readJsonBody(c.req.raw));
      const meta = createCompletionMeta(request.model ?? model);
      logger.info("Chat completion {id} started", {
        id: meta.id,
        model: meta.model,
        stream: request.stream,
        messages: request.messages.length,
      });

      if (request.stream) {
        const body = streamRun({
          invoker,
          request,
          toolCallPolicy,
          encoder: new OpenAIEncoder(meta),
          onError: (error) => [
            jsonFrame(createErrorBody(formatError(error), errorCode(error))),
          ],
        });
        return c.body(body, 200, { ...SSE_HEADERS });
      }

      const steps = await collectRun({
        invoker,
        request,
        toolCallPolicy,
        signal: c.req.raw.signal,
      });
      const result = aggregateCompletion(steps, meta);
      return result.ok ? c.json(result.completion) : c.json(result.error, 500);
    })
    .get("/models", (c) =>
      c.json({
        object: "list",
        data: [{
          id: model,
          object: "model",
          created: Math.floor(Date.now() / 1000),
          owned_by: "agentwire",
        }],
      }));

  app.onError((error, c) => {
    const { status, body } = handleRouteError(error, c.req.path, onError);
    return c.json(body, status);
  });

  return app;
}

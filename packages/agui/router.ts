import { Hono } from "hono";
import { getLogger } from "@logtape/logtape";
import {
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
import { AguiEncoder, createRunErrorEvent } from "./encoder.ts";
import { parseRunAgentRequest } from "./request.ts";

const logger = getLogger(["agentwire", "agui", "router"]);

export interface AguiRouterOptions {
  invoker: Invoker;
  /** @default "parallel" */
  toolCallPolicy?: ToolCallPolicy;
  /** Called for unexpected errors raised before a response starts. */
  onError?: ErrorHandler;
}

/**
 * Creates the AG-UI routes:
 *
 * - `POST /agent` runs the agent and streams AG-UI events.
 * - `GET /health` reports the protocol and its version.
 */
export function createAguiRouter(options: AguiRouterOptions): Hono {
  const { invoker, toolCallPolicy, onError } = options;
  const app = new Hono();

  app
    .post("/agent", async (c) => {
      const request = parseRunAgentRequest(await readJsonBody(c.req.raw));
      logger.info("AG-UI run started", {
        threadId: request.threadId,
        runId: request.runId,
        messages: request.messages.length,
      });

      const body = streamRun({
        invoker,
        request,
        toolCallPolicy,
        encoder: new AguiEncoder(),
        onError: (error) => [
          jsonFrame(createRunErrorEvent(formatError(error), errorCode(error))),
        ],
      });
      return c.body(body, 200, { ...SSE_HEADERS });
    })
    .get(
      "/health",
      (c) => c.json({ status: "ok", protocol: "ag-ui", version: "1.0" }),
    );

  app.onError((error, c) => {
    const { status, body } = handleRouteError(error, c.req.path, onError);
    return c.json(body, status);
  });

  return app;
}

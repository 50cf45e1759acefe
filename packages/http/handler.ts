import { Hono } from "hono";
import { cors } from "hono/cors";
import { createAguiRouter } from "@agentwire/agui";
import { type AgentHandler, type ErrorHandler, Invoker } from "@agentwire/core";
import { createOpenAIRouter } from "@agentwire/openai";
import { ServerConfig, type ServerConfigInput } from "./config.ts";

/**
 * Options for creating an agent server.
 */
export interface AgentServerOptions {
  /** The agent callback, or an invoker already wrapping one. */
  agent: AgentHandler | Invoker;
  /** Defaults apply to everything left out. */
  config?: ServerConfigInput;
  /**
   * Optional callback for server-side error reporting. Called for unexpected
   * errors raised before a response starts; validation failures are not
   * reported.
   */
  onError?: ErrorHandler;
}

/**
 * Creates a Hono app that serves one agent over every enabled protocol.
 * The returned app can be used as a fetch handler or mounted in another Hono
 * app.
 */
export function createAgentServer(options: AgentServerOptions): Hono {
  const config = ServerConfig.parse(options.config ?? {});
  const invoker = options.agent instanceof Invoker
    ? options.agent
    : new Invoker(options.agent);
  const { onError } = options;

  const app = new Hono();

  if (config.corsOrigins?.length) {
    app.use(cors({ origin: config.corsOrigins }));
  }

  app.get("/health", (c) => c.json({ status: "ok" }));

  if (config.openai.enable) {
    app.route(
      config.openai.prefix,
      createOpenAIRouter({ invoker, model: config.openai.modelName, onError }),
    );
  }

  if (config.agui.enable) {
    app.route(
      config.agui.prefix,
      createAguiRouter({
        invoker,
        toolCallPolicy: config.agui.serializeToolCalls ? "serialized" : "parallel",
        onError,
      }),
    );
  }

  return app;
}

#!/usr/bin/env -S npx tsx
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { serve } from "@hono/node-server";
import { configure, getConsoleSink, getLogger } from "@logtape/logtape";
import { Command } from "commander";
import { config as loadDotenv } from "dotenv";
import z from "zod";
import type { AgentHandler, AgentRequest } from "@agentwire/core";
import { formatError, parsePort } from "@agentwire/utils";
import { type Env, loadServerConfig, type ServerConfig } from "./config.ts";
import { createAgentServer } from "./handler.ts";

const logger = getLogger(["agentwire", "http", "main"]);

const DEFAULT_PORT = 9000;

const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warning",
  "error",
  "fatal",
] as const;

export const CliOptions = z.object({
  port: z.number().int(),
  host: z.string().min(1),
  model: z.string().min(1).optional(),
  serializeToolCalls: z.boolean().optional(),
  corsOrigin: z.array(z.string()).optional(),
  logLevel: z.enum(LOG_LEVELS),
});
export type CliOptions = z.infer<typeof CliOptions>;

/** Parses command-line arguments, without the node and script entries. */
export function parseCliOptions(args: string[], env: Env = process.env): CliOptions {
  const program = new Command()
    .name("agentwire-demo")
    .description("Serves a demo echo agent over the OpenAI and AG-UI protocols")
    .option(
      "-p, --port <port>",
      "Port to listen on",
      (value: string) => parsePort(value, DEFAULT_PORT),
      parsePort(env.PORT, DEFAULT_PORT),
    )
    .option("--host <host>", "Host to bind to", env.HOST || "0.0.0.0")
    .option("-m, --model <model>", "Model name reported by the OpenAI routes")
    .option("--serialize-tool-calls", "Emit AG-UI tool calls one at a time")
    .option("--cors-origin <origin...>", "Allowed CORS origins")
    .option("--log-level <level>", "Lowest level to log", "info")
    .parse(args, { from: "user" });

  return CliOptions.parse(program.opts());
}

/** Server configuration from the environment, overridden by the command line. */
export function resolveServerConfig(cli: CliOptions, env: Env = process.env): ServerConfig {
  const config = loadServerConfig(env);
  return {
    openai: {
      ...config.openai,
      modelName: cli.model ?? config.openai.modelName,
    },
    agui: {
      ...config.agui,
      serializeToolCalls: cli.serializeToolCalls ?? config.agui.serializeToolCalls,
    },
    corsOrigins: cli.corsOrigin ?? config.corsOrigins,
  };
}

function lastUserMessage(request: AgentRequest): string {
  for (let i = request.messages.length - 1; i >= 0; i--) {
    const message = request.messages[i];
    if (message.role === "user") return message.content;
  }
  return "";
}

/**
 * Demo agent that streams the last user message back word by word.
 */
export function createEchoAgent(): AgentHandler {
  return async function* echo(request, { signal }) {
    const words = `You said: ${lastUserMessage(request)}`.split(/(?<= )/);
    for (const word of words) {
      if (signal.aborted) return;
      yield word;
    }
  };
}

export async function main(args: string[] = process.argv.slice(2)): Promise<void> {
  loadDotenv();
  const cli = parseCliOptions(args);

  await configure({
    sinks: { console: getConsoleSink() },
    loggers: [
      { category: ["agentwire"], lowestLevel: cli.logLevel, sinks: ["console"] },
      { category: ["logtape", "meta"], lowestLevel: "warning", sinks: ["console"] },
    ],
  });

  const config = resolveServerConfig(cli);
  const app = createAgentServer({
    agent: createEchoAgent(),
    config,
    onError: (error, { endpoint }) => {
      logger.error("[{endpoint}] {message}", { endpoint, message: formatError(error) });
    },
  });

  const server = serve(
    { fetch: app.fetch, port: cli.port, hostname: cli.host },
    ({ address, port }) => {
      logger.info("agentwire demo listening on http://{address}:{port}", {
        address,
        port,
      });
      if (config.openai.enable) {
        logger.info("OpenAI routes: {prefix} (model {model})", {
          prefix: config.openai.prefix,
          model: config.openai.modelName,
        });
      }
      if (config.agui.enable) {
        logger.info("AG-UI routes: {prefix} (serialized tool calls: {serialized})", {
          prefix: config.agui.prefix,
          serialized: config.agui.serializeToolCalls,
        });
      }
    },
  );

  process.once("SIGINT", () => server.close());
  process.once("SIGTERM", () => server.close());
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  return import.meta.url === pathToFileURL(realpathSync(script)).href;
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}

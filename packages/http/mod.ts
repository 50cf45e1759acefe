/**
 * @agentwire/http - Serves an agent over the OpenAI chat-completions and
 * AG-UI protocols.
 *
 * Uses Hono internally. The app is a standard fetch handler, so it runs on
 * `@hono/node-server` or mounts inside another Hono app.
 *
 * @example Serve an agent
 * ```ts
 * import { serve } from "@hono/node-server";
 * import { createAgentServer, loadServerConfig } from "@agentwire/http";
 *
 * const app = createAgentServer({
 *   agent: async function* (request) {
 *     yield `Hello, you sent ${request.messages.length} messages.`;
 *   },
 *   config: loadServerConfig(),
 * });
 *
 * serve({ fetch: app.fetch, port: 9000 });
 * ```
 *
 * ## Endpoints
 *
 * - `POST /openai/v1/chat/completions` - chat completion, streamed or not
 * - `GET  /openai/v1/models` - the configured model
 * - `POST /ag-ui/agent` - AG-UI run, always streamed
 * - `GET  /ag-ui/health` - AG-UI protocol health
 * - `GET  /health` - server health
 *
 * @module
 */

export {
  AguiConfig,
  loadServerConfig,
  OpenAIConfig,
  ServerConfig,
} from "./config.ts";
export type { Env, ServerConfigInput } from "./config.ts";

export { createAgentServer } from "./handler.ts";
export type { AgentServerOptions } from "./handler.ts";

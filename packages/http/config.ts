import z from "zod";
import { parseBoolean, parseList } from "@agentwire/utils";

const Prefix = z.string().regex(/^\/\S*$/, "Route prefixes start with '/'");

export const OpenAIConfig = z.object({
  enable: z.boolean().default(true),
  prefix: Prefix.default("/openai/v1"),
  /** Listed by the models route and used when a request names none. */
  modelName: z.string().min(1).default("agentwire"),
});

export const AguiConfig = z.object({
  enable: z.boolean().default(true),
  prefix: Prefix.default("/ag-ui"),
  /** Emit tool calls one at a time instead of interleaved. */
  serializeToolCalls: z.boolean().default(false),
});

/** Read-only server configuration shared by every run. */
export const ServerConfig = z.object({
  openai: OpenAIConfig.prefault({}),
  agui: AguiConfig.prefault({}),
  corsOrigins: z.array(z.string().min(1)).optional(),
});
export type ServerConfig = z.output<typeof ServerConfig>;
export type ServerConfigInput = z.input<typeof ServerConfig>;

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Builds the server configuration from `AGENTWIRE_*` environment variables.
 * Unset variables keep their defaults.
 *
 * @throws {z.ZodError} when a variable holds an invalid value
 */
export function loadServerConfig(env: Env = process.env): ServerConfig {
  return ServerConfig.parse({
    openai: {
      enable: parseBoolean(env.AGENTWIRE_OPENAI_ENABLE, true),
      prefix: env.AGENTWIRE_OPENAI_PREFIX || undefined,
      modelName: env.AGENTWIRE_OPENAI_MODEL || undefined,
    },
    agui: {
      enable: parseBoolean(env.AGENTWIRE_AGUI_ENABLE, true),
      prefix: env.AGENTWIRE_AGUI_PREFIX || undefined,
      serializeToolCalls: parseBoolean(env.AGENTWIRE_SERIALIZE_TOOL_CALLS, false),
    },
    corsOrigins: parseList(env.AGENTWIRE_CORS_ORIGINS),
  });
}

import z from "zod";
import {
  type AgentRequest,
  parseMessages,
  parseRequestBody,
  parseTools,
  Protocol,
} from "@agentwire/core";
import { isRecord } from "@agentwire/utils";

const OptionalId = z.string().min(1).optional().catch(undefined);

/** The fields of an AG-UI run input the router reads. */
export const RunAgentRequest = z.object({
  messages: z.array(z.unknown()),
  tools: z.array(z.unknown()).optional().catch(undefined),
  threadId: OptionalId,
  runId: OptionalId,
  state: z.record(z.string(), z.unknown()).optional().catch(undefined),
});
export type RunAgentRequest = z.infer<typeof RunAgentRequest>;

/**
 * Parses an AG-UI run input. AG-UI runs are always streamed; missing thread
 * and run ids are generated by the run.
 */
export function parseRunAgentRequest(body: unknown): AgentRequest {
  const parsed = parseRequestBody(RunAgentRequest, body);
  return {
    protocol: Protocol.AGUI,
    messages: parseMessages(parsed.messages),
    stream: true,
    tools: parseTools(parsed.tools),
    threadId: parsed.threadId,
    runId: parsed.runId,
    state: parsed.state,
    rawRequest: isRecord(body) ? body : undefined,
  };
}

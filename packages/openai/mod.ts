/**
 * OpenAI chat-completions protocol: chunk encoder, request parsing,
 * non-streaming aggregation and the Hono routes that serve them.
 *
 * @module
 */

export {
  createChunk,
  createCompletionId,
  createCompletionMeta,
  createErrorBody,
  createOpenAIEncoder,
  DONE_MESSAGE,
  OpenAIEncoder,
} from "./encoder.ts";
export type {
  ChatCompletionChunk,
  CompletionMeta,
  FinishReason,
  OpenAIErrorBody,
} from "./encoder.ts";

export { aggregateCompletion } from "./completion.ts";
export type {
  ChatCompletion,
  CompletionResult,
  CompletionToolCall,
} from "./completion.ts";

export {
  ChatCompletionRequest,
  parseChatCompletionRequest,
} from "./request.ts";

export { createOpenAIRouter } from "./router.ts";
export type { OpenAIRouterOptions } from "./router.ts";

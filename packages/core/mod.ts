/**
 * Canonical event model and run pipeline.
 *
 * Agent output flows through the {@link Invoker}, the {@link RunStateMachine}
 * and a {@link ProtocolEncoder} into an SSE body.
 *
 * @module
 */

// Event model
export {
  AdditionMergePolicy,
  applyAddition,
  customEvent,
  errorEvent,
  EventKind,
  hitlEvent,
  isAgentEvent,
  rawEvent,
  stateEvent,
  textEvent,
  toolCallChunkEvent,
  toolCallEvent,
  toolResultChunkEvent,
  toolResultEvent,
} from "./events.ts";
export type {
  AgentEvent,
  CustomEvent,
  CustomPayload,
  ErrorEvent,
  ErrorPayload,
  EventOptions,
  HitlEvent,
  HitlPayload,
  RawEvent,
  RawPayload,
  StateEvent,
  StatePayload,
  TextEvent,
  TextPayload,
  ToolCallChunkEvent,
  ToolCallChunkPayload,
  ToolCallEvent,
  ToolCallPayload,
  ToolResultChunkEvent,
  ToolResultChunkPayload,
  ToolResultEvent,
  ToolResultPayload,
} from "./events.ts";

// Requests
export {
  MESSAGE_ROLES,
  normalizeContent,
  parseMessages,
  parseRequestBody,
  parseTools,
  handleRouteError,
  Protocol,
  readJsonBody,
  RequestValidationError,
  toErrorResponse,
} from "./request.ts";
export type {
  AgentMessage,
  AgentRequest,
  ErrorContext,
  ErrorHandler,
  ErrorResponse,
  MessageRole,
  MessageToolCall,
  RequestIssue,
  ToolDefinition,
} from "./request.ts";

// Invoker
export {
  classifyResult,
  detectProducerShape,
  Invoker,
  normalizeItem,
  ProducerShape,
} from "./invoker.ts";
export type {
  AgentContext,
  AgentHandler,
  AgentItem,
  AgentResult,
  InvokeOptions,
} from "./invoker.ts";

// Run state machine
export { frameRaw, RunLifecycle, RunStateMachine } from "./run_state.ts";
export type {
  RunItem,
  RunItemContext,
  RunItemType,
  RunStateOptions,
  RunStep,
  TextMessageState,
  ToolCallPolicy,
  ToolCallState,
} from "./run_state.ts";

// Pipeline
export { collectRun, encodeRun, runEvents, streamRun } from "./pipeline.ts";
export type {
  ProtocolEncoder,
  RunEventsOptions,
  RunOptions,
  StreamRunOptions,
} from "./pipeline.ts";

// SSE
export {
  encodeSSEStream,
  formatSSEMessage,
  jsonFrame,
  rawFrame,
  SSE_HEADERS,
} from "./sse.ts";
export type { SSEStreamOptions, WireFrame } from "./sse.ts";

/**
 * Source adapter for graph-based agent frameworks: converts their stream
 * events, node updates and state values into agent output.
 *
 * @module
 */

export {
  AgentStreamConverter,
  convertAgentStream,
  convertMessage,
  detectStreamShape,
  filterToolInput,
  formatToolOutput,
  safeJsonStringify,
  StreamShape,
} from "./converter.ts";
export type {
  AgentStreamSource,
  ConvertedItem,
  ConverterOptions,
} from "./converter.ts";

export {
  extractText,
  getMessageContent,
  getMessageToolCalls,
  getMessageType,
  getToolCallChunks,
  getToolCallId,
} from "./message.ts";
export type { MessageType, ToolCallChunk } from "./message.ts";

/**
 * AG-UI event encoder.
 *
 * @module
 */

import {
  type BaseEvent,
  type CustomEvent,
  EventType,
  type RunErrorEvent,
  type RunFinishedEvent,
  type RunStartedEvent,
  type StateDeltaEvent,
  type StateSnapshotEvent,
  type TextMessageContentEvent,
  type TextMessageEndEvent,
  type TextMessageStartEvent,
  type ToolCallArgsEvent,
  type ToolCallEndEvent,
  type ToolCallResultEvent,
  type ToolCallStartEvent,
} from "@ag-ui/core";
import {
  type AgentEvent,
  applyAddition,
  jsonFrame,
  type ProtocolEncoder,
  rawFrame,
  type RunItem,
  type RunItemContext,
  type WireFrame,
} from "@agentwire/core";

export interface AguiEncoderOptions {
  /** Source of frame timestamps, in milliseconds. */
  now?: () => number;
}

function frame(event: BaseEvent, source?: AgentEvent): WireFrame {
  return jsonFrame(applyAddition(event, source));
}

export function createRunErrorEvent(
  message: string,
  code: string,
  timestamp = Date.now(),
): RunErrorEvent {
  return { type: EventType.RUN_ERROR, message, code, timestamp };
}

/**
 * Encodes run items as AG-UI events, one JSON object per frame. Lifecycle
 * frames carry the run's `threadId` and `runId`.
 */
export class AguiEncoder implements ProtocolEncoder {
  readonly #now: () => number;

  constructor(options: AguiEncoderOptions = {}) {
    this.#now = options.now ?? Date.now;
  }

  encode(item: RunItem, context: RunItemContext): WireFrame[] {
    const timestamp = this.#now();

    switch (item.type) {
      case "RUN_STARTED":
        return [frame({
          type: EventType.RUN_STARTED,
          threadId: context.threadId,
          runId: context.runId,
          timestamp,
        } satisfies RunStartedEvent)];

      case "RUN_FINISHED":
        return [frame({
          type: EventType.RUN_FINISHED,
          threadId: context.threadId,
          runId: context.runId,
          timestamp,
        } satisfies RunFinishedEvent)];

      case "TEXT_MESSAGE_START":
        return [frame({
          type: EventType.TEXT_MESSAGE_START,
          messageId: item.messageId,
          role: "assistant",
          timestamp,
        } satisfies TextMessageStartEvent)];

      case "TEXT_MESSAGE_CONTENT":
        // AG-UI rejects empty content deltas.
        if (!item.delta) return [];
        return [frame({
          type: EventType.TEXT_MESSAGE_CONTENT,
          messageId: item.messageId,
          delta: item.delta,
          timestamp,
        } satisfies TextMessageContentEvent, item.event)];

      case "TEXT_MESSAGE_END":
        return [frame({
          type: EventType.TEXT_MESSAGE_END,
          messageId: item.messageId,
          timestamp,
        } satisfies TextMessageEndEvent)];

      case "TOOL_CALL_START":
        return [frame({
          type: EventType.TOOL_CALL_START,
          toolCallId: item.toolCallId,
          toolCallName: item.name,
          timestamp,
        } satisfies ToolCallStartEvent)];

      case "TOOL_CALL_ARGS":
        return [frame({
          type: EventType.TOOL_CALL_ARGS,
          toolCallId: item.toolCallId,
          delta: item.delta,
          timestamp,
        } satisfies ToolCallArgsEvent, item.event)];

      case "TOOL_CALL_END":
        return [frame({
          type: EventType.TOOL_CALL_END,
          toolCallId: item.toolCallId,
          timestamp,
        } satisfies ToolCallEndEvent)];

      case "TOOL_CALL_RESULT":
        return [frame({
          type: EventType.TOOL_CALL_RESULT,
          messageId: item.messageId,
          toolCallId: item.toolCallId,
          content: item.content,
          role: "tool",
          timestamp,
        } satisfies ToolCallResultEvent & { role: "tool" }, item.event)];

      case "STATE_SNAPSHOT":
        return [frame({
          type: EventType.STATE_SNAPSHOT,
          snapshot: item.snapshot,
          timestamp,
        } satisfies StateSnapshotEvent, item.event)];

      case "STATE_DELTA":
        return [frame({
          type: EventType.STATE_DELTA,
          delta: Array.isArray(item.delta) ? item.delta : [item.delta],
          timestamp,
        } satisfies StateDeltaEvent, item.event)];

      case "CUSTOM":
        return [frame({
          type: EventType.CUSTOM,
          name: item.name,
          value: item.value,
          timestamp,
        } satisfies CustomEvent, item.event)];

      case "RAW":
        return [rawFrame(item.raw)];

      case "RUN_ERROR":
        return [frame(
          createRunErrorEvent(item.message, item.code, timestamp),
          item.event,
        )];
    }
  }
}

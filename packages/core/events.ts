/**
 * Canonical event model shared by every stage of a run.
 *
 * Agent callbacks and source adapters produce {@link AgentEvent} values; the
 * run state machine consumes them in arrival order. Events are frozen at
 * creation and their `kind` is never re-interpreted. Payload keys are only
 * checked when an encoder reads them.
 *
 * @example
 * ```ts
 * import { textEvent, toolCallChunkEvent } from "@agentwire/core";
 *
 * yield textEvent("Looking that up");
 * yield toolCallChunkEvent({ id: "call_1", name: "search", args_delta: "{}" });
 * ```
 *
 * @module
 */

import { deepMerge, isRecord } from "@agentwire/utils";

export const EventKind = {
  TEXT: "TEXT",
  TOOL_CALL: "TOOL_CALL",
  TOOL_CALL_CHUNK: "TOOL_CALL_CHUNK",
  TOOL_RESULT: "TOOL_RESULT",
  TOOL_RESULT_CHUNK: "TOOL_RESULT_CHUNK",
  HITL: "HITL",
  STATE: "STATE",
  CUSTOM: "CUSTOM",
  ERROR: "ERROR",
  RAW: "RAW",
} as const;
export type EventKind = typeof EventKind[keyof typeof EventKind];

const EVENT_KINDS = new Set<string>(Object.values(EventKind));

/**
 * How an event's `addition` is merged into the frame an encoder builds for it.
 *
 * - `OVERRIDE_AND_ADD`: existing keys are overridden, new keys are added.
 * - `OVERRIDE_ONLY`: existing keys are overridden, new keys are dropped.
 */
export const AdditionMergePolicy = {
  OVERRIDE_AND_ADD: "OVERRIDE_AND_ADD",
  OVERRIDE_ONLY: "OVERRIDE_ONLY",
} as const;
export type AdditionMergePolicy =
  typeof AdditionMergePolicy[keyof typeof AdditionMergePolicy];

// =============================================================================
// Payloads
// =============================================================================

export interface TextPayload {
  delta: string;
}

/** A complete tool call. The invoker rewrites it into a single chunk. */
export interface ToolCallPayload {
  id?: string;
  name: string;
  args: string;
}

export interface ToolCallChunkPayload {
  id?: string;
  name?: string;
  args_delta?: string;
  /** Stream position of the call, for producers that send the id late. */
  index?: number;
  /** Last-resort identity, e.g. a framework's internal run reference. */
  correlation_id?: string;
}

export interface ToolResultPayload {
  id: string;
  name?: string;
  /** Strings are sent as-is, anything else as JSON. */
  result: unknown;
  message_id?: string;
}

/** Partial tool output, prepended to the call's eventual result. */
export interface ToolResultChunkPayload {
  id: string;
  delta: string;
}

/** A request for human input, optionally attached to an existing tool call. */
export interface HitlPayload {
  id: string;
  tool_call_id?: string;
  type?: string;
  prompt: string;
  options?: string[];
  default?: unknown;
  timeout?: number;
  schema?: Record<string, unknown>;
}

/**
 * `{ delta }` is an incremental patch, `{ snapshot }` a full snapshot. Any
 * other map is itself treated as the snapshot.
 */
export type StatePayload = Record<string, unknown>;

export interface CustomPayload {
  name?: string;
  value?: unknown;
}

export interface ErrorPayload {
  message: string;
  code: string;
}

/** An already formed wire fragment, written without re-encoding. */
export interface RawPayload {
  raw: string;
}

// =============================================================================
// Events
// =============================================================================

interface EventBase<K extends EventKind, P> {
  readonly kind: K;
  readonly payload: Readonly<P>;
  readonly addition?: Readonly<Record<string, unknown>>;
  readonly additionMergePolicy: AdditionMergePolicy;
}

export type TextEvent = EventBase<"TEXT", TextPayload>;
export type ToolCallEvent = EventBase<"TOOL_CALL", ToolCallPayload>;
export type ToolCallChunkEvent = EventBase<
  "TOOL_CALL_CHUNK",
  ToolCallChunkPayload
>;
export type ToolResultEvent = EventBase<"TOOL_RESULT", ToolResultPayload>;
export type ToolResultChunkEvent = EventBase<
  "TOOL_RESULT_CHUNK",
  ToolResultChunkPayload
>;
export type HitlEvent = EventBase<"HITL", HitlPayload>;
export type StateEvent = EventBase<"STATE", StatePayload>;
export type CustomEvent = EventBase<"CUSTOM", CustomPayload>;
export type ErrorEvent = EventBase<"ERROR", ErrorPayload>;
export type RawEvent = EventBase<"RAW", RawPayload>;

export type AgentEvent =
  | TextEvent
  | ToolCallEvent
  | ToolCallChunkEvent
  | ToolResultEvent
  | ToolResultChunkEvent
  | HitlEvent
  | StateEvent
  | CustomEvent
  | ErrorEvent
  | RawEvent;

export interface EventOptions {
  /** Extra fields merged into the encoded frame. */
  addition?: Record<string, unknown>;
  /** @default AdditionMergePolicy.OVERRIDE_AND_ADD */
  additionMergePolicy?: AdditionMergePolicy;
}

function define<K extends EventKind, P extends object>(
  kind: K,
  payload: P,
  options: EventOptions = {},
): EventBase<K, P> {
  const event: EventBase<K, P> = {
    kind,
    payload: Object.freeze({ ...payload }),
    additionMergePolicy: options.additionMergePolicy ??
      AdditionMergePolicy.OVERRIDE_AND_ADD,
    ...(options.addition
      ? { addition: Object.freeze({ ...options.addition }) }
      : {}),
  };
  Object.freeze(event);
  return event;
}

export function textEvent(delta: string, options?: EventOptions): TextEvent {
  return define(EventKind.TEXT, { delta }, options);
}

export function toolCallEvent(
  payload: ToolCallPayload,
  options?: EventOptions,
): ToolCallEvent {
  return define(EventKind.TOOL_CALL, payload, options);
}

export function toolCallChunkEvent(
  payload: ToolCallChunkPayload,
  options?: EventOptions,
): ToolCallChunkEvent {
  return define(EventKind.TOOL_CALL_CHUNK, payload, options);
}

export function toolResultEvent(
  payload: ToolResultPayload,
  options?: EventOptions,
): ToolResultEvent {
  return define(EventKind.TOOL_RESULT, payload, options);
}

export function toolResultChunkEvent(
  payload: ToolResultChunkPayload,
  options?: EventOptions,
): ToolResultChunkEvent {
  return define(EventKind.TOOL_RESULT_CHUNK, payload, options);
}

export function hitlEvent(
  payload: HitlPayload,
  options?: EventOptions,
): HitlEvent {
  return define(EventKind.HITL, payload, options);
}

export function stateEvent(
  payload: StatePayload,
  options?: EventOptions,
): StateEvent {
  return define(EventKind.STATE, payload, options);
}

export function customEvent(
  payload: CustomPayload,
  options?: EventOptions,
): CustomEvent {
  return define(EventKind.CUSTOM, payload, options);
}

export function errorEvent(
  payload: ErrorPayload,
  options?: EventOptions,
): ErrorEvent {
  return define(EventKind.ERROR, payload, options);
}

export function rawEvent(raw: string, options?: EventOptions): RawEvent {
  return define(EventKind.RAW, { raw }, options);
}

/**
 * Checks the envelope of a value that claims to be an {@link AgentEvent}.
 * Payload contents are not validated here.
 */
export function isAgentEvent(value: unknown): value is AgentEvent {
  return isRecord(value) &&
    typeof value.kind === "string" &&
    EVENT_KINDS.has(value.kind) &&
    isRecord(value.payload);
}

/**
 * Merges an event's `addition` into a frame built for it, honoring the
 * event's merge policy. Returns `frame` itself when there is nothing to merge.
 */
export function applyAddition(
  frame: Record<string, unknown>,
  event: AgentEvent | undefined,
): Record<string, unknown> {
  if (!event?.addition) return frame;
  return deepMerge(frame, event.addition, {
    noNewField: event.additionMergePolicy === AdditionMergePolicy.OVERRIDE_ONLY,
  });
}

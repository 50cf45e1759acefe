/**
 * Per-run ordering state machine.
 *
 * Consumes canonical events in arrival order and emits protocol-neutral
 * {@link RunItem}s with every boundary a wire protocol needs: run start and
 * finish, text message start and end, tool call start and end. One instance
 * per run; nothing here is shared between runs.
 *
 * @module
 */

import { randomUUID } from "node:crypto";
import { getLogger } from "@logtape/logtape";
import { isRecord } from "@agentwire/utils";
import {
  type AgentEvent,
  type CustomEvent,
  type ErrorEvent,
  EventKind,
  type HitlEvent,
  type RawEvent,
  type StateEvent,
  type TextEvent,
  type ToolCallChunkEvent,
  type ToolResultChunkEvent,
  type ToolResultEvent,
  toolCallChunkEvent,
} from "./events.ts";

const logger = getLogger(["agentwire", "core", "run_state"]);

// =============================================================================
// Emitted items
// =============================================================================

/**
 * Items emitted by the state machine. Items that carry `event` were derived
 * from a canonical event; the others are synthesized boundaries.
 */
export type RunItem =
  | { type: "RUN_STARTED" }
  | { type: "TEXT_MESSAGE_START"; messageId: string }
  | {
    type: "TEXT_MESSAGE_CONTENT";
    messageId: string;
    delta: string;
    event: TextEvent;
  }
  | { type: "TEXT_MESSAGE_END"; messageId: string }
  | { type: "TOOL_CALL_START"; toolCallId: string; name: string; index: number }
  | {
    type: "TOOL_CALL_ARGS";
    toolCallId: string;
    index: number;
    delta: string;
    event?: ToolCallChunkEvent;
  }
  | { type: "TOOL_CALL_END"; toolCallId: string; index: number }
  | {
    type: "TOOL_CALL_RESULT";
    toolCallId: string;
    messageId: string;
    content: string;
    event: ToolResultEvent;
  }
  | {
    type: "STATE_SNAPSHOT";
    snapshot: Record<string, unknown>;
    event: StateEvent;
  }
  | { type: "STATE_DELTA"; delta: unknown; event: StateEvent }
  | { type: "CUSTOM"; name: string; value: unknown; event: CustomEvent }
  | { type: "RAW"; raw: string; event: RawEvent }
  | { type: "RUN_ERROR"; message: string; code: string; event: ErrorEvent }
  | { type: "RUN_FINISHED" };

export type RunItemType = RunItem["type"];

/** Run-level facts an encoder needs alongside each item. */
export interface RunItemContext {
  readonly runId: string;
  readonly threadId: string;
  /** The item is the first text content or tool call start of the run. */
  readonly firstContent: boolean;
  /** Tool calls started so far, this item included. */
  readonly toolCallCount: number;
  /** Text content or a tool call start has been emitted, this item included. */
  readonly hasContent: boolean;
}

export interface RunStep {
  item: RunItem;
  context: RunItemContext;
}

// =============================================================================
// State
// =============================================================================

export const RunLifecycle = {
  PENDING: "PENDING",
  STARTED: "STARTED",
  FINISHED: "FINISHED",
  ERRORED: "ERRORED",
} as const;
export type RunLifecycle = typeof RunLifecycle[keyof typeof RunLifecycle];

/**
 * - `parallel`: tool calls may be open at the same time and interleave.
 * - `serialized`: at most one tool call is open; the others wait in line.
 */
export type ToolCallPolicy = "parallel" | "serialized";

export interface TextMessageState {
  messageId: string;
  started: boolean;
  ended: boolean;
}

export interface ToolCallState {
  toolCallId: string;
  name: string;
  /** First-seen order among started calls; -1 until started. */
  index: number;
  started: boolean;
  ended: boolean;
  resultReceived: boolean;
  /** Ended while waiting for a human. */
  hitl: boolean;
  /** Events deferred while another call is active (serialized policy). */
  pending: AgentEvent[];
}

export interface RunStateOptions {
  runId?: string;
  threadId?: string;
  /** @default "parallel" */
  toolCallPolicy?: ToolCallPolicy;
}

const UUID_PATTERN =
  /^[0-9a-f]{8}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{12}$/i;

function isUuidLike(value: string): boolean {
  return UUID_PATTERN.test(value.replace(/^urn:uuid:/i, "").replace(
    /^\{(.*)\}$/,
    "$1",
  ));
}

/**
 * Strips trailing newlines and terminates the fragment with exactly one
 * blank line.
 */
export function frameRaw(raw: string): string {
  return `${raw.replace(/\n+$/, "")}\n\n`;
}

function stringifyResult(result: unknown): string {
  if (result === undefined || result === null) return "";
  return typeof result === "string" ? result : JSON.stringify(result);
}

/**
 * Ordering state machine for a single run.
 *
 * Call {@link start} once, {@link push} for each upstream event, and
 * {@link finish} when the upstream ends. Each call returns the items to emit,
 * in order. After an ERROR event the run is terminal and further input is
 * discarded.
 */
export class RunStateMachine {
  readonly runId: string;
  readonly threadId: string;
  readonly policy: ToolCallPolicy;

  #lifecycle: RunLifecycle = RunLifecycle.PENDING;
  #text: TextMessageState | undefined;
  readonly #tools = new Map<string, ToolCallState>();
  readonly #indexToId = new Map<number, string>();
  /** Secondary (UUID-shaped) ids folded onto a started call. */
  readonly #aliases = new Map<string, string>();
  readonly #resultChunks = new Map<string, string[]>();
  /** Serialized policy: calls with deferred events, oldest first. */
  readonly #waiting: string[] = [];
  #active: string | undefined;
  #contentSeen = false;
  #toolCallCount = 0;
  #out: RunStep[] = [];

  constructor(options: RunStateOptions = {}) {
    this.runId = options.runId || randomUUID();
    this.threadId = options.threadId || randomUUID();
    this.policy = options.toolCallPolicy ?? "parallel";
  }

  get lifecycle(): RunLifecycle {
    return this.#lifecycle;
  }

  /** `true` once the run has finished or errored. */
  get terminated(): boolean {
    return this.#lifecycle === RunLifecycle.FINISHED ||
      this.#lifecycle === RunLifecycle.ERRORED;
  }

  /** Snapshot of a tool call's state, looked up by any id it is known by. */
  toolCall(id: string): Readonly<ToolCallState> | undefined {
    return this.#tools.get(this.#aliases.get(id) ?? id);
  }

  start(): RunStep[] {
    return this.#step(() => this.#ensureStarted());
  }

  push(event: AgentEvent): RunStep[] {
    if (this.terminated) {
      logger.debug("Discarding {kind} event after run {runId} ended", {
        kind: event.kind,
        runId: this.runId,
      });
      return [];
    }
    return this.#step(() => {
      this.#ensureStarted();
      this.#dispatch(event);
      if (!this.terminated) this.#settle();
    });
  }

  finish(): RunStep[] {
    if (this.terminated) return [];
    return this.#step(() => {
      this.#ensureStarted();
      if (this.policy === "serialized") this.#flushWaiting();
      this.#endOpenTools();
      this.#endText();
      this.#lifecycle = RunLifecycle.FINISHED;
      this.#emit({ type: "RUN_FINISHED" });
    });
  }

  #step(body: () => void): RunStep[] {
    this.#out = [];
    body();
    const out = this.#out;
    this.#out = [];
    return out;
  }

  #emit(item: RunItem) {
    let firstContent = false;
    if (item.type === "TEXT_MESSAGE_CONTENT" || item.type === "TOOL_CALL_START") {
      firstContent = !this.#contentSeen;
      this.#contentSeen = true;
    }
    this.#out.push({
      item,
      context: {
        runId: this.runId,
        threadId: this.threadId,
        firstContent,
        toolCallCount: this.#toolCallCount,
        hasContent: this.#contentSeen,
      },
    });
  }

  #ensureStarted() {
    if (this.#lifecycle !== RunLifecycle.PENDING) return;
    this.#lifecycle = RunLifecycle.STARTED;
    this.#emit({ type: "RUN_STARTED" });
  }

  #dispatch(event: AgentEvent) {
    switch (event.kind) {
      case EventKind.TEXT:
        return this.#onText(event);
      case EventKind.TOOL_CALL:
        // The invoker rewrites complete calls into chunks; accept them here
        // too for producers that feed the machine directly.
        return this.#onToolCallChunk(toolCallChunkEvent({
          id: event.payload.id,
          name: event.payload.name,
          args_delta: event.payload.args,
        }, event));
      case EventKind.TOOL_CALL_CHUNK:
        return this.#onToolCallChunk(event);
      case EventKind.TOOL_RESULT:
        return this.#onToolResult(event);
      case EventKind.TOOL_RESULT_CHUNK:
        return this.#onToolResultChunk(event);
      case EventKind.HITL:
        return this.#onHitl(event);
      case EventKind.STATE:
        return this.#onState(event);
      case EventKind.CUSTOM:
        return this.#emit({
          type: "CUSTOM",
          name: event.payload.name || "custom",
          value: event.payload.value,
          event,
        });
      case EventKind.RAW:
        if (event.payload.raw) {
          this.#emit({ type: "RAW", raw: frameRaw(event.payload.raw), event });
        }
        return;
      case EventKind.ERROR:
        return this.#onError(event);
    }
  }

  // ===========================================================================
  // Text
  // ===========================================================================

  #onText(event: TextEvent) {
    if (!event.payload.delta) {
      logger.debug("Dropping empty text event");
      return;
    }
    if (this.policy === "serialized") {
      this.#flushWaiting();
      this.#endOpenTools();
      this.#active = undefined;
    }

    if (!this.#text || this.#text.ended) {
      this.#text = { messageId: randomUUID(), started: true, ended: false };
      this.#emit({ type: "TEXT_MESSAGE_START", messageId: this.#text.messageId });
    }
    this.#emit({
      type: "TEXT_MESSAGE_CONTENT",
      messageId: this.#text.messageId,
      delta: event.payload.delta,
      event,
    });
  }

  #endText() {
    if (!this.#text || this.#text.ended) return;
    this.#text.ended = true;
    this.#emit({ type: "TEXT_MESSAGE_END", messageId: this.#text.messageId });
  }

  // ===========================================================================
  // Tool calls
  // ===========================================================================

  /**
   * Resolves a call's identity: explicit id, then the id recorded for its
   * stream index, then the correlation id. Under the serialized policy a
   * UUID-shaped id is folded onto the one started call of the same name that
   * has a regular id and no result yet.
   */
  #resolveToolId(payload: Readonly<{
    id?: string;
    name?: string;
    index?: number;
    correlation_id?: string;
  }>): string | undefined {
    let id = payload.id || undefined;
    if (payload.index !== undefined) {
      if (id) this.#indexToId.set(payload.index, id);
      else id = this.#indexToId.get(payload.index);
    }
    id ||= payload.correlation_id || undefined;
    if (!id) return undefined;

    const alias = this.#aliases.get(id);
    if (alias) return alias;
    if (this.policy !== "serialized") return id;
    if (this.#tools.has(id) || !isUuidLike(id)) return id;

    const candidates = [...this.#tools.values()].filter((state) =>
      state.started && !state.resultReceived &&
      !isUuidLike(state.toolCallId) &&
      (!payload.name || state.name === payload.name)
    );
    if (candidates.length === 1) {
      const target = candidates[0].toolCallId;
      this.#aliases.set(id, target);
      return target;
    }
    return id;
  }

  #state(id: string, name = ""): ToolCallState {
    let state = this.#tools.get(id);
    if (!state) {
      state = {
        toolCallId: id,
        name,
        index: -1,
        started: false,
        ended: false,
        resultReceived: false,
        hitl: false,
        pending: [],
      };
      this.#tools.set(id, state);
    } else if (!state.name && name) {
      state.name = name;
    }
    return state;
  }

  #isOpen(state: ToolCallState | undefined): boolean {
    return state !== undefined && state.started && !state.ended;
  }

  #startTool(state: ToolCallState) {
    this.#endText();
    if (this.policy === "serialized") {
      this.#endOpenTools(state.toolCallId);
      this.#active = state.toolCallId;
    }
    state.started = true;
    state.index = this.#toolCallCount++;
    this.#emit({
      type: "TOOL_CALL_START",
      toolCallId: state.toolCallId,
      name: state.name,
      index: state.index,
    });
  }

  #endTool(state: ToolCallState) {
    if (!this.#isOpen(state)) return;
    state.ended = true;
    this.#emit({
      type: "TOOL_CALL_END",
      toolCallId: state.toolCallId,
      index: state.index,
    });
  }

  #endOpenTools(except?: string) {
    for (const state of this.#tools.values()) {
      if (state.toolCallId !== except) this.#endTool(state);
    }
  }

  /** Serialized policy: whether an event for `id` has to wait its turn. */
  #mustDefer(id: string): boolean {
    if (this.policy !== "serialized") return false;
    const waiting = this.#tools.get(id)?.pending.length ?? 0;
    if (waiting > 0) return true;
    return this.#active !== undefined && this.#active !== id &&
      this.#isOpen(this.#tools.get(this.#active));
  }

  #defer(state: ToolCallState, event: AgentEvent) {
    state.pending.push(event);
    if (!this.#waiting.includes(state.toolCallId)) {
      this.#waiting.push(state.toolCallId);
    }
  }

  #onToolCallChunk(event: ToolCallChunkEvent) {
    const id = this.#resolveToolId(event.payload);
    if (!id) {
      logger.debug("Dropping tool call chunk without an id");
      return;
    }
    const state = this.#state(id, event.payload.name);

    if (state.ended) {
      logger.debug("Dropping chunk for ended tool call {toolCallId}", {
        toolCallId: id,
      });
      return;
    }
    if (!state.started && this.#mustDefer(id)) {
      this.#defer(state, event);
      return;
    }
    this.#emitChunk(state, event);
  }

  #emitChunk(state: ToolCallState, event: ToolCallChunkEvent) {
    if (!state.started) this.#startTool(state);
    const delta = event.payload.args_delta ?? "";
    if (delta) {
      this.#emit({
        type: "TOOL_CALL_ARGS",
        toolCallId: state.toolCallId,
        index: state.index,
        delta,
        event,
      });
    }
  }

  #onToolResult(event: ToolResultEvent) {
    const id = this.#resolveToolId(event.payload);
    if (!id) {
      logger.debug("Dropping tool result without an id");
      return;
    }
    const state = this.#state(id, event.payload.name);

    if (!state.ended && this.#mustDefer(id)) {
      this.#defer(state, event);
      return;
    }
    this.#emitResult(state, event);
  }

  #emitResult(state: ToolCallState, event: ToolResultEvent) {
    this.#endText();
    if (!state.started) {
      this.#startTool(state);
    }
    this.#endTool(state);
    state.resultReceived = true;
    if (this.#active === state.toolCallId) this.#active = undefined;

    const id = state.toolCallId;
    const chunks = this.#resultChunks.get(id) ?? [];
    this.#resultChunks.delete(id);
    this.#emit({
      type: "TOOL_CALL_RESULT",
      toolCallId: id,
      messageId: event.payload.message_id || `tool-result-${id}`,
      content: chunks.join("") + stringifyResult(event.payload.result),
      event,
    });
  }

  #onToolResultChunk(event: ToolResultChunkEvent) {
    const id = this.#resolveToolId(event.payload);
    if (!id || !event.payload.delta) return;
    const chunks = this.#resultChunks.get(id) ?? [];
    chunks.push(event.payload.delta);
    this.#resultChunks.set(id, chunks);
  }

  #onHitl(event: HitlEvent) {
    const payload = event.payload;
    this.#endText();

    const existing = payload.tool_call_id
      ? this.toolCall(payload.tool_call_id)
      : undefined;
    if (existing && existing.started) {
      const state = this.#state(existing.toolCallId);
      this.#endTool(state);
      state.hitl = true;
      state.resultReceived = false;
      return;
    }

    const type = payload.type || "confirmation";
    const args: Record<string, unknown> = { type, prompt: payload.prompt };
    if (payload.options?.length) args.options = payload.options;
    if (payload.default !== undefined) args.default = payload.default;
    if (payload.timeout !== undefined) args.timeout = payload.timeout;
    if (payload.schema) args.schema = payload.schema;

    const state = this.#state(payload.tool_call_id || payload.id, `hitl_${type}`);
    if (state.ended) return;
    this.#startTool(state);
    this.#emit({
      type: "TOOL_CALL_ARGS",
      toolCallId: state.toolCallId,
      index: state.index,
      delta: JSON.stringify(args),
    });
    this.#endTool(state);
    state.hitl = true;
  }

  /**
   * Serialized policy: once no call is open, the oldest waiting call is
   * activated and its deferred events replayed.
   */
  #settle() {
    if (this.policy !== "serialized") return;
    if (this.#active !== undefined && !this.#isOpen(this.#tools.get(this.#active))) {
      this.#active = undefined;
    }
    while (this.#active === undefined && this.#waiting.length > 0) {
      this.#activateNext();
    }
  }

  /** Serialized policy: replays every waiting call, one after another. */
  #flushWaiting() {
    while (this.#waiting.length > 0) {
      this.#endOpenTools();
      this.#active = undefined;
      this.#activateNext();
    }
  }

  #activateNext() {
    const id = this.#waiting.shift();
    if (id === undefined) return;
    const state = this.#state(id);
    const pending = state.pending.splice(0);

    for (const event of pending) {
      if (event.kind === EventKind.TOOL_CALL_CHUNK) {
        if (!state.ended) this.#emitChunk(state, event);
      } else if (event.kind === EventKind.TOOL_RESULT) {
        this.#emitResult(state, event);
      }
    }
    if (!this.#isOpen(state) && this.#active === id) this.#active = undefined;
  }

  // ===========================================================================
  // State, errors
  // ===========================================================================

  #onState(event: StateEvent) {
    const payload = event.payload;
    if (Object.hasOwn(payload, "delta")) {
      this.#emit({ type: "STATE_DELTA", delta: payload.delta, event });
      return;
    }
    const snapshot = payload.snapshot;
    this.#emit({
      type: "STATE_SNAPSHOT",
      snapshot: isRecord(snapshot) ? { ...snapshot } : { ...payload },
      event,
    });
  }

  #onError(event: ErrorEvent) {
    this.#lifecycle = RunLifecycle.ERRORED;
    this.#waiting.length = 0;
    for (const state of this.#tools.values()) state.pending.length = 0;
    this.#emit({
      type: "RUN_ERROR",
      message: event.payload.message,
      code: event.payload.code,
      event,
    });
  }
}

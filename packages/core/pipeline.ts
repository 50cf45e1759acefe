/**
 * Connects the stages of one run: invoker, state machine, protocol encoder
 * and SSE framing. Every stage pulls from the one before it, so a slow client
 * slows the agent down instead of buffering frames.
 *
 * @example
 * ```ts
 * const body = streamRun({
 *   invoker,
 *   request,
 *   encoder: createOpenAIEncoder({ model: "agentwire" }),
 * });
 * return new Response(body, { headers: SSE_HEADERS });
 * ```
 *
 * @module
 */

import { createAbortError, formatError } from "@agentwire/utils";
import type { AgentEvent } from "./events.ts";
import type { Invoker } from "./invoker.ts";
import type { AgentRequest } from "./request.ts";
import {
  type RunItem,
  type RunItemContext,
  RunStateMachine,
  type RunStep,
  type ToolCallPolicy,
} from "./run_state.ts";
import { encodeSSEStream, type WireFrame } from "./sse.ts";

/**
 * Turns state machine items into wire frames. Implementations keep no state
 * of their own beyond fixed per-run metadata; everything else comes from the
 * item and its context.
 */
export interface ProtocolEncoder {
  encode(item: RunItem, context: RunItemContext): WireFrame[];
}

export interface RunEventsOptions {
  /** Stop without a finish item once aborted. */
  signal?: AbortSignal;
}

/**
 * Feeds canonical events through a state machine. Pulling stops as soon as
 * the run errors, which also returns the upstream iterator.
 */
export async function* runEvents(
  events: AsyncIterable<AgentEvent>,
  machine: RunStateMachine,
  options: RunEventsOptions = {},
): AsyncGenerator<RunStep, void, undefined> {
  yield* machine.start();
  for await (const event of events) {
    yield* machine.push(event);
    if (machine.terminated) return;
  }
  if (options.signal?.aborted) return;
  yield* machine.finish();
}

export async function* encodeRun(
  steps: AsyncIterable<RunStep>,
  encoder: ProtocolEncoder,
): AsyncGenerator<WireFrame, void, undefined> {
  for await (const { item, context } of steps) {
    yield* encoder.encode(item, context);
  }
}

export interface RunOptions {
  invoker: Invoker;
  request: AgentRequest;
  /** @default "parallel" */
  toolCallPolicy?: ToolCallPolicy;
}

export interface StreamRunOptions extends RunOptions {
  encoder: ProtocolEncoder;
  /** Frames to write if the pipeline itself fails mid-stream. */
  onError?: (error: unknown) => WireFrame[];
}

function createMachine(options: RunOptions): RunStateMachine {
  return new RunStateMachine({
    runId: options.request.runId,
    threadId: options.request.threadId,
    toolCallPolicy: options.toolCallPolicy,
  });
}

/**
 * Runs the agent for one request and returns the encoded SSE body.
 * Cancelling the body aborts the run.
 */
export function streamRun(options: StreamRunOptions): ReadableStream<Uint8Array> {
  const abortController = new AbortController();
  const signal = abortController.signal;
  const events = options.invoker.invokeStream(options.request, { signal });
  const steps = runEvents(events, createMachine(options), { signal });

  return encodeSSEStream(encodeRun(steps, options.encoder), {
    onCancel: (reason) =>
      abortController.abort(
        createAbortError(`Client disconnected: ${formatError(reason)}`),
      ),
    onError: options.onError,
  });
}

/** Runs the agent for one request and collects every state machine step. */
export async function collectRun(
  options: RunOptions & { signal?: AbortSignal },
): Promise<RunStep[]> {
  const events = options.invoker.invokeStream(options.request, {
    signal: options.signal,
  });
  const steps: RunStep[] = [];
  for await (
    const step of runEvents(events, createMachine(options), {
      signal: options.signal,
    })
  ) {
    steps.push(step);
  }
  return steps;
}

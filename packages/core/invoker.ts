/**
 * Drives a user-supplied agent callback and turns whatever it produces into
 * an ordered, non-blocking sequence of {@link AgentEvent}s.
 *
 * @example
 * ```ts
 * const invoker = new Invoker(async function* (request) {
 *   yield "Hello ";
 *   yield "World";
 * });
 *
 * for await (const event of invoker.invokeStream(request, { signal })) {
 *   console.log(event.kind, event.payload);
 * }
 * ```
 *
 * @module
 */

import { randomUUID } from "node:crypto";
import { getLogger } from "@logtape/logtape";
import { isObservable, type Observable } from "rxjs";
import { eachValueFrom } from "rxjs-for-await";
import {
  Channel,
  errorCode,
  formatError,
  isAbortError,
  nextTurn,
} from "@agentwire/utils";
import {
  type AgentEvent,
  errorEvent,
  EventKind,
  isAgentEvent,
  toolCallChunkEvent,
  textEvent,
} from "./events.ts";
import type { AgentRequest } from "./request.ts";

const logger = getLogger(["agentwire", "core", "invoker"]);

/** One item produced by an agent callback. Arrays are flattened in order. */
export type AgentItem =
  | string
  | AgentEvent
  | null
  | undefined
  | readonly AgentItem[];

export type AgentResult =
  | AgentItem
  | Iterable<AgentItem>
  | AsyncIterable<AgentItem>
  | Observable<AgentItem>;

export interface AgentContext {
  /** Aborted when the client goes away. */
  signal: AbortSignal;
}

/**
 * The agent callback. Plain, async and generator functions are all accepted,
 * as are functions returning an iterable, async iterable or Observable.
 */
export type AgentHandler = (
  request: AgentRequest,
  context: AgentContext,
) => AgentResult | Promise<AgentResult>;

/**
 * How a producer delivers its items: blocking or non-blocking, one value or
 * many.
 */
export const ProducerShape = {
  BLOCKING_SINGLE: "blocking-single",
  BLOCKING_MULTI: "blocking-multi",
  NONBLOCKING_SINGLE: "nonblocking-single",
  NONBLOCKING_MULTI: "nonblocking-multi",
} as const;
export type ProducerShape = typeof ProducerShape[keyof typeof ProducerShape];

const SHAPES_BY_FUNCTION_KIND: Record<string, ProducerShape> = {
  AsyncGeneratorFunction: ProducerShape.NONBLOCKING_MULTI,
  GeneratorFunction: ProducerShape.BLOCKING_MULTI,
  AsyncFunction: ProducerShape.NONBLOCKING_SINGLE,
};

/**
 * Shape of a callback, read from the kind of function it is. Plain functions
 * report {@link ProducerShape.BLOCKING_SINGLE}; what they return is
 * classified again with {@link classifyResult}.
 */
export function detectProducerShape(handler: AgentHandler): ProducerShape {
  return SHAPES_BY_FUNCTION_KIND[handler.constructor.name] ??
    ProducerShape.BLOCKING_SINGLE;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === "object" && value !== null && "then" in value &&
    typeof value.then === "function";
}

function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return typeof value === "object" && value !== null &&
    Symbol.asyncIterator in value;
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === "object" && value !== null &&
    Symbol.iterator in value;
}

/** Shape of a value a callback returned. */
export function classifyResult(value: unknown): ProducerShape {
  if (isPromiseLike(value)) return ProducerShape.NONBLOCKING_SINGLE;
  if (isObservable(value) || isAsyncIterable(value)) {
    return ProducerShape.NONBLOCKING_MULTI;
  }
  if (Array.isArray(value) || isAgentEvent(value)) {
    return ProducerShape.BLOCKING_SINGLE;
  }
  if (isIterable(value)) return ProducerShape.BLOCKING_MULTI;
  return ProducerShape.BLOCKING_SINGLE;
}

type Drain = (
  result: unknown,
  signal: AbortSignal | undefined,
) => AsyncIterable<unknown>;

const DRAINS: Record<ProducerShape, Drain> = {
  [ProducerShape.BLOCKING_SINGLE]: async function* (result) {
    yield result;
  },
  [ProducerShape.NONBLOCKING_SINGLE]: async function* (result, signal) {
    const resolved = await result;
    yield* drain(resolved, signal);
  },
  [ProducerShape.BLOCKING_MULTI]: (result, signal) => {
    if (!isIterable(result)) {
      throw new TypeError("Generator callback did not return an iterable");
    }
    return pumpBlocking(result, signal);
  },
  [ProducerShape.NONBLOCKING_MULTI]: (result) => {
    if (isObservable(result)) return eachValueFrom(result);
    if (isAsyncIterable(result)) return result;
    throw new TypeError(
      "Async generator callback did not return an async iterable",
    );
  },
};

function drain(
  result: unknown,
  signal: AbortSignal | undefined,
): AsyncIterable<unknown> {
  return DRAINS[classifyResult(result)](result, signal);
}

/**
 * Pulls a blocking iterator from a separate task, one item per event-loop
 * turn, handing items over through a single-slot channel. Other pipelines
 * run between pulls. Stopping early returns the iterator.
 */
async function* pumpBlocking(
  iterable: Iterable<unknown>,
  signal: AbortSignal | undefined,
): AsyncGenerator<unknown, void, undefined> {
  const iterator = iterable[Symbol.iterator]();
  const channel = new Channel<unknown>(1);
  const onAbort = () => channel.close();
  signal?.addEventListener("abort", onAbort, { once: true });

  const pump = async () => {
    try {
      for (;;) {
        await nextTurn();
        if (channel.closed) break;
        const step = iterator.next();
        if (step.done) break;
        if (!await channel.send(step.value)) break;
      }
      channel.close();
    } catch (error) {
      channel.fail(error);
    }
  };
  const task = pump();

  try {
    yield* channel;
  } finally {
    signal?.removeEventListener("abort", onAbort);
    channel.close();
    await task;
    iterator.return?.();
  }
}

/**
 * Classifies one produced item into canonical events.
 *
 * - `null`, `undefined` and `""` produce nothing
 * - strings become TEXT
 * - arrays are flattened
 * - TOOL_CALL becomes a single TOOL_CALL_CHUNK carrying the full arguments
 * - other events pass through
 */
export function normalizeItem(item: unknown): AgentEvent[] {
  if (item === null || item === undefined || item === "") return [];
  if (typeof item === "string") return [textEvent(item)];
  if (Array.isArray(item)) return item.flatMap(normalizeItem);

  if (!isAgentEvent(item)) {
    logger.debug("Dropping unsupported agent output of type {type}", {
      type: typeof item,
    });
    return [];
  }

  if (item.kind === EventKind.TOOL_CALL) {
    const { id, name, args } = item.payload;
    return [
      toolCallChunkEvent({
        id: id || randomUUID(),
        name,
        args_delta: args,
      }, {
        addition: item.addition,
        additionMergePolicy: item.additionMergePolicy,
      }),
    ];
  }
  return [item];
}

export interface InvokeOptions {
  signal?: AbortSignal;
}

/**
 * Calls an {@link AgentHandler} and adapts its output, whatever its shape,
 * into canonical events.
 *
 * The handler's shape is resolved once, here. Any error raised while
 * producing items ends the sequence with exactly one ERROR event; an abort
 * ends it silently.
 */
export class Invoker {
  readonly shape: ProducerShape;
  readonly #handler: AgentHandler;

  constructor(handler: AgentHandler) {
    this.#handler = handler;
    this.shape = detectProducerShape(handler);
  }

  async *invokeStream(
    request: AgentRequest,
    options: InvokeOptions = {},
  ): AsyncGenerator<AgentEvent, void, undefined> {
    const signal = options.signal ?? new AbortController().signal;

    try {
      for await (const item of this.#produce(request, signal)) {
        if (signal.aborted) return;
        yield* normalizeItem(item);
      }
    } catch (error) {
      if (isAbortError(error) || signal.aborted) {
        logger.debug("Agent invocation aborted");
        return;
      }
      logger.error("Agent invocation failed: {message}", {
        message: formatError(error),
        code: errorCode(error),
        error,
      });
      yield errorEvent({ message: formatError(error), code: errorCode(error) });
    }
  }

  /** Collects the whole event sequence, for callers that do not stream. */
  async invoke(
    request: AgentRequest,
    options: InvokeOptions = {},
  ): Promise<AgentEvent[]> {
    const events: AgentEvent[] = [];
    for await (const event of this.invokeStream(request, options)) {
      events.push(event);
    }
    return events;
  }

  async *#produce(
    request: AgentRequest,
    signal: AbortSignal,
  ): AsyncGenerator<unknown, void, undefined> {
    if (this.shape === ProducerShape.BLOCKING_SINGLE) {
      // The call itself may block; let pending I/O run first.
      await nextTurn();
      yield* drain(this.#handler(request, { signal }), signal);
      return;
    }
    yield* DRAINS[this.shape](this.#handler(request, { signal }), signal);
  }
}

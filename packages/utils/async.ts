/**
 * Async primitives used to connect the stages of a run pipeline.
 *
 * @example
 * ```ts
 * import { Channel } from "@agentwire/utils";
 *
 * const channel = new Channel<string>(1);
 * void channel.send("hello").then(() => channel.close());
 * for await (const value of channel) console.log(value);
 * ```
 *
 * @module
 */

import { setImmediate as nextImmediate } from "node:timers/promises";
import { createAbortError } from "./error.ts";

/**
 * A Promise wrapper that allows external resolution/rejection.
 * Useful for bridging callback-based APIs with async/await.
 */
export class Completer<T> {
  readonly #promise: Promise<T>;
  #resolve!: (value: T) => void;
  #reject!: (reason?: unknown) => void;

  constructor() {
    this.#promise = new Promise((res, rej) => {
      this.#resolve = res;
      this.#reject = rej;
    });
  }

  /**
   * Wait for the completer to be resolved or rejected.
   *
   * @param options.signal - AbortSignal to cancel the wait
   */
  wait(options?: { signal?: AbortSignal }): Promise<T> {
    const signal = options?.signal;
    if (signal) {
      if (signal.aborted) {
        this.#reject(createAbortError("Operation aborted"));
        return this.#promise;
      }

      signal.addEventListener("abort", () => {
        this.#reject(createAbortError("Operation aborted"));
      }, { once: true });
    }
    return this.#promise;
  }

  resolve(value: T) {
    this.#resolve(value);
  }

  reject(reason?: unknown) {
    this.#reject(reason);
  }
}

/**
 * Yields control back to the event loop so that I/O callbacks and other
 * pipelines get a turn before the caller continues.
 */
export async function nextTurn(): Promise<void> {
  await nextImmediate();
}

/**
 * Bounded single-consumer handoff between a producer task and a consumer.
 *
 * `send()` suspends while the buffer is full, so a producer can never run
 * further ahead of its consumer than `capacity` items. Closing the channel
 * wakes both sides: pending and future sends resolve to `false`, and the
 * consumer drains what is buffered before observing the end (or the failure
 * passed to {@link Channel.fail}).
 */
export class Channel<T> implements AsyncIterable<T> {
  readonly #capacity: number;
  readonly #buffer: T[] = [];
  #closed = false;
  #failure: { reason: unknown } | undefined;
  #readable: Completer<void> | undefined;
  #writable: Completer<void> | undefined;

  constructor(capacity = 1) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
    this.#capacity = capacity;
  }

  get closed(): boolean {
    return this.#closed;
  }

  /** Number of values currently buffered. */
  get size(): number {
    return this.#buffer.length;
  }

  /**
   * Push a value, waiting for buffer space.
   *
   * @returns `false` when the channel was closed before the value could be
   * accepted.
   */
  async send(value: T, options?: { signal?: AbortSignal }): Promise<boolean> {
    while (!this.#closed && this.#buffer.length >= this.#capacity) {
      const writable = this.#writable ??= new Completer<void>();
      try {
        await writable.wait(options);
      } catch (error) {
        if (this.#writable === writable) this.#writable = undefined;
        throw error;
      }
    }
    if (this.#closed) return false;

    this.#buffer.push(value);
    this.#wakeReader();
    return true;
  }

  /**
   * Pull the next value, waiting for the producer when the buffer is empty.
   */
  async receive(
    options?: { signal?: AbortSignal },
  ): Promise<IteratorResult<T, undefined>> {
    for (;;) {
      if (this.#buffer.length > 0) {
        const value = this.#buffer[0];
        this.#buffer.shift();
        this.#wakeWriter();
        return { done: false, value };
      }
      if (this.#failure) throw this.#failure.reason;
      if (this.#closed) return { done: true, value: undefined };

      const readable = this.#readable ??= new Completer<void>();
      try {
        await readable.wait(options);
      } catch (error) {
        if (this.#readable === readable) this.#readable = undefined;
        throw error;
      }
    }
  }

  /** Mark the end of the stream. Buffered values are still delivered. */
  close(): void {
    if (this.#closed) return;
    this.#closed = true;
    this.#wakeReader();
    this.#wakeWriter();
  }

  /** Close the channel so that the consumer observes `reason` after draining. */
  fail(reason: unknown): void {
    if (this.#closed) return;
    this.#failure = { reason };
    this.close();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const result = await this.receive();
      if (result.done) return;
      yield result.value;
    }
  }

  #wakeReader() {
    const readable = this.#readable;
    this.#readable = undefined;
    readable?.resolve();
  }

  #wakeWriter() {
    const writable = this.#writable;
    this.#writable = undefined;
    writable?.resolve();
  }
}

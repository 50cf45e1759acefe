/**
 * Server-Sent-Events framing for wire frames.
 *
 * @module
 */

import { getLogger } from "@logtape/logtape";
import { formatError } from "@agentwire/utils";

const logger = getLogger(["agentwire", "core", "sse"]);

/**
 * One self-contained protocol message: a JSON object sent as a `data:` line,
 * or a fragment that is already framed and is written verbatim.
 */
export type WireFrame =
  | { type: "json"; data: Record<string, unknown> }
  | { type: "raw"; text: string };

export function jsonFrame(data: Record<string, unknown>): WireFrame {
  return { type: "json", data };
}

export function rawFrame(text: string): WireFrame {
  return { type: "raw", text };
}

export function formatSSEMessage(frame: WireFrame): string {
  if (frame.type === "raw") return frame.text;
  return `data: ${JSON.stringify(frame.data)}\n\n`;
}

export const SSE_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  "Connection": "keep-alive",
  "X-Accel-Buffering": "no",
});

export interface SSEStreamOptions {
  /** Called once when the consumer cancels the stream. */
  onCancel?: (reason: unknown) => void;
  /**
   * Frames written in place of an unexpected failure of the frame source,
   * before the stream is closed.
   */
  onError?: (error: unknown) => WireFrame[];
}

/**
 * Encodes frames as an SSE byte stream. Frames are pulled one at a time, only
 * when the consumer asks for more. Cancelling the stream returns the frame
 * iterator.
 */
export function encodeSSEStream(
  frames: AsyncIterable<WireFrame>,
  options: SSEStreamOptions = {},
): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  const iterator = frames[Symbol.asyncIterator]();

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        const { value, done } = await iterator.next();
        if (done) {
          controller.close();
          return;
        }
        controller.enqueue(encoder.encode(formatSSEMessage(value)));
      } catch (error) {
        logger.error("Event stream failed: {message}", {
          message: formatError(error),
          error,
        });
        for (const frame of options.onError?.(error) ?? []) {
          controller.enqueue(encoder.encode(formatSSEMessage(frame)));
        }
        controller.close();
      }
    },
    cancel(reason) {
      options.onCancel?.(reason);
      void iterator.return?.()?.catch((error: unknown) => {
        logger.debug("Closing cancelled event stream failed: {message}", {
          message: formatError(error),
        });
      });
    },
  });
}

import { expect, test } from "vitest";
import { Completer, isAbortError } from "@agentwire/utils";
import { errorEvent, textEvent } from "./events.ts";
import { Invoker } from "./invoker.ts";
import { collectRun, type ProtocolEncoder, runEvents, streamRun } from "./pipeline.ts";
import { type AgentRequest, Protocol } from "./request.ts";
import { RunStateMachine } from "./run_state.ts";
import { encodeSSEStream, jsonFrame, rawFrame } from "./sse.ts";

const request: AgentRequest = {
  protocol: Protocol.AGUI,
  messages: [],
  stream: true,
  threadId: "thread-1",
  runId: "run-1",
};

const typeEncoder: ProtocolEncoder = {
  encode: (item) => [jsonFrame({ type: item.type })],
};

test("runEvents - stops pulling once the run errors", async () => {
  let pulledAfterError = false;
  async function* source() {
    yield textEvent("a");
    yield errorEvent({ message: "boom", code: "Error" });
    pulledAfterError = true;
    yield textEvent("b");
  }

  const types: string[] = [];
  for await (const { item } of runEvents(source(), new RunStateMachine())) {
    types.push(item.type);
  }

  expect(types).toEqual([
    "RUN_STARTED",
    "TEXT_MESSAGE_START",
    "TEXT_MESSAGE_CONTENT",
    "RUN_ERROR",
  ]);
  expect(pulledAfterError).toBe(false);
});

test("collectRun - uses the request's run and thread ids", async () => {
  const steps = await collectRun({
    invoker: new Invoker(() => "hi"),
    request,
  });

  expect(steps.map(({ item }) => item.type)).toEqual([
    "RUN_STARTED",
    "TEXT_MESSAGE_START",
    "TEXT_MESSAGE_CONTENT",
    "TEXT_MESSAGE_END",
    "RUN_FINISHED",
  ]);
  expect(steps[0].context).toMatchObject({
    runId: "run-1",
    threadId: "thread-1",
  });
});

test("streamRun - writes one SSE message per frame", async () => {
  const body = streamRun({
    invoker: new Invoker(async function* () {
      yield "Hello";
    }),
    request,
    encoder: typeEncoder,
  });

  expect(await new Response(body).text()).toBe(
    'data: {"type":"RUN_STARTED"}\n\n' +
      'data: {"type":"TEXT_MESSAGE_START"}\n\n' +
      'data: {"type":"TEXT_MESSAGE_CONTENT"}\n\n' +
      'data: {"type":"TEXT_MESSAGE_END"}\n\n' +
      'data: {"type":"RUN_FINISHED"}\n\n',
  );
});

test("streamRun - cancelling the body aborts the agent and closes it", async () => {
  const closed = new Completer<void>();
  let signal: AbortSignal | undefined;
  const body = streamRun({
    invoker: new Invoker(async function* (_request, context) {
      signal = context.signal;
      try {
        yield "a";
        yield "b";
      } finally {
        closed.resolve();
      }
    }),
    request,
    encoder: typeEncoder,
  });

  const reader = body.getReader();
  await reader.read();
  await reader.read();
  await reader.cancel("client gone");
  await closed.wait();

  expect(signal?.aborted).toBe(true);
  expect(isAbortError(signal?.reason)).toBe(true);
  expect(signal?.reason.message).toBe("Client disconnected: client gone");
});

test("encodeSSEStream - writes raw frames verbatim", async () => {
  async function* frames() {
    yield rawFrame(": keep-alive\n\n");
    yield jsonFrame({ n: 1 });
  }

  expect(await new Response(encodeSSEStream(frames())).text()).toBe(
    ': keep-alive\n\ndata: {"n":1}\n\n',
  );
});

test("encodeSSEStream - replaces a failure with the error frames", async () => {
  async function* frames() {
    yield jsonFrame({ n: 1 });
    throw new Error("broken");
  }

  const body = encodeSSEStream(frames(), {
    onError: (error) => [
      jsonFrame({ error: error instanceof Error ? error.message : "?" }),
    ],
  });

  expect(await new Response(body).text()).toBe(
    'data: {"n":1}\n\ndata: {"error":"broken"}\n\n',
  );
});

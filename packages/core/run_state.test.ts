import { describe, expect, test } from "vitest";
import {
  type AgentEvent,
  customEvent,
  errorEvent,
  hitlEvent,
  rawEvent,
  stateEvent,
  textEvent,
  toolCallChunkEvent,
  toolCallEvent,
  toolResultChunkEvent,
  toolResultEvent,
} from "./events.ts";
import {
  frameRaw,
  type RunItem,
  RunLifecycle,
  RunStateMachine,
  type RunStateOptions,
  type RunStep,
} from "./run_state.ts";

function run(events: AgentEvent[], options: RunStateOptions = {}): RunStep[] {
  const machine = new RunStateMachine({
    runId: "run-1",
    threadId: "thread-1",
    ...options,
  });
  return [
    ...machine.start(),
    ...events.flatMap((event) => machine.push(event)),
    ...machine.finish(),
  ];
}

function label(item: RunItem): string {
  switch (item.type) {
    case "TEXT_MESSAGE_CONTENT":
      return `TEXT ${item.delta}`;
    case "TOOL_CALL_START":
      return `START ${item.toolCallId}`;
    case "TOOL_CALL_ARGS":
      return `ARGS ${item.toolCallId} ${item.delta}`;
    case "TOOL_CALL_END":
      return `END ${item.toolCallId}`;
    case "TOOL_CALL_RESULT":
      return `RESULT ${item.toolCallId} ${item.content}`;
    default:
      return item.type;
  }
}

function labels(steps: RunStep[]): string[] {
  return steps.map(({ item }) => label(item));
}

function chunk(id: string, args: string, name?: string): AgentEvent {
  return toolCallChunkEvent({ id, name, args_delta: args });
}

function result(id: string, value: unknown = "ok"): AgentEvent {
  return toolResultEvent({ id, result: value });
}

describe("RunStateMachine - text", () => {
  test("drops empty text without opening a message", () => {
    const steps = run([textEvent(""), textEvent("Hi")]);

    expect(labels(steps)).toEqual([
      "RUN_STARTED",
      "TEXT_MESSAGE_START",
      "TEXT Hi",
      "TEXT_MESSAGE_END",
      "RUN_FINISHED",
    ]);
    expect(steps[2].context.firstContent).toBe(true);
    expect(steps[4].context.hasContent).toBe(true);
  });

  test("a run of empty text has no content", () => {
    const steps = run([textEvent("")]);

    expect(labels(steps)).toEqual(["RUN_STARTED", "RUN_FINISHED"]);
    expect(steps[1].context.hasContent).toBe(false);
  });

  test("wraps text in one message between run start and finish", () => {
    const steps = run([textEvent("Hello "), textEvent("World")]);

    expect(labels(steps)).toEqual([
      "RUN_STARTED",
      "TEXT_MESSAGE_START",
      "TEXT Hello ",
      "TEXT World",
      "TEXT_MESSAGE_END",
      "RUN_FINISHED",
    ]);
    const ids = new Set(
      steps.map(({ item }) => "messageId" in item ? item.messageId : undefined)
        .filter((id) => id !== undefined),
    );
    expect(ids.size).toBe(1);
  });

  test("an empty run still starts and finishes", () => {
    expect(labels(run([]))).toEqual(["RUN_STARTED", "RUN_FINISHED"]);
  });

  test("text after a tool call opens a new message", () => {
    const steps = run([
      textEvent("Let me check"),
      chunk("tc-1", "{}", "search"),
      result("tc-1"),
      textEvent("Done"),
    ]);

    expect(labels(steps)).toEqual([
      "RUN_STARTED",
      "TEXT_MESSAGE_START",
      "TEXT Let me check",
      "TEXT_MESSAGE_END",
      "START tc-1",
      "ARGS tc-1 {}",
      "END tc-1",
      "RESULT tc-1 ok",
      "TEXT_MESSAGE_START",
      "TEXT Done",
      "TEXT_MESSAGE_END",
      "RUN_FINISHED",
    ]);

    const starts = steps.flatMap(({ item }) =>
      item.type === "TEXT_MESSAGE_START" ? [item.messageId] : []
    );
    expect(starts).toHaveLength(2);
    expect(starts[0]).not.toBe(starts[1]);
  });

  test("context marks the first content item and counts tool calls", () => {
    const steps = run([
      textEvent("a"),
      textEvent("b"),
      chunk("tc-1", ""),
      chunk("tc-2", ""),
    ]);

    expect(
      steps.map(({ item, context }) => [
        item.type,
        context.firstContent,
        context.toolCallCount,
      ]),
    ).toEqual([
      ["RUN_STARTED", false, 0],
      ["TEXT_MESSAGE_START", false, 0],
      ["TEXT_MESSAGE_CONTENT", true, 0],
      ["TEXT_MESSAGE_CONTENT", false, 0],
      ["TEXT_MESSAGE_END", false, 0],
      ["TOOL_CALL_START", false, 1],
      ["TOOL_CALL_START", false, 2],
      ["TOOL_CALL_END", false, 2],
      ["TOOL_CALL_END", false, 2],
      ["RUN_FINISHED", false, 2],
    ]);
    expect(steps[0].context.runId).toBe("run-1");
    expect(steps[0].context.threadId).toBe("thread-1");
  });

  test("generates run and thread ids when none are given", () => {
    const machine = new RunStateMachine();

    expect(machine.runId).toMatch(/^[0-9a-f-]{36}$/);
    expect(machine.threadId).not.toBe(machine.runId);
  });
});

describe("RunStateMachine - tool calls", () => {
  test("chunk then result for one call", () => {
    expect(labels(run([chunk("tc-1", '{"q":1}', "search"), result("tc-1")])))
      .toEqual([
        "RUN_STARTED",
        "START tc-1",
        'ARGS tc-1 {"q":1}',
        "END tc-1",
        "RESULT tc-1 ok",
        "RUN_FINISHED",
      ]);
  });

  test("starts each id once however many chunks arrive", () => {
    const steps = run([
      chunk("tc-1", '{"a"', "search"),
      chunk("tc-1", ":1}"),
      chunk("tc-1", ""),
    ]);

    expect(labels(steps)).toEqual([
      "RUN_STARTED",
      "START tc-1",
      'ARGS tc-1 {"a"',
      "ARGS tc-1 :1}",
      "END tc-1",
      "RUN_FINISHED",
    ]);
    expect(steps[1].item).toEqual({
      type: "TOOL_CALL_START",
      toolCallId: "tc-1",
      name: "search",
      index: 0,
    });
  });

  test("closes open text before a tool call starts", () => {
    const steps = labels(run([textEvent("hi"), chunk("tc-1", "{}", "f")]));

    expect(steps.indexOf("TEXT_MESSAGE_END")).toBeLessThan(
      steps.indexOf("START tc-1"),
    );
  });

  test("orphan result synthesizes start and end", () => {
    expect(labels(run([toolResultEvent({ id: "tc-9", name: "f", result: 1 })])))
      .toEqual([
        "RUN_STARTED",
        "START tc-9",
        "END tc-9",
        "RESULT tc-9 1",
        "RUN_FINISHED",
      ]);
  });

  test("duplicate result passes through without reopening", () => {
    expect(
      labels(run([chunk("tc-1", "{}", "f"), result("tc-1"), result("tc-1", "again")])),
    ).toEqual([
      "RUN_STARTED",
      "START tc-1",
      "ARGS tc-1 {}",
      "END tc-1",
      "RESULT tc-1 ok",
      "RESULT tc-1 again",
      "RUN_FINISHED",
    ]);
  });

  test("chunks for an ended call are dropped", () => {
    expect(labels(run([chunk("tc-1", "{}", "f"), result("tc-1"), chunk("tc-1", "late")])))
      .toEqual([
        "RUN_STARTED",
        "START tc-1",
        "ARGS tc-1 {}",
        "END tc-1",
        "RESULT tc-1 ok",
        "RUN_FINISHED",
      ]);
  });

  test("result content and message id", () => {
    const steps = run([
      chunk("tc-1", "", "f"),
      toolResultChunkEvent({ id: "tc-1", delta: "line 1\n" }),
      toolResultEvent({ id: "tc-1", result: { ok: true } }),
      chunk("tc-2", "", "f"),
      toolResultEvent({ id: "tc-2", result: "done", message_id: "msg-7" }),
    ]);

    const results = steps.flatMap(({ item }) =>
      item.type === "TOOL_CALL_RESULT" ? [[item.messageId, item.content]] : []
    );
    expect(results).toEqual([
      ["tool-result-tc-1", 'line 1\n{"ok":true}'],
      ["msg-7", "done"],
    ]);
  });

  test("resolves a missing id through the stream index", () => {
    const steps = run([
      toolCallChunkEvent({ id: "call_1", index: 0, name: "f", args_delta: "{" }),
      toolCallChunkEvent({ index: 0, args_delta: "}" }),
    ]);

    expect(labels(steps)).toEqual([
      "RUN_STARTED",
      "START call_1",
      "ARGS call_1 {",
      "ARGS call_1 }",
      "END call_1",
      "RUN_FINISHED",
    ]);
  });

  test("falls back to the correlation id", () => {
    const steps = run([
      toolCallChunkEvent({ correlation_id: "run-ref", name: "f", args_delta: "{}" }),
      toolResultEvent({ id: "run-ref", result: "ok" }),
    ]);

    expect(labels(steps)).toEqual([
      "RUN_STARTED",
      "START run-ref",
      "ARGS run-ref {}",
      "END run-ref",
      "RESULT run-ref ok",
      "RUN_FINISHED",
    ]);
  });

  test("folds a UUID-shaped id onto the started call of the same name when serialized", () => {
    const uuid = "0b6f2c9e-3a43-4f7e-9a8e-5a7f0e0f1c2d";
    const steps = run([
      chunk("call_abc", '{"q":', "search"),
      chunk(uuid, '"x"}', "search"),
      result(uuid),
    ], { toolCallPolicy: "serialized" });

    expect(labels(steps)).toEqual([
      "RUN_STARTED",
      "START call_abc",
      'ARGS call_abc {"q":',
      'ARGS call_abc "x"}',
      "END call_abc",
      "RESULT call_abc ok",
      "RUN_FINISHED",
    ]);
  });

  test("does not fold when the name does not match", () => {
    const uuid = "0b6f2c9e-3a43-4f7e-9a8e-5a7f0e0f1c2d";
    const steps = run(
      [chunk("call_abc", "", "search"), chunk(uuid, "", "fetch")],
      { toolCallPolicy: "serialized" },
    );

    expect(labels(steps)).toEqual([
      "RUN_STARTED",
      "START call_abc",
      "END call_abc",
      `START ${uuid}`,
      `END ${uuid}`,
      "RUN_FINISHED",
    ]);
  });

  test("keeps same-name calls apart under the parallel policy", () => {
    const uuid = "0b6f2c9e-3a43-4f7e-9a8e-5a7f0e0f1c2d";
    const steps = run([
      chunk("call_1", '{"q":"a"}', "search"),
      chunk(uuid, '{"q":"b"}', "search"),
      result(uuid),
    ]);

    expect(labels(steps)).toEqual([
      "RUN_STARTED",
      "START call_1",
      'ARGS call_1 {"q":"a"}',
      `START ${uuid}`,
      `ARGS ${uuid} {"q":"b"}`,
      `END ${uuid}`,
      `RESULT ${uuid} ok`,
      "END call_1",
      "RUN_FINISHED",
    ]);
  });

  test("accepts complete tool calls", () => {
    expect(labels(run([toolCallEvent({ id: "tc-1", name: "f", args: "{}" })])))
      .toEqual([
        "RUN_STARTED",
        "START tc-1",
        "ARGS tc-1 {}",
        "END tc-1",
        "RUN_FINISHED",
      ]);
  });
});

describe("RunStateMachine - tool call policies", () => {
  const interleaved = [
    chunk("a", "1", "fa"),
    chunk("b", "x", "fb"),
    chunk("a", "2"),
    chunk("b", "y"),
    result("a"),
    result("b"),
  ];

  test("parallel keeps upstream order", () => {
    expect(labels(run(interleaved))).toEqual([
      "RUN_STARTED",
      "START a",
      "ARGS a 1",
      "START b",
      "ARGS b x",
      "ARGS a 2",
      "ARGS b y",
      "END a",
      "RESULT a ok",
      "END b",
      "RESULT b ok",
      "RUN_FINISHED",
    ]);
  });

  test("serialized holds a second call until the first has its result", () => {
    expect(labels(run(interleaved, { toolCallPolicy: "serialized" }))).toEqual([
      "RUN_STARTED",
      "START a",
      "ARGS a 1",
      "ARGS a 2",
      "END a",
      "RESULT a ok",
      "START b",
      "ARGS b x",
      "ARGS b y",
      "END b",
      "RESULT b ok",
      "RUN_FINISHED",
    ]);
  });

  test("serialized queues results for calls that have not started", () => {
    const steps = run([
      chunk("a", "{}", "fa"),
      result("c", "early"),
      result("a"),
    ], { toolCallPolicy: "serialized" });

    expect(labels(steps)).toEqual([
      "RUN_STARTED",
      "START a",
      "ARGS a {}",
      "END a",
      "RESULT a ok",
      "START c",
      "END c",
      "RESULT c early",
      "RUN_FINISHED",
    ]);
  });

  test("serialized drains waiting calls before text", () => {
    const steps = run([
      chunk("a", "1", "fa"),
      chunk("b", "2", "fb"),
      textEvent("thinking"),
      result("a"),
    ], { toolCallPolicy: "serialized" });

    expect(labels(steps)).toEqual([
      "RUN_STARTED",
      "START a",
      "ARGS a 1",
      "END a",
      "START b",
      "ARGS b 2",
      "END b",
      "TEXT_MESSAGE_START",
      "TEXT thinking",
      "TEXT_MESSAGE_END",
      "RESULT a ok",
      "RUN_FINISHED",
    ]);
  });

  test("serialized drains waiting calls before finishing", () => {
    const steps = run([
      chunk("a", "1", "fa"),
      chunk("b", "2", "fb"),
      chunk("c", "3", "fc"),
    ], { toolCallPolicy: "serialized" });

    expect(labels(steps)).toEqual([
      "RUN_STARTED",
      "START a",
      "ARGS a 1",
      "END a",
      "START b",
      "ARGS b 2",
      "END b",
      "START c",
      "ARGS c 3",
      "END c",
      "RUN_FINISHED",
    ]);
  });

  test("serialized always ends one call before the next starts", () => {
    const steps = run([
      chunk("a", "", "fa"),
      chunk("b", "", "fb"),
      chunk("c", "", "fc"),
      result("b"),
      chunk("a", "more"),
      result("c"),
      result("a"),
    ], { toolCallPolicy: "serialized" });

    let open: string | undefined;
    for (const { item } of steps) {
      if (item.type === "TOOL_CALL_START") {
        expect(open).toBeUndefined();
        open = item.toolCallId;
      } else if (item.type === "TOOL_CALL_END") {
        expect(item.toolCallId).toBe(open);
        open = undefined;
      }
    }
    expect(labels(steps).filter((entry) => entry.startsWith("START"))).toEqual([
      "START a",
      "START b",
      "START c",
    ]);
  });

  test("parallel text leaves tool calls open", () => {
    expect(labels(run([chunk("a", "{}", "fa"), textEvent("meanwhile")]))).toEqual([
      "RUN_STARTED",
      "START a",
      "ARGS a {}",
      "TEXT_MESSAGE_START",
      "TEXT meanwhile",
      "END a",
      "TEXT_MESSAGE_END",
      "RUN_FINISHED",
    ]);
  });
});

describe("RunStateMachine - human in the loop", () => {
  test("a standalone request becomes a complete tool call", () => {
    const steps = run([
      hitlEvent({ id: "h-1", prompt: "Proceed?", options: ["yes", "no"] }),
    ]);

    expect(steps.slice(1, 4).map(({ item }) => item)).toEqual([
      { type: "TOOL_CALL_START", toolCallId: "h-1", name: "hitl_confirmation", index: 0 },
      {
        type: "TOOL_CALL_ARGS",
        toolCallId: "h-1",
        index: 0,
        delta: '{"type":"confirmation","prompt":"Proceed?","options":["yes","no"]}',
      },
      { type: "TOOL_CALL_END", toolCallId: "h-1", index: 0 },
    ]);
  });

  test("a request for an open call ends it without a result", () => {
    const machine = new RunStateMachine();
    const steps = [
      ...machine.push(chunk("tc-1", "{}", "deploy")),
      ...machine.push(hitlEvent({ id: "h-1", tool_call_id: "tc-1", prompt: "ok?" })),
      ...machine.finish(),
    ];

    expect(labels(steps)).toEqual([
      "RUN_STARTED",
      "START tc-1",
      "ARGS tc-1 {}",
      "END tc-1",
      "RUN_FINISHED",
    ]);
    expect(machine.toolCall("tc-1")).toMatchObject({
      hitl: true,
      resultReceived: false,
      ended: true,
    });
  });
});

describe("RunStateMachine - state, custom, raw and errors", () => {
  test("state deltas and snapshots", () => {
    const items = run([
      stateEvent({ delta: [{ op: "add", path: "/a", value: 1 }] }),
      stateEvent({ snapshot: { a: 1 } }),
      stateEvent({ a: 2 }),
    ]).map(({ item }) => item);

    expect(items[1]).toMatchObject({
      type: "STATE_DELTA",
      delta: [{ op: "add", path: "/a", value: 1 }],
    });
    expect(items[2]).toMatchObject({ type: "STATE_SNAPSHOT", snapshot: { a: 1 } });
    expect(items[3]).toMatchObject({ type: "STATE_SNAPSHOT", snapshot: { a: 2 } });
  });

  test("custom events default their name", () => {
    const [, item] = run([customEvent({ value: 1 })]).map((step) => step.item);

    expect(item).toMatchObject({ type: "CUSTOM", name: "custom", value: 1 });
  });

  test("raw fragments end with exactly one blank line", () => {
    expect(frameRaw("data: x\n\n\n\n")).toBe("data: x\n\n");
    expect(frameRaw("data: x")).toBe("data: x\n\n");

    const raws = run([rawEvent(": ping\n"), rawEvent("")]).flatMap(({ item }) =>
      item.type === "RAW" ? [item.raw] : []
    );
    expect(raws).toEqual([": ping\n\n"]);
  });

  test("custom and raw events leave open messages alone", () => {
    expect(labels(run([textEvent("a"), customEvent({ name: "n" }), textEvent("b")])))
      .toEqual([
        "RUN_STARTED",
        "TEXT_MESSAGE_START",
        "TEXT a",
        "CUSTOM",
        "TEXT b",
        "TEXT_MESSAGE_END",
        "RUN_FINISHED",
      ]);
  });

  test("an error ends the run immediately", () => {
    const machine = new RunStateMachine();
    const steps = [
      ...machine.start(),
      ...machine.push(textEvent("partial")),
      ...machine.push(errorEvent({ message: "boom", code: "Error" })),
    ];

    expect(labels(steps)).toEqual([
      "RUN_STARTED",
      "TEXT_MESSAGE_START",
      "TEXT partial",
      "RUN_ERROR",
    ]);
    expect(machine.lifecycle).toBe(RunLifecycle.ERRORED);
    expect(machine.push(textEvent("more"))).toEqual([]);
    expect(machine.finish()).toEqual([]);
  });

  test("an error drops queued tool calls", () => {
    const steps = run([
      chunk("a", "", "fa"),
      chunk("b", "", "fb"),
      errorEvent({ message: "boom", code: "Error" }),
    ], { toolCallPolicy: "serialized" });

    expect(labels(steps)).toEqual(["RUN_STARTED", "START a", "RUN_ERROR"]);
  });

  test("lifecycle moves from pending to finished", () => {
    const machine = new RunStateMachine();
    expect(machine.lifecycle).toBe(RunLifecycle.PENDING);
    machine.start();
    expect(machine.lifecycle).toBe(RunLifecycle.STARTED);
    expect(machine.start()).toEqual([]);
    machine.finish();
    expect(machine.lifecycle).toBe(RunLifecycle.FINISHED);
    expect(machine.terminated).toBe(true);
  });
});

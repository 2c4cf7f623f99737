import { assert, createManualClock, describe, test } from "@tessera/testkit";
import {
  CHANGED,
  CONTINUE,
  type Control,
  QUIT,
  UNCHANGED,
  controlEvent,
} from "../../control/control.js";
import type { PollSource } from "../../poll/types.js";
import { createTimerRegistry } from "../../poll/timers.js";
import { type TestFrame, createTestTerminal } from "../../testing/terminal.js";
import type { AppContext } from "../context.js";
import { type RunHandlers, type RunLoopOptions, createRunLoop } from "../runLoop.js";
import { describeError, scriptedSource } from "./helpers.js";

type AppState = { renders: number };
type Ctx = AppContext<string, unknown, TestFrame>;
type EventFn = (event: string, ctx: Ctx) => Control<string>;

function setup(
  log: string[],
  sources: readonly PollSource<string>[],
  onEvent: EventFn = () => UNCHANGED,
  extra: Partial<RunLoopOptions<AppState, string, unknown, TestFrame>> = {},
) {
  const terminal = createTestTerminal({ cols: 20, rows: 3 });
  const handlers: RunHandlers<AppState, string, unknown, TestFrame> = {
    render: (_area, _frame, state) => {
      state.renders++;
      log.push("render");
    },
    event: (event, _state, ctx) => {
      log.push(`event:${event}`);
      return onEvent(event, ctx);
    },
    error: (error) => {
      log.push(`error:${describeError(error)}`);
      return CONTINUE;
    },
  };
  const loop = createRunLoop<AppState, string, unknown, TestFrame>({
    state: { renders: 0 },
    terminal,
    handlers,
    sources,
    ...extra,
  });
  return { loop, terminal };
}

describe("run loop tick ordering", () => {
  test("ready sources are read once each in registration order", () => {
    const log: string[] = [];
    const a = scriptedSource("A", log);
    const b = scriptedSource("B", log);
    const c = scriptedSource("C", log);
    c.give(controlEvent("from-c"));
    a.give(controlEvent("from-a"));
    const { loop } = setup(log, [a, b, c]);

    const report = loop.tick();
    assert.deepEqual(log, [
      "poll:A",
      "poll:B",
      "poll:C",
      "read:A",
      "event:from-a",
      "read:C",
      "event:from-c",
    ]);
    assert.deepEqual(report.ready, ["A", "C"]);
    assert.equal(report.reads, 2);
    assert.equal(report.dispatched, 2);
    assert.equal(report.rendered, false);

    log.length = 0;
    const idle = loop.tick();
    assert.deepEqual(log, ["poll:A", "poll:B", "poll:C"]);
    assert.equal(idle.reads, 0);
  });

  test("only one result is read from a ready source per tick", () => {
    const log: string[] = [];
    const a = scriptedSource("A", log);
    a.give(controlEvent("first"));
    a.give(controlEvent("second"));
    const { loop } = setup(log, [a]);
    loop.tick();
    assert.deepEqual(log, ["poll:A", "read:A", "event:first"]);
    log.length = 0;
    loop.tick();
    assert.deepEqual(log, ["poll:A", "read:A", "event:second"]);
  });

  test("follow-ups queued by a handler run before the next source is read", () => {
    const log: string[] = [];
    const a = scriptedSource("A", log);
    const c = scriptedSource("C", log);
    a.give(controlEvent("from-a"));
    c.give(controlEvent("from-c"));
    const { loop } = setup(log, [a, c], (event, ctx) => {
      if (event === "from-a") {
        ctx.queueEvent("follow-1");
        ctx.queueEvent("follow-2");
      }
      return UNCHANGED;
    });
    loop.tick();
    assert.deepEqual(
      log.filter((l) => !l.startsWith("poll:")),
      ["read:A", "event:from-a", "event:follow-1", "event:follow-2", "read:C", "event:from-c"],
    );
  });

  test("several changes in one tick render a single frame", () => {
    const log: string[] = [];
    const a = scriptedSource("A", log);
    const b = scriptedSource("B", log);
    a.give(CHANGED);
    b.give(controlEvent("edit"));
    const { loop, terminal } = setup(log, [a, b], () => CHANGED);
    const report = loop.tick();
    assert.equal(report.rendered, true);
    assert.equal(terminal.frames(), 1);
    assert.deepEqual(
      log.filter((l) => l === "render"),
      ["render"],
    );
    assert.equal(loop.state.renders, 1);
    assert.equal(loop.context.count(), 1);
  });

  test("timer sources are read until idle so simultaneous deadlines all fire", () => {
    const log: string[] = [];
    const clock = createManualClock();
    const timers = createTimerRegistry<string>({
      now: clock.now,
      toEvent: (t) => `timeout-${t.handle.tag}`,
    });
    const b = scriptedSource("B", log);
    b.give(controlEvent("from-b"));
    timers.add({ intervalMs: 10 });
    timers.add({ intervalMs: 10 });
    timers.add({ intervalMs: 50 });
    const { loop } = setup(log, [timers, b], () => UNCHANGED, { now: clock.now });

    clock.advance(10);
    const report = loop.tick();
    assert.deepEqual(report.ready, ["timers", "B"]);
    assert.equal(report.reads, 3);
    assert.deepEqual(
      log.filter((l) => l.startsWith("event:")),
      ["event:timeout-1", "event:timeout-2", "event:from-b"],
    );
    assert.equal(timers.size(), 1);
  });

  test("a handler slower than a repeating timer's interval still ends the tick", () => {
    const log: string[] = [];
    const clock = createManualClock();
    const timers = createTimerRegistry<string>({
      now: clock.now,
      toEvent: (t) => `tick-${t.counter}`,
    });
    timers.add({ intervalMs: 1, repeat: Number.POSITIVE_INFINITY });
    const { loop } = setup(
      log,
      [timers],
      () => {
        clock.advance(2);
        return CHANGED;
      },
      { now: clock.now },
    );

    clock.advance(1);
    const first = loop.tick();
    assert.equal(first.reads, 1);
    assert.equal(first.rendered, true);
    assert.deepEqual(log, ["event:tick-0", "render"]);

    log.length = 0;
    const second = loop.tick();
    assert.equal(second.reads, 2);
    assert.deepEqual(log, ["event:tick-1", "event:tick-2", "render"]);
  });

  test("a timer a handler re-arms with no delay fires on the next tick", () => {
    const log: string[] = [];
    const clock = createManualClock();
    const timers = createTimerRegistry<string>({
      now: clock.now,
      toEvent: (t) => `again-${t.handle.tag}`,
    });
    timers.add({ intervalMs: 0 });
    const { loop } = setup(
      log,
      [timers],
      () => {
        timers.add({ intervalMs: 0 });
        return CHANGED;
      },
      { now: clock.now },
    );

    assert.equal(loop.tick().reads, 1);
    assert.equal(loop.tick().reads, 1);
    assert.deepEqual(log, ["event:again-1", "render", "event:again-2", "render"]);
    assert.throws(() => timers.add({ intervalMs: 0, repeat: Number.POSITIVE_INFINITY }), {
      code: "TSR_INVALID_PROPS",
    });
  });
});

describe("run loop errors", () => {
  test("errors wait until the queue is empty, then reach the error hook", () => {
    const log: string[] = [];
    const a = scriptedSource("A", log);
    a.give(controlEvent("x"));
    const { loop } = setup(log, [a], (event, ctx) => {
      if (event === "x") {
        ctx.queueErr(new Error("boom"));
        ctx.queueEvent("y");
      }
      return UNCHANGED;
    });
    const report = loop.tick();
    assert.deepEqual(
      log.filter((l) => !l.startsWith("poll:")),
      ["read:A", "event:x", "event:y", "error:boom"],
    );
    assert.equal(report.errors, 1);
  });

  test("the error hook's answer goes back on the queue", () => {
    const log: string[] = [];
    const a = scriptedSource("A", log);
    a.giveError(new Error("disk"));
    const loop = createRunLoop<AppState, string, unknown, TestFrame>({
      state: { renders: 0 },
      terminal: createTestTerminal(),
      sources: [a],
      handlers: {
        render: () => {},
        event: (event) => {
          log.push(`event:${event}`);
          return UNCHANGED;
        },
        error: (error) => {
          log.push(`error:${describeError(error)}`);
          return controlEvent("recovered");
        },
      },
    });
    loop.tick();
    assert.deepEqual(log, ["poll:A", "read:A", "error:disk", "event:recovered"]);
  });

  test("a throwing poll() is reported and the other sources still run", () => {
    const log: string[] = [];
    const a = scriptedSource("A", log);
    const c = scriptedSource("C", log);
    a.failPoll(new Error("poll broke"));
    c.give(controlEvent("c"));
    const { loop } = setup(log, [a, c]);
    loop.tick();
    assert.deepEqual(log, ["poll:A", "poll:C", "error:poll broke", "read:C", "event:c"]);
  });

  test("a throwing event handler becomes TSR_USER_CODE_THROW", () => {
    const log: string[] = [];
    const a = scriptedSource("A", log);
    a.give(controlEvent("bad"));
    const { loop } = setup(log, [a], () => {
      throw new Error("oops");
    });
    loop.tick();
    assert.equal(log.at(-1), "error:TSR_USER_CODE_THROW: event handler threw: Error: oops");
  });

  test("tick() from inside a handler is rejected as re-entrant", () => {
    const log: string[] = [];
    const a = scriptedSource("A", log);
    a.give(controlEvent("reenter"));
    const holder: { tick?: () => unknown } = {};
    const { loop } = setup(log, [a], () => {
      holder.tick?.();
      return UNCHANGED;
    });
    holder.tick = loop.tick;
    loop.tick();
    assert.equal(
      log.at(-1),
      "error:TSR_USER_CODE_THROW: event handler threw: TesseraError: tick: re-entrant call",
    );
  });

  test("a throwing error hook escapes tick()", () => {
    const a = scriptedSource("A", []);
    a.giveError(new Error("first"));
    const loop = createRunLoop<AppState, string, unknown, TestFrame>({
      state: { renders: 0 },
      terminal: createTestTerminal(),
      sources: [a],
      handlers: {
        render: () => {},
        event: () => UNCHANGED,
        error: () => {
          throw new Error("fatal");
        },
      },
    });
    assert.throws(() => loop.tick(), { message: "fatal" });
    assert.equal(loop.tick().reads, 0);
  });

  test("errors behind one that made the error hook throw reach it on the next tick", () => {
    const log: string[] = [];
    const a = scriptedSource("A", log);
    a.give(controlEvent("x"));
    const loop = createRunLoop<AppState, string, unknown, TestFrame>({
      state: { renders: 0 },
      terminal: createTestTerminal(),
      sources: [a],
      handlers: {
        render: () => {},
        event: (_event, _state, ctx) => {
          ctx.queueErr(new Error("one"));
          ctx.queueErr(new Error("two"));
          return UNCHANGED;
        },
        error: (error) => {
          const message = describeError(error);
          log.push(`error:${message}`);
          if (message === "one") throw new Error("hook failed");
          return CONTINUE;
        },
      },
    });
    assert.throws(() => loop.tick(), { message: "hook failed" });
    const next = loop.tick();
    assert.equal(next.errors, 1);
    assert.deepEqual(
      log.filter((l) => l.startsWith("error:")),
      ["error:one", "error:two"],
    );
  });

  test("a failed render is reported on the next tick", () => {
    const log: string[] = [];
    const a = scriptedSource("A", log);
    a.give(CHANGED);
    const { loop, terminal } = setup(log, [a]);
    terminal.failNextRender(new Error("tty gone"));
    loop.tick();
    assert.equal(loop.context.count(), 0);
    log.length = 0;
    loop.tick();
    assert.deepEqual(log, ["error:TSR_USER_CODE_THROW: render threw: Error: tty gone", "poll:A"]);
  });

  test("services must be registered as sources", () => {
    const timers = createTimerRegistry<string>({ toEvent: () => "t" });
    assert.throws(
      () =>
        createRunLoop<AppState, string>({
          state: { renders: 0 },
          terminal: createTestTerminal(),
          handlers: { render: () => {}, event: () => UNCHANGED, error: () => CONTINUE },
          services: { timers },
        }),
      {
        code: "TSR_INVALID_PROPS",
        message: 'service "timers" must also be registered as a poll source',
      },
    );
  });
});

describe("run loop quit", () => {
  test("quit skips the remaining sources, drains the queue and does not render", () => {
    const log: string[] = [];
    const a = scriptedSource("A", log);
    const c = scriptedSource("C", log);
    a.give(controlEvent("q"));
    c.give(CHANGED);
    const { loop, terminal } = setup(log, [a, c], (event, ctx) => {
      if (event !== "q") return UNCHANGED;
      ctx.queueErr(new Error("late"));
      ctx.queue(CHANGED);
      return QUIT;
    });
    const report = loop.tick();
    assert.equal(report.quit, true);
    assert.equal(report.rendered, false);
    assert.deepEqual(log, ["poll:A", "poll:C", "read:A", "event:q", "error:late"]);
    assert.equal(terminal.frames(), 0);
    assert.equal(loop.isQuitting(), true);

    log.length = 0;
    loop.tick();
    assert.deepEqual(log, []);
  });

  test("confirmQuit lets the event handler veto or confirm", () => {
    const log: string[] = [];
    const a = scriptedSource("A", log);
    let allow = false;
    const { loop } = setup(
      log,
      [a],
      (event) => (event === "quit?" && allow ? QUIT : UNCHANGED),
      { confirmQuit: () => "quit?" },
    );

    a.give(QUIT);
    loop.tick();
    assert.equal(loop.isQuitting(), false);
    assert.deepEqual(log, ["poll:A", "read:A", "event:quit?"]);

    allow = true;
    a.give(QUIT);
    const report = loop.tick();
    assert.equal(report.quit, true);
  });
});

describe("run loop rendering", () => {
  test("applies clear, insertions, cursor and title around the frame", () => {
    const log: string[] = [];
    const clock = createManualClock();
    const a = scriptedSource("A", log);
    a.give(controlEvent("decorate"));
    const terminal = createTestTerminal({ cols: 12, rows: 2 });
    const loop = createRunLoop<AppState, string, unknown, TestFrame>({
      state: { renders: 0 },
      terminal,
      sources: [a],
      now: clock.now,
      onRendered: () => "rendered",
      handlers: {
        render: (_area, frame, _state, ctx) => {
          frame.write(0, 0, `frame ${ctx.count()}`);
          ctx.setScreenCursor({ x: 3, y: 1 });
          clock.advance(2);
        },
        event: (event, _state, ctx) => {
          log.push(`event:${event}`);
          if (event !== "decorate") return UNCHANGED;
          ctx.clearTerminal();
          ctx.insertBefore(1, (frame) => frame.write(0, 0, "banner"));
          ctx.setWindowTitle("Files");
          clock.advance(5);
          return CHANGED;
        },
        error: () => CONTINUE,
      },
    });

    loop.tick();
    assert.deepEqual(terminal.calls(), ["clear", "insert:1", "render", "cursor:3,1", "title:Files"]);
    assert.deepEqual(terminal.inserted(), ["banner"]);
    assert.equal(terminal.lastFrame()[0], "frame 0     ");
    assert.equal(loop.context.count(), 1);
    assert.equal(loop.context.lastEventMs(), 5);
    assert.equal(loop.context.lastRenderMs(), 2);

    loop.tick();
    assert.deepEqual(
      log.filter((l) => l.startsWith("event:")),
      ["event:decorate", "event:rendered"],
    );
  });

  test("renderNow is refused while a tick is running", () => {
    const log: string[] = [];
    const a = scriptedSource("A", log);
    a.give(controlEvent("draw"));
    const holder: { renderNow?: () => void } = {};
    const { loop } = setup(log, [a], () => {
      holder.renderNow?.();
      return UNCHANGED;
    });
    holder.renderNow = loop.renderNow;
    loop.tick();
    assert.equal(
      log.at(-1),
      "error:TSR_USER_CODE_THROW: event handler threw: TesseraError: renderNow: re-entrant call",
    );
    loop.renderNow();
    assert.equal(loop.state.renders, 1);
  });
});

import { assert, describe, test } from "@tessera/testkit";
import { TesseraError } from "../../errors.js";
import { type DialogStack, createDialogStack } from "../dialogStack.js";
import type { WindowHandler } from "../types.js";
import {
  WINDOW_CHANGED,
  WINDOW_CONTINUE,
  WINDOW_UNCHANGED,
  windowClose,
} from "../windowControl.js";
import { type AppEvent, type Ctx, say } from "./fixtures.js";

class Confirm {
  constructor(readonly title: string) {}
}

class Progress {
  percent = 0;
}

const KEY: AppEvent = { kind: "input", input: { kind: "key", key: "y", mods: 0 } };
const TICK = say("tick");

type Stack = DialogStack<AppEvent, Ctx, string[]>;

function openConfirm(
  stack: Stack,
  title: string,
  handler: WindowHandler<Confirm, AppEvent, Ctx> = () => WINDOW_CONTINUE,
): number {
  return stack.push(
    (_area, frame, state) => {
      frame.push(state.title);
    },
    (ev, state, ctx) => {
      ctx.log.push(`${state.title}:${ev.kind}`);
      return handler(ev, state, ctx);
    },
    new Confirm(title),
  );
}

function setup(): { stack: Stack; ctx: Ctx } {
  return {
    stack: createDialogStack<AppEvent, Ctx, string[]>({ isInput: (ev) => ev.kind === "input" }),
    ctx: { log: [] },
  };
}

describe("dialog stack dispatch", () => {
  test("input ignored by the top dialog is swallowed", () => {
    const { stack, ctx } = setup();
    openConfirm(stack, "lower");
    openConfirm(stack, "upper");
    assert.equal(stack.handle(KEY, ctx), WINDOW_UNCHANGED);
    assert.deepEqual(ctx.log, ["upper:input"]);
  });

  test("application events pass through every dialog", () => {
    const { stack, ctx } = setup();
    openConfirm(stack, "lower");
    openConfirm(stack, "upper");
    assert.equal(stack.handle(TICK, ctx), WINDOW_CONTINUE);
    assert.deepEqual(ctx.log, ["upper:say", "lower:say"]);
  });

  test("a lower dialog may consume an application event", () => {
    const { stack, ctx } = setup();
    openConfirm(stack, "lower", () => WINDOW_CHANGED);
    openConfirm(stack, "upper");
    assert.equal(stack.handle(TICK, ctx), WINDOW_CHANGED);
  });

  test("without an input predicate every event is blocked", () => {
    const stack = createDialogStack<AppEvent, Ctx, string[]>();
    const ctx: Ctx = { log: [] };
    openConfirm(stack, "lower");
    openConfirm(stack, "upper");
    assert.equal(stack.handle(TICK, ctx), WINDOW_UNCHANGED);
    assert.deepEqual(ctx.log, ["upper:say"]);
  });

  test("an empty stack continues", () => {
    const { stack, ctx } = setup();
    assert.equal(stack.handle(KEY, ctx), WINDOW_CONTINUE);
  });

  test("close removes the answering dialog and is returned", () => {
    const { stack, ctx } = setup();
    openConfirm(stack, "lower");
    openConfirm(stack, "upper", (_ev, state) => windowClose(say(`${state.title} confirmed`)));
    assert.deepEqual(stack.handle(KEY, ctx), windowClose(say("upper confirmed")));
    assert.equal(stack.len(), 1);
    assert.equal(stack.get(0, Confirm)?.title, "lower");
  });

  test("removing a dialog from inside a dialog handler fails", () => {
    const { stack, ctx } = setup();
    openConfirm(stack, "lower");
    openConfirm(stack, "upper", () => {
      stack.remove(0);
      return WINDOW_UNCHANGED;
    });
    assert.throws(
      () => stack.handle(KEY, ctx),
      (e: unknown) =>
        e instanceof TesseraError &&
        e.code === "TSR_REENTRANT_CALL" &&
        e.message === "remove: state is gone (dialog 1 is inside its own call)",
    );
    assert.equal(stack.len(), 2);
  });

  test("a dialog cannot reach its own state through the stack during its call", () => {
    const { stack, ctx } = setup();
    const seen: Array<Confirm | undefined> = [];
    openConfirm(stack, "only", () => {
      seen.push(stack.get(0, Confirm));
      return WINDOW_UNCHANGED;
    });
    stack.handle(KEY, ctx);
    assert.deepEqual(seen, [undefined]);
  });
});

describe("dialog stack bookkeeping", () => {
  test("push returns indices and pop hands back the top state", () => {
    const { stack } = setup();
    assert.equal(openConfirm(stack, "a"), 0);
    assert.equal(
      stack.push(
        () => {},
        () => WINDOW_CONTINUE,
        new Progress(),
      ),
      1,
    );
    const popped = stack.pop();
    assert.ok(popped instanceof Progress);
    assert.equal(stack.len(), 1);
    stack.pop();
    assert.equal(stack.isEmpty(), true);
    assert.equal(stack.pop(), undefined);
  });

  test("typed lookups", () => {
    const { stack } = setup();
    openConfirm(stack, "a");
    stack.push(
      () => {},
      () => WINDOW_CONTINUE,
      new Progress(),
    );
    openConfirm(stack, "b");

    assert.equal(stack.stateIs(1, Progress), true);
    assert.equal(stack.stateIs(1, Confirm), false);
    assert.equal(stack.get(1, Confirm), undefined);
    assert.equal(stack.get(7, Confirm), undefined);
    assert.equal(stack.top(Confirm), 2);
    assert.equal(stack.top(Progress), 1);
  });

  test("remove rejects an index outside the stack", () => {
    const { stack } = setup();
    assert.throws(
      () => stack.remove(0),
      (e: unknown) =>
        e instanceof TesseraError && e.message === "remove: no dialog at index 0",
    );
  });

  test("renders bottom to top", () => {
    const { stack, ctx } = setup();
    openConfirm(stack, "first");
    openConfirm(stack, "second");
    const frame: string[] = [];
    stack.render({ x: 0, y: 0, w: 40, h: 12 }, frame, ctx);
    assert.deepEqual(frame, ["first", "second"]);
  });
});

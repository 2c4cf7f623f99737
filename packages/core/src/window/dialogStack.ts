/**
 * packages/core/src/window/dialogStack.ts — Stack of modal dialogs.
 *
 * Only the top dialog is interactive. Input it ignores is swallowed, so nothing below
 * the stack reacts while a dialog is open; other application events (timer ticks, job
 * results) fall through to the next dialog and finally back to the caller.
 */

import { TesseraError, invalidProps } from "../errors.js";
import type { Rect } from "../geometry.js";
import type { StateKind, WindowHandler, WindowRender } from "./types.js";
import { WINDOW_CONTINUE, WINDOW_UNCHANGED, type WindowControl } from "./windowControl.js";

export type DialogStackOptions<E> = Readonly<{
  /** Events a dialog blocks when it does not handle them. Defaults to every event. */
  isInput?: (event: E) => boolean;
}>;

export type DialogStack<E, C, D = unknown> = Readonly<{
  /** Open a dialog on top. Returns its index. */
  push: <S extends object>(
    render: WindowRender<S, C, D>,
    event: WindowHandler<S, E, C>,
    state: S,
  ) => number;
  /** Remove the top dialog and return its state. */
  pop: () => object | undefined;
  remove: (n: number) => object;
  /** The state of dialog `n` when it is of `kind` and not inside its own call. */
  get: <S>(n: number, kind: StateKind<S>) => S | undefined;
  stateIs: (n: number, kind: StateKind<unknown>) => boolean;
  /** Index of the topmost dialog of `kind`. */
  top: (kind: StateKind<unknown>) => number | undefined;
  len: () => number;
  isEmpty: () => boolean;
  /** Render every dialog, bottom to top. */
  render: (area: Rect, frame: D, ctx: C) => void;
  handle: (event: E, ctx: C) => WindowControl<E>;
}>;

type DialogSlot<E, C, D> = {
  readonly state: object;
  readonly render: (area: Rect, frame: D, ctx: C) => void;
  readonly event: (event: E, ctx: C) => WindowControl<E>;
  checkedOut: boolean;
};

export function createDialogStack<E, C, D = unknown>(
  opts: DialogStackOptions<E> = {},
): DialogStack<E, C, D> {
  const slots: DialogSlot<E, C, D>[] = [];
  const isInput = opts.isInput ?? (() => true);

  function assertNoneCheckedOut(method: string): void {
    const n = slots.findIndex((s) => s.checkedOut);
    if (n >= 0) {
      throw new TesseraError(
        "TSR_REENTRANT_CALL",
        `${method}: state is gone (dialog ${n} is inside its own call)`,
      );
    }
  }

  function call<R>(method: string, n: number, slot: DialogSlot<E, C, D>, fn: () => R): R {
    if (slot.checkedOut) {
      throw new TesseraError("TSR_REENTRANT_CALL", `${method}: dialog ${n} is already in use`);
    }
    slot.checkedOut = true;
    try {
      return fn();
    } finally {
      slot.checkedOut = false;
    }
  }

  function push<S extends object>(
    render: WindowRender<S, C, D>,
    event: WindowHandler<S, E, C>,
    state: S,
  ): number {
    slots.push({
      state,
      render: (area, frame, ctx) => render(area, frame, state, ctx),
      event: (ev, ctx) => event(ev, state, ctx),
      checkedOut: false,
    });
    return slots.length - 1;
  }

  function remove(n: number): object {
    assertNoneCheckedOut("remove");
    const slot = slots[n];
    if (slot === undefined) invalidProps(`remove: no dialog at index ${n}`);
    slots.splice(n, 1);
    return slot.state;
  }

  function pop(): object | undefined {
    if (slots.length === 0) return undefined;
    return remove(slots.length - 1);
  }

  function get<S>(n: number, kind: StateKind<S>): S | undefined {
    const slot = slots[n];
    if (slot === undefined || slot.checkedOut) return undefined;
    const state = slot.state;
    return state instanceof kind ? state : undefined;
  }

  function stateIs(n: number, kind: StateKind<unknown>): boolean {
    const slot = slots[n];
    return slot !== undefined && slot.state instanceof kind;
  }

  function top(kind: StateKind<unknown>): number | undefined {
    for (let n = slots.length - 1; n >= 0; n--) {
      if (stateIs(n, kind)) return n;
    }
    return undefined;
  }

  function render(area: Rect, frame: D, ctx: C): void {
    for (let n = 0; n < slots.length; n++) {
      const slot = slots[n];
      if (slot === undefined) continue;
      call("render", n, slot, () => slot.render(area, frame, ctx));
    }
  }

  function handle(event: E, ctx: C): WindowControl<E> {
    for (let n = slots.length - 1; n >= 0; n--) {
      const slot = slots[n];
      if (slot === undefined) continue;
      const r = call("handle", n, slot, () => slot.event(event, ctx));
      switch (r.kind) {
        case "close":
          remove(slots.indexOf(slot));
          return r;
        case "event":
        case "changed":
        case "unchanged":
          return r;
        case "continue":
          if (isInput(event)) return WINDOW_UNCHANGED;
          break;
      }
    }
    return WINDOW_CONTINUE;
  }

  return Object.freeze({
    push,
    pop,
    remove,
    get,
    stateIs,
    top,
    len: () => slots.length,
    isEmpty: () => slots.length === 0,
    render,
    handle,
  });
}

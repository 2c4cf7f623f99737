/**
 * packages/core/src/window/windowStack.ts — Z-ordered stack of modeless windows.
 *
 * Why: overlapping windows need one owner for stacking order, click-to-front and input
 * routing, while each window keeps its own typed state and handlers.
 *
 * Stack concepts:
 *   - Z-order: position in the stack; the last entry is on top and sees events first
 *   - Checked out: a window is marked while its own render or event call runs. Stack
 *     mutations are refused while any window is checked out
 *   - Borrow: `get()` hands out one window's state exclusively until released. Other
 *     windows stay usable, which is how a window reads a sibling during its own call
 *   - Mouse trap: a press, release, move or scroll inside a window never reaches the
 *     windows below it, even when the window ignores it
 */

import { TesseraError, invalidProps } from "../errors.js";
import type { Rect } from "../geometry.js";
import { type MouseAdapter, isPrimaryPressIn, mouseTrap } from "./mouse.js";
import type {
  StateKind,
  WindowBorrow,
  WindowHandler,
  WindowRender,
  WindowState,
} from "./types.js";
import {
  WINDOW_CHANGED,
  WINDOW_CONTINUE,
  WINDOW_UNCHANGED,
  type WindowControl,
  mergeWindowControl,
} from "./windowControl.js";

// =============================================================================
// Types
// =============================================================================

export type WindowStackOptions<E> = Readonly<{
  /** Without an adapter the stack sees no mouse: no click-to-front, no trap. */
  mouse?: MouseAdapter<E>;
}>;

export type WindowStack<E, C, D = unknown> = Readonly<{
  /** Push a window on top. Returns its index. */
  show: <S extends WindowState<C>>(
    render: WindowRender<S, C, D>,
    event: WindowHandler<S, E, C>,
    state: S,
    ctx: C,
  ) => number;
  /** Remove window `n` and return its state. */
  close: (n: number, ctx: C) => WindowState<C>;
  toFront: (n: number, ctx: C) => void;
  toBack: (n: number, ctx: C) => void;
  /** Borrow window `n`'s state. Throws on a wrong kind or a window already in use. */
  get: <S>(n: number, kind: StateKind<S>) => WindowBorrow<S>;
  /** Like `get`, but undefined instead of throwing. */
  tryGet: <S>(n: number, kind: StateKind<S>) => WindowBorrow<S> | undefined;
  /** Borrow for the duration of `fn`. */
  apply: <S, R>(n: number, kind: StateKind<S>, fn: (state: S) => R) => R;
  stateIs: (n: number, kind: StateKind<unknown>) => boolean;
  /** Indices of windows of `kind`, topmost first. */
  find: (kind: StateKind<unknown>) => readonly number[];
  /** Index of the topmost window, or of the topmost one of `kind`. */
  top: (kind?: StateKind<unknown>) => number | undefined;
  len: () => number;
  isEmpty: () => boolean;
  /** Render every window, bottom to top. */
  render: (area: Rect, frame: D, ctx: C) => void;
  /** Offer an event to the windows, top to bottom. */
  handle: (event: E, ctx: C) => WindowControl<E>;
}>;

type Slot<E, C, D> = {
  readonly state: WindowState<C>;
  readonly render: (area: Rect, frame: D, ctx: C) => void;
  readonly event: (event: E, ctx: C) => WindowControl<E>;
  checkedOut: boolean;
  borrowed: boolean;
};

// =============================================================================
// Window stack
// =============================================================================

export function createWindowStack<E, C, D = unknown>(
  opts: WindowStackOptions<E> = {},
): WindowStack<E, C, D> {
  const slots: Slot<E, C, D>[] = [];
  const mouseOf = opts.mouse;

  function reentrant(detail: string): never {
    throw new TesseraError("TSR_REENTRANT_CALL", detail);
  }

  function assertNoneCheckedOut(method: string): void {
    const n = slots.findIndex((s) => s.checkedOut);
    if (n >= 0) reentrant(`${method}: state is gone (window ${n} is inside its own call)`);
  }

  function slotAt(method: string, n: number): Slot<E, C, D> {
    const slot = slots[n];
    if (slot === undefined) invalidProps(`${method}: no window at index ${n}`);
    return slot;
  }

  function updateTop(ctx: C): void {
    const last = slots.length - 1;
    for (let i = 0; i <= last; i++) {
      slots[i]?.state.setTop(i === last, ctx);
    }
  }

  function callChecked<R>(method: string, n: number, slot: Slot<E, C, D>, fn: () => R): R {
    if (slot.checkedOut || slot.borrowed) {
      reentrant(`${method}: window ${n} is already in use`);
    }
    slot.checkedOut = true;
    try {
      return fn();
    } finally {
      slot.checkedOut = false;
    }
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  function show<S extends WindowState<C>>(
    render: WindowRender<S, C, D>,
    event: WindowHandler<S, E, C>,
    state: S,
    ctx: C,
  ): number {
    assertNoneCheckedOut("show");
    slots.push({
      state,
      render: (area, frame, c) => render(area, frame, state, c),
      event: (ev, c) => event(ev, state, c),
      checkedOut: false,
      borrowed: false,
    });
    updateTop(ctx);
    return slots.length - 1;
  }

  function close(n: number, ctx: C): WindowState<C> {
    assertNoneCheckedOut("close");
    const slot = slotAt("close", n);
    if (slot.borrowed) reentrant(`close: window ${n} is borrowed`);
    slots.splice(n, 1);
    updateTop(ctx);
    return slot.state;
  }

  function toFront(n: number, ctx: C): void {
    assertNoneCheckedOut("toFront");
    const slot = slotAt("toFront", n);
    slots.splice(n, 1);
    slots.push(slot);
    updateTop(ctx);
  }

  function toBack(n: number, ctx: C): void {
    assertNoneCheckedOut("toBack");
    const slot = slotAt("toBack", n);
    slots.splice(n, 1);
    slots.unshift(slot);
    updateTop(ctx);
  }

  // ---------------------------------------------------------------------------
  // Typed access
  // ---------------------------------------------------------------------------

  function borrow<S>(slot: Slot<E, C, D>, state: S): WindowBorrow<S> {
    slot.borrowed = true;
    let released = false;
    return Object.freeze({
      state,
      release: () => {
        if (released) return;
        released = true;
        slot.borrowed = false;
      },
    });
  }

  function get<S>(n: number, kind: StateKind<S>): WindowBorrow<S> {
    const slot = slotAt("get", n);
    if (slot.checkedOut || slot.borrowed) reentrant(`get: window ${n} is already in use`);
    const state = slot.state;
    if (!(state instanceof kind)) {
      throw new TesseraError("TSR_WRONG_TYPE", `get: window ${n} is not a ${kind.name}`);
    }
    return borrow(slot, state);
  }

  function tryGet<S>(n: number, kind: StateKind<S>): WindowBorrow<S> | undefined {
    const slot = slots[n];
    if (slot === undefined || slot.checkedOut || slot.borrowed) return undefined;
    const state = slot.state;
    return state instanceof kind ? borrow(slot, state) : undefined;
  }

  function apply<S, R>(n: number, kind: StateKind<S>, fn: (state: S) => R): R {
    const b = get(n, kind);
    try {
      return fn(b.state);
    } finally {
      b.release();
    }
  }

  function stateIs(n: number, kind: StateKind<unknown>): boolean {
    const slot = slots[n];
    return slot !== undefined && slot.state instanceof kind;
  }

  function find(kind: StateKind<unknown>): readonly number[] {
    const out: number[] = [];
    for (let n = slots.length - 1; n >= 0; n--) {
      if (stateIs(n, kind)) out.push(n);
    }
    return Object.freeze(out);
  }

  function top(kind?: StateKind<unknown>): number | undefined {
    if (kind === undefined) return slots.length > 0 ? slots.length - 1 : undefined;
    return find(kind)[0];
  }

  // ---------------------------------------------------------------------------
  // Render and dispatch
  // ---------------------------------------------------------------------------

  function render(area: Rect, frame: D, ctx: C): void {
    for (let n = 0; n < slots.length; n++) {
      const slot = slots[n];
      if (slot === undefined) continue;
      callChecked("render", n, slot, () => slot.render(area, frame, ctx));
    }
  }

  function handle(event: E, ctx: C): WindowControl<E> {
    const mouse = mouseOf?.(event);
    for (let n = slots.length - 1; n >= 0; n--) {
      const slot = slots[n];
      if (slot === undefined) continue;
      // Decided before the call: the handler may move the window.
      const area = slot.state.area();
      const promote = isPrimaryPressIn(mouse, area);

      const r = callChecked("handle", n, slot, () => slot.event(event, ctx));

      let front: WindowControl<E> = WINDOW_CONTINUE;
      if (promote) {
        toFront(slots.indexOf(slot), ctx);
        front = WINDOW_CHANGED;
      }

      switch (r.kind) {
        case "close":
          close(slots.indexOf(slot), ctx);
          return mergeWindowControl(r, front);
        case "event":
        case "changed":
        case "unchanged":
          return mergeWindowControl(r, front);
        case "continue":
          if (mouseTrap(mouse, area) === "unchanged") {
            return mergeWindowControl(WINDOW_UNCHANGED, front);
          }
          break;
      }
    }
    return WINDOW_CONTINUE;
  }

  return Object.freeze({
    show,
    close,
    toFront,
    toBack,
    get,
    tryGet,
    apply,
    stateIs,
    find,
    top,
    len: () => slots.length,
    isEmpty: () => slots.length === 0,
    render,
    handle,
  });
}

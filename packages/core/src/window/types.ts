/**
 * packages/core/src/window/types.ts — Contracts shared by the window and dialog stacks.
 */

import type { Rect } from "../geometry.js";
import type { WindowControl } from "./windowControl.js";

/**
 * The class of a window state. Stacks hold states type-erased and recover the concrete
 * type with `instanceof`, so lookups name the class: `stack.get(0, FindWindow)`.
 */
export type StateKind<S> = abstract new (...args: never[]) => S;

/** What every state held by a window stack provides. */
export interface WindowState<C> {
  /** Called after every reorder; exactly one window in a stack is top. */
  setTop(top: boolean, ctx: C): void;
  /** Screen area, used for focus-on-click and the mouse trap. */
  area(): Rect;
}

export type WindowRender<S, C, D> = (area: Rect, frame: D, state: S, ctx: C) => void;

export type WindowHandler<S, E, C> = (event: E, state: S, ctx: C) => WindowControl<E>;

/**
 * Exclusive access to one window's state, held until `release()`.
 * While held, the window cannot be closed, rendered or sent events.
 */
export type WindowBorrow<S> = Readonly<{
  state: S;
  /** Idempotent. */
  release: () => void;
}>;

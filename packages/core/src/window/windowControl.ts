/**
 * packages/core/src/window/windowControl.ts — Outcome of a window handler.
 *
 * Why: windows need one level the run loop's Control does not have, `close`, so the stack
 * can drop the window that asked for it and still hand its payload upwards.
 *
 *   continue < unchanged < changed < event < close
 */

import {
  CHANGED,
  CONTINUE,
  type Control,
  type Outcome,
  UNCHANGED,
  controlEvent,
} from "../control/control.js";

export type WindowControl<E> =
  | Readonly<{ kind: "continue" }>
  | Readonly<{ kind: "unchanged" }>
  | Readonly<{ kind: "changed" }>
  | Readonly<{ kind: "event"; event: E }>
  | Readonly<{
      /** Remove this window; `event` is passed on like an `event` result. */
      kind: "close";
      event: E;
    }>;

export type WindowControlKind = WindowControl<unknown>["kind"];

export const WINDOW_CONTINUE: WindowControl<never> = Object.freeze({ kind: "continue" });
export const WINDOW_UNCHANGED: WindowControl<never> = Object.freeze({ kind: "unchanged" });
export const WINDOW_CHANGED: WindowControl<never> = Object.freeze({ kind: "changed" });

const WINDOW_RANK: Readonly<Record<WindowControlKind, number>> = Object.freeze({
  continue: 0,
  unchanged: 1,
  changed: 2,
  event: 3,
  close: 4,
});

export function windowEvent<E>(event: E): WindowControl<E> {
  return Object.freeze({ kind: "event", event });
}

export function windowClose<E>(event: E): WindowControl<E> {
  return Object.freeze({ kind: "close", event });
}

export function windowControlRank(c: WindowControl<unknown>): number {
  return WINDOW_RANK[c.kind];
}

/** `primary` only when it ranks strictly higher; ties go to `secondary`. */
export function mergeWindowControl<E>(
  primary: WindowControl<E>,
  secondary: WindowControl<E>,
): WindowControl<E> {
  return windowControlRank(primary) > windowControlRank(secondary) ? primary : secondary;
}

export function windowControlFromOutcome(o: Outcome): WindowControl<never> {
  switch (o) {
    case "continue":
      return WINDOW_CONTINUE;
    case "unchanged":
      return WINDOW_UNCHANGED;
    case "changed":
      return WINDOW_CHANGED;
  }
}

/** A window has no `quit`; it narrows to `continue`. */
export function windowControlFromControl<E>(c: Control<E>): WindowControl<E> {
  switch (c.kind) {
    case "continue":
    case "quit":
      return WINDOW_CONTINUE;
    case "unchanged":
      return WINDOW_UNCHANGED;
    case "changed":
      return WINDOW_CHANGED;
    case "event":
      return windowEvent(c.event);
  }
}

/** `close(e)` reaches the run loop as `event(e)`; the stack has already dropped the window. */
export function controlFromWindowControl<E>(c: WindowControl<E>): Control<E> {
  switch (c.kind) {
    case "continue":
      return CONTINUE;
    case "unchanged":
      return UNCHANGED;
    case "changed":
      return CHANGED;
    case "event":
    case "close":
      return controlEvent(c.event);
  }
}

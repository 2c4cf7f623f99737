/**
 * packages/core/src/control/control.ts — The control lattice.
 *
 * Every handler in the kernel answers with a Control value:
 *
 *   continue < unchanged < changed < event < quit
 *
 * Ordering and equality look at `kind` only. Two `event` values compare equal whatever
 * their payloads. Errors never live inside a Control; they ride beside it in a
 * ControlResult.
 */

// =============================================================================
// Types
// =============================================================================

export type Control<E> =
  | Readonly<{
      /** Not handled here; the caller may offer it to the next handler. */
      kind: "continue";
    }>
  | Readonly<{
      /** Handled, nothing visible changed. */
      kind: "unchanged";
    }>
  | Readonly<{
      /** Handled, the next frame must be rendered. */
      kind: "changed";
    }>
  | Readonly<{
      /** Handled, and produced an application event for the event handler. */
      kind: "event";
      event: E;
    }>
  | Readonly<{
      /** Stop the run loop. */
      kind: "quit";
    }>;

export type ControlKind = Control<unknown>["kind"];

/** The three-level outcome used by leaf widgets. Embeds into Control without loss. */
export type Outcome = "continue" | "unchanged" | "changed";

/** A Control or the error that replaced it. */
export type ControlResult<E> =
  | Readonly<{ ok: true; value: Control<E> }>
  | Readonly<{ ok: false; error: unknown }>;

// =============================================================================
// Constants
// =============================================================================

export const CONTINUE: Control<never> = Object.freeze({ kind: "continue" });
export const UNCHANGED: Control<never> = Object.freeze({ kind: "unchanged" });
export const CHANGED: Control<never> = Object.freeze({ kind: "changed" });
export const QUIT: Control<never> = Object.freeze({ kind: "quit" });

const CONTROL_RANK: Readonly<Record<ControlKind, number>> = Object.freeze({
  continue: 0,
  unchanged: 1,
  changed: 2,
  event: 3,
  quit: 4,
});

export function controlEvent<E>(event: E): Control<E> {
  return Object.freeze({ kind: "event", event });
}

export function controlOk<E>(value: Control<E>): ControlResult<E> {
  return Object.freeze({ ok: true, value });
}

export function controlErr(error: unknown): ControlResult<never> {
  return Object.freeze({ ok: false, error });
}

// =============================================================================
// Ordering
// =============================================================================

export function controlRank(c: Control<unknown>): number {
  return CONTROL_RANK[c.kind];
}

/** Negative, zero or positive as `a` sorts before, with, or after `b`. */
export function compareControl(a: Control<unknown>, b: Control<unknown>): number {
  return controlRank(a) - controlRank(b);
}

/** Discriminant-only equality: `event(a)` equals `event(b)` for any payloads. */
export function controlEquals(a: Control<unknown>, b: Control<unknown>): boolean {
  return a.kind === b.kind;
}

/**
 * The greater of two controls. On a tie the second argument wins, so the most recent
 * event payload survives a fold.
 */
export function mergeControl<E>(a: Control<E>, b: Control<E>): Control<E> {
  return controlRank(a) > controlRank(b) ? a : b;
}

export function isConsumed(c: Control<unknown>): boolean {
  return c.kind !== "continue";
}

/**
 * Offer an input to each handler in turn and return the first consumed answer.
 * Handlers after that one are not called.
 */
export function flow<E>(...handlers: ReadonlyArray<() => Control<E>>): Control<E> {
  for (const handler of handlers) {
    const r = handler();
    if (isConsumed(r)) return r;
  }
  return CONTINUE;
}

// =============================================================================
// Outcome conversions
// =============================================================================

export function controlFromOutcome(o: Outcome): Control<never> {
  switch (o) {
    case "continue":
      return CONTINUE;
    case "unchanged":
      return UNCHANGED;
    case "changed":
      return CHANGED;
  }
}

/** Narrowing to an Outcome drops `event` and `quit` to "continue". */
export function outcomeFromControl(c: Control<unknown>): Outcome {
  switch (c.kind) {
    case "continue":
    case "unchanged":
    case "changed":
      return c.kind;
    case "event":
    case "quit":
      return "continue";
  }
}

/**
 * packages/core/src/poll/timers.ts — Timer registry.
 *
 * Logical timers checked against the clock on every poll. Entries are kept sorted by
 * deadline, earliest first, and timers sharing a deadline fire in registration order.
 * A repeating timer advances its deadline by exactly one interval per firing, so a
 * late loop catches up with back-to-back firings instead of skipping them.
 *
 * The run loop reads this source until `poll()` turns false. The first `poll()` of such a
 * run fixes a cutoff time, and only deadlines at or before it fire until a `poll()`
 * returns false. A deadline re-armed past the cutoff waits for the next tick, however
 * long the handlers take, and so does a timer added while the run is open.
 */

import {
  CHANGED,
  CONTINUE,
  type ControlResult,
  controlEvent,
  controlOk,
} from "../control/control.js";
import { invalidProps } from "../errors.js";
import type { PollSource } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type TimerHandle = Readonly<{ tag: number }>;

/** Payload of a fired timer. `counter` is 0 on the first firing. */
export type TimeOut = Readonly<{ handle: TimerHandle; counter: number }>;

export type TimerDef = Readonly<{
  intervalMs: number;
  /** Total number of firings. Defaults to 1; `Infinity` repeats until removed. */
  repeat?: number;
  /** Fire as a plain repaint request instead of an application event. */
  repaint?: boolean;
  /** Absolute time of the first firing. Defaults to now + intervalMs. */
  firstAtMs?: number;
}>;

export type TimerRegistryOptions<E> = Readonly<{
  /** Builds the application event for a non-repaint timer. */
  toEvent: (timeout: TimeOut) => E;
  now?: () => number;
}>;

export type TimerRegistry<E> = PollSource<E> &
  Readonly<{
    add: (def: TimerDef) => TimerHandle;
    /** Removing a handle that already expired or was removed does nothing. */
    remove: (handle: TimerHandle) => void;
    /** Remove `old` (if given and still live), then add `def`. */
    replace: (old: TimerHandle | undefined, def: TimerDef) => TimerHandle;
    has: (handle: TimerHandle) => boolean;
    size: () => number;
    sleepTimeMs: () => number | undefined;
  }>;

type TimerEntry = {
  readonly handle: TimerHandle;
  readonly intervalMs: number;
  readonly repeat: number;
  readonly repaint: boolean;
  count: number;
  nextAtMs: number;
};

// =============================================================================
// Validation
// =============================================================================

function requireInterval(v: number, repeat: number): number {
  if (!Number.isFinite(v) || v < 0) {
    invalidProps(`timer intervalMs must be a finite number >= 0 (got ${String(v)})`);
  }
  if (v === 0 && repeat > 1) {
    invalidProps("timer intervalMs must be > 0 for a repeating timer");
  }
  return v;
}

function requireRepeat(v: number | undefined): number {
  if (v === undefined) return 1;
  if (v === Number.POSITIVE_INFINITY) return v;
  if (!Number.isInteger(v) || v < 1) {
    invalidProps(`timer repeat must be an integer >= 1 or Infinity (got ${String(v)})`);
  }
  return v;
}

// =============================================================================
// Registry
// =============================================================================

export function createTimerRegistry<E>(opts: TimerRegistryOptions<E>): TimerRegistry<E> {
  const now = opts.now ?? Date.now;
  const toEvent = opts.toEvent;
  const timers: TimerEntry[] = [];
  // Added while a cutoff is open; joins `timers` when the run ends.
  const held: TimerEntry[] = [];
  let lastTag = 0;
  // Set by the first poll() of a read-until-idle run, cleared when a poll() finds nothing.
  let cutoffMs: number | undefined;

  function insert(entry: TimerEntry): void {
    let i = timers.length;
    while (i > 0) {
      const prev = timers[i - 1];
      if (prev !== undefined && prev.nextAtMs <= entry.nextAtMs) break;
      i--;
    }
    timers.splice(i, 0, entry);
  }

  function add(def: TimerDef): TimerHandle {
    const repeat = requireRepeat(def.repeat);
    const intervalMs = requireInterval(def.intervalMs, repeat);
    lastTag++;
    const handle: TimerHandle = Object.freeze({ tag: lastTag });
    const entry: TimerEntry = {
      handle,
      intervalMs,
      repeat,
      repaint: def.repaint === true,
      count: 0,
      nextAtMs: def.firstAtMs ?? now() + intervalMs,
    };
    if (cutoffMs === undefined) insert(entry);
    else held.push(entry);
    return handle;
  }

  function removeFrom(list: TimerEntry[], handle: TimerHandle): boolean {
    const i = list.findIndex((t) => t.handle.tag === handle.tag);
    if (i < 0) return false;
    list.splice(i, 1);
    return true;
  }

  function remove(handle: TimerHandle): void {
    if (!removeFrom(timers, handle)) removeFrom(held, handle);
  }

  function has(handle: TimerHandle): boolean {
    return [timers, held].some((list) => list.some((t) => t.handle.tag === handle.tag));
  }

  function isDue(cutoff: number): boolean {
    const first = timers[0];
    return first !== undefined && first.nextAtMs <= cutoff;
  }

  function poll(): boolean {
    if (cutoffMs === undefined) cutoffMs = now();
    if (isDue(cutoffMs)) return true;
    cutoffMs = undefined;
    for (const entry of held.splice(0)) insert(entry);
    return false;
  }

  function read(): ControlResult<E> {
    const first = timers[0];
    if (first === undefined || !isDue(cutoffMs ?? now())) return controlOk(CONTINUE);
    timers.shift();

    const timeout: TimeOut = Object.freeze({ handle: first.handle, counter: first.count });
    first.count++;
    if (first.count < first.repeat) {
      first.nextAtMs += first.intervalMs;
      insert(first);
    }

    if (first.repaint) return controlOk(CHANGED);
    return controlOk(controlEvent(toEvent(timeout)));
  }

  function sleepTimeMs(): number | undefined {
    let next = timers[0]?.nextAtMs;
    for (const entry of held) {
      if (next === undefined || entry.nextAtMs < next) next = entry.nextAtMs;
    }
    if (next === undefined) return undefined;
    return Math.max(0, next - now());
  }

  return Object.freeze({
    label: "timers",
    readUntilIdle: true,
    poll,
    read,
    sleepTimeMs,
    add,
    remove,
    replace: (old: TimerHandle | undefined, def: TimerDef) => {
      if (old !== undefined) remove(old);
      return add(def);
    },
    has,
    size: () => timers.length + held.length,
  });
}

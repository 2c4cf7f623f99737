/**
 * packages/core/src/poll/channel.ts — One-way result channel.
 *
 * Producers (background jobs, async tasks, an input backend) send results; the run loop
 * reads them one at a time. Unbounded. Every send wakes the run loop if it is asleep.
 */

import { CONTINUE, type ControlResult, controlOk } from "../control/control.js";
import type { Waker } from "./types.js";

export type ResultChannel<E> = Readonly<{
  send: (result: ControlResult<E>) => void;
  poll: () => boolean;
  /** Oldest pending result, or `continue` when the channel is empty. */
  read: () => ControlResult<E>;
  setWaker: (wake: Waker) => void;
  size: () => number;
}>;

export function createResultChannel<E>(): ResultChannel<E> {
  const pending: ControlResult<E>[] = [];
  let wake: Waker | null = null;

  return Object.freeze({
    send: (result: ControlResult<E>) => {
      pending.push(result);
      wake?.();
    },
    poll: () => pending.length > 0,
    read: () => pending.shift() ?? controlOk(CONTINUE),
    setWaker: (w: Waker) => {
      wake = w;
    },
    size: () => pending.length,
  });
}

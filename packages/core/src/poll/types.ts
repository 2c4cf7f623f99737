/**
 * packages/core/src/poll/types.ts — The poll source contract.
 *
 * A poll source is anything the run loop can ask "is something ready?" and then
 * "give me one". Timers, the worker pool, the async task runtime and pushed input
 * all plug in through this interface.
 */

import type { ControlResult } from "../control/control.js";

/** Wakes a run loop that is sleeping between ticks. */
export type Waker = () => void;

export interface PollSource<E> {
  /** Short label used in diagnostics. */
  readonly label: string;

  /**
   * When true the run loop keeps reading this source within one tick until `poll()`
   * turns false. Timers set it so several deadlines elapsing together all fire.
   */
  readonly readUntilIdle?: boolean;

  /** True when `read()` has something to hand out. Throwing reports an error. */
  poll(): boolean;

  /** Produce exactly one result. Only called after `poll()` returned true. */
  read(): ControlResult<E>;

  /** Milliseconds until this source expects to become ready, if it knows. */
  sleepTimeMs?(): number | undefined;

  /** Called once at startup so the source can cut an idle sleep short. */
  setWaker?(wake: Waker): void;

  /** Called once when the run loop exits. */
  shutdown?(): void;
}

/**
 * packages/core/src/poll/eventQueue.ts — Push-fed input source.
 *
 * The seam between an input backend (decoded key/mouse/resize events) and the run
 * loop. Whatever is pushed comes back out one `event` per read, in push order.
 */

import { type Control, controlErr, controlEvent, controlOk } from "../control/control.js";
import { createResultChannel } from "./channel.js";
import type { PollSource } from "./types.js";

export type EventQueueSource<E> = PollSource<E> &
  Readonly<{
    push: (event: E) => void;
    /** Queue a raw control, e.g. a `quit` from a signal handler. */
    pushControl: (control: Control<E>) => void;
    /** Report an input failure; it reaches the error hook like any source error. */
    pushError: (error: unknown) => void;
    size: () => number;
  }>;

export function createEventQueueSource<E>(label = "input"): EventQueueSource<E> {
  const channel = createResultChannel<E>();
  return Object.freeze({
    label,
    poll: channel.poll,
    read: channel.read,
    setWaker: channel.setWaker,
    push: (event: E) => channel.send(controlOk(controlEvent(event))),
    pushControl: (control: Control<E>) => channel.send(controlOk(control)),
    pushError: (error: unknown) => channel.send(controlErr(error)),
    size: channel.size,
  });
}

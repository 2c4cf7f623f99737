/**
 * packages/core/src/control/queue.ts — FIFO of pending control results.
 *
 * Handlers push follow-up results here instead of calling back into the run loop.
 * The loop drains it after every read, in push order.
 */

import type { Control, ControlResult } from "./control.js";
import { controlErr, controlOk } from "./control.js";

/** Consumed prefix length that triggers compaction of the backing array. */
const COMPACT_THRESHOLD = 256;

export type ControlQueue<E> = Readonly<{
  push: (result: ControlResult<E>) => void;
  pushOk: (control: Control<E>) => void;
  pushErr: (error: unknown) => void;
  /** Remove and return the oldest entry. */
  take: () => ControlResult<E> | undefined;
  /** Remove and return every entry, oldest first. */
  drain: () => readonly ControlResult<E>[];
  isEmpty: () => boolean;
  size: () => number;
}>;

export function createControlQueue<E>(): ControlQueue<E> {
  let items: ControlResult<E>[] = [];
  let head = 0;

  function push(result: ControlResult<E>): void {
    items.push(result);
  }

  function take(): ControlResult<E> | undefined {
    if (head >= items.length) return undefined;
    const item = items[head];
    head++;
    if (head >= items.length) {
      items = [];
      head = 0;
    } else if (head >= COMPACT_THRESHOLD && head * 2 >= items.length) {
      items = items.slice(head);
      head = 0;
    }
    return item;
  }

  function drain(): readonly ControlResult<E>[] {
    const out = items.slice(head);
    items = [];
    head = 0;
    return Object.freeze(out);
  }

  return Object.freeze({
    push,
    pushOk: (control: Control<E>) => push(controlOk(control)),
    pushErr: (error: unknown) => push(controlErr(error)),
    take,
    drain,
    isEmpty: () => head >= items.length,
    size: () => items.length - head,
  });
}

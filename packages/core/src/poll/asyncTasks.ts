/**
 * packages/core/src/poll/asyncTasks.ts — Async task runtime.
 *
 * The promise-based sibling of the worker pool. Tasks start right away, with no lane
 * limit, and receive an AbortSignal instead of a cancel token. Each task delivers one
 * final result through the same kind of channel the pool uses.
 *
 * A rejection caused by the task's own abort signal is delivered as `continue`:
 * aborting is not an error path. Any other rejection becomes a TSR_JOB_FAILED value.
 */

import type { Control, ControlResult } from "../control/control.js";
import { CONTINUE, controlErr, controlOk } from "../control/control.js";
import { TesseraError, describeThrown } from "../errors.js";
import { warnDev } from "../logger.js";
import { createResultChannel } from "./channel.js";
import { type Liveness, createLiveness } from "./liveness.js";
import type { PollSource } from "./types.js";

export type AbortHandle = Readonly<{
  abort: () => void;
  isAborted: () => boolean;
}>;

export type TaskHandle = Readonly<{ abort: AbortHandle; liveness: Liveness }>;

export type TaskSender<E> = (result: ControlResult<E>) => void;

export type AsyncTask<E> = (signal: AbortSignal) => Promise<Control<E>>;

export type AsyncTaskExt<E> = (send: TaskSender<E>, signal: AbortSignal) => Promise<Control<E>>;

export type AsyncTaskRuntime<E> = PollSource<E> &
  Readonly<{
    spawnAsync: (task: AsyncTask<E>) => TaskHandle;
    spawnAsyncExt: (task: AsyncTaskExt<E>) => TaskHandle;
    /** Number of tasks that have not delivered their final result. */
    pending: () => number;
    /** Abort every running task and refuse new ones. */
    close: () => void;
    isClosed: () => boolean;
  }>;

export function createAsyncTaskRuntime<E>(): AsyncTaskRuntime<E> {
  const channel = createResultChannel<E>();
  const running = new Set<AbortController>();
  let closed = false;

  async function runTask(
    task: AsyncTaskExt<E>,
    controller: AbortController,
    markDone: () => boolean,
  ): Promise<void> {
    let finished = false;
    const send: TaskSender<E> = (result) => {
      if (finished) {
        warnDev("tasks", "result sent after the task finished; dropped");
        return;
      }
      channel.send(result);
    };
    let result: ControlResult<E>;
    try {
      result = controlOk(await task(send, controller.signal));
    } catch (e) {
      if (controller.signal.aborted && e === controller.signal.reason) {
        result = controlOk(CONTINUE);
      } else {
        result = controlErr(
          new TesseraError("TSR_JOB_FAILED", `async task failed: ${describeThrown(e)}`, {
            cause: e,
          }),
        );
      }
    }
    finished = true;
    running.delete(controller);
    channel.send(result);
    markDone();
  }

  function spawnAsyncExt(task: AsyncTaskExt<E>): TaskHandle {
    if (closed) {
      throw new TesseraError("TSR_POOL_CLOSED", "spawnAsync: task runtime is closed");
    }
    const controller = new AbortController();
    const done = createLiveness();
    running.add(controller);
    void runTask(task, controller, done.markDone);
    return Object.freeze({
      abort: Object.freeze({
        abort: () => {
          if (!controller.signal.aborted) controller.abort();
        },
        isAborted: () => controller.signal.aborted,
      }),
      liveness: done.liveness,
    });
  }

  function close(): void {
    if (closed) return;
    closed = true;
    for (const controller of running) controller.abort();
  }

  return Object.freeze({
    label: "tasks",
    poll: channel.poll,
    read: channel.read,
    setWaker: channel.setWaker,
    shutdown: close,
    spawnAsync: (task: AsyncTask<E>) => spawnAsyncExt((_send, signal) => task(signal)),
    spawnAsyncExt,
    pending: () => running.size,
    close,
    isClosed: () => closed,
  });
}

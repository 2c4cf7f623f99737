/**
 * packages/core/src/app/context.ts — The application context.
 *
 * One context exists per run loop and is passed explicitly to every handler, window
 * and widget call. It is the only way application code reaches the control queue,
 * the timer registry, the job pools, the focus object and the terminal.
 *
 * Asking for a service that was never installed throws TSR_NOT_CONFIGURED;
 * asking for focus before one was set throws TSR_NO_FOCUS.
 */

import { type Control, controlEvent } from "../control/control.js";
import type { ControlQueue } from "../control/queue.js";
import { TesseraError } from "../errors.js";
import type { Position } from "../geometry.js";
import type { AsyncTask, AsyncTaskExt, AsyncTaskRuntime, TaskHandle } from "../poll/asyncTasks.js";
import type { TimerDef, TimerHandle, TimerRegistry } from "../poll/timers.js";
import type { JobHandle, JobSpec, WorkerPool } from "../poll/workerPool.js";
import type { DrawFn, Terminal } from "./terminal.js";

// =============================================================================
// Types
// =============================================================================

export type RunServices<E> = Readonly<{
  timers?: TimerRegistry<E>;
  workers?: WorkerPool<E>;
  tasks?: AsyncTaskRuntime<E>;
}>;

export type AppContext<E, F = unknown, D = unknown> = Readonly<{
  // --- control queue -------------------------------------------------------
  /** Queue an application event; it is dispatched after the current handler returns. */
  queueEvent: (event: E) => void;
  queue: (control: Control<E>) => void;
  /** Queue an error for the error hook. */
  queueErr: (error: unknown) => void;

  // --- timers --------------------------------------------------------------
  addTimer: (def: TimerDef) => TimerHandle;
  removeTimer: (handle: TimerHandle) => void;
  replaceTimer: (old: TimerHandle | undefined, def: TimerDef) => TimerHandle;

  // --- background work -----------------------------------------------------
  /** Run a job on the worker pool's threads. */
  spawn: (job: JobSpec) => JobHandle;
  spawnExt: (job: JobSpec) => JobHandle;
  spawnAsync: (task: AsyncTask<E>) => TaskHandle;
  spawnAsyncExt: (task: AsyncTaskExt<E>) => TaskHandle;

  // --- focus ---------------------------------------------------------------
  /** Install a focus object; returns the one it replaced. */
  setFocus: (focus: F) => F | undefined;
  /** Remove and return the focus object. */
  takeFocus: () => F | undefined;
  clearFocus: () => void;
  hasFocus: () => boolean;
  /** The installed focus object, for reading. */
  focus: () => F;
  /** The installed focus object, for changing it in place. */
  focusMut: () => F;

  // --- terminal ------------------------------------------------------------
  terminal: () => Terminal<D>;
  /** Repaint every cell on the next render. */
  clearTerminal: () => void;
  /** Print `height` lines above the UI before the next render. */
  insertBefore: (height: number, draw: DrawFn<D>) => void;
  /** Where to show the cursor after this frame. Reset before every render. */
  setScreenCursor: (pos: Position | undefined) => void;
  setWindowTitle: (title: string) => void;

  // --- frame info ----------------------------------------------------------
  /** Number of frames rendered so far. */
  count: () => number;
  /** Duration of the last render, in ms. */
  lastRenderMs: () => number;
  /** Duration of the last event-handler call, in ms. */
  lastEventMs: () => number;
}>;

export type Insertion<D> = Readonly<{ height: number; draw: DrawFn<D> }>;

/** The run loop's side of the context. */
export type ContextInternals<D> = Readonly<{
  takeClearRequest: () => boolean;
  takeInsertions: () => readonly Insertion<D>[];
  takeCursor: () => Position | undefined;
  takeTitle: () => string | undefined;
  recordRender: (durationMs: number) => void;
  recordEvent: (durationMs: number) => void;
}>;

export type CreateAppContextOptions<E, F, D> = Readonly<{
  queue: ControlQueue<E>;
  terminal: Terminal<D>;
  services?: RunServices<E>;
  focus?: F;
}>;

// =============================================================================
// Factory
// =============================================================================

function notConfigured(what: string): never {
  throw new TesseraError("TSR_NOT_CONFIGURED", `No ${what} configured`);
}

export function createAppContext<E, F = unknown, D = unknown>(
  opts: CreateAppContextOptions<E, F, D>,
): Readonly<{ context: AppContext<E, F, D>; internals: ContextInternals<D> }> {
  const { queue, terminal } = opts;
  const services: RunServices<E> = opts.services ?? {};

  let focus: F | undefined = opts.focus;
  let clearRequested = false;
  let insertions: Insertion<D>[] = [];
  let cursor: Position | undefined;
  let title: string | undefined;
  let frameCount = 0;
  let lastRender = 0;
  let lastEvent = 0;

  function timers(): TimerRegistry<E> {
    return services.timers ?? notConfigured("timers");
  }

  function workers(): WorkerPool<E> {
    return services.workers ?? notConfigured("worker pool");
  }

  function tasks(): AsyncTaskRuntime<E> {
    return services.tasks ?? notConfigured("async task runtime");
  }

  function requireFocus(): F {
    if (focus === undefined) {
      throw new TesseraError("TSR_NO_FOCUS", "No focus object installed");
    }
    return focus;
  }

  const context: AppContext<E, F, D> = Object.freeze({
    queueEvent: (event: E) => queue.pushOk(controlEvent(event)),
    queue: (control: Control<E>) => queue.pushOk(control),
    queueErr: (error: unknown) => queue.pushErr(error),

    addTimer: (def: TimerDef) => timers().add(def),
    removeTimer: (handle: TimerHandle) => timers().remove(handle),
    replaceTimer: (old: TimerHandle | undefined, def: TimerDef) => timers().replace(old, def),

    spawn: (job: JobSpec) => workers().spawn(job),
    spawnExt: (job: JobSpec) => workers().spawnExt(job),
    spawnAsync: (task: AsyncTask<E>) => tasks().spawnAsync(task),
    spawnAsyncExt: (task: AsyncTaskExt<E>) => tasks().spawnAsyncExt(task),

    setFocus: (next: F) => {
      const prev = focus;
      focus = next;
      return prev;
    },
    takeFocus: () => {
      const prev = focus;
      focus = undefined;
      return prev;
    },
    clearFocus: () => {
      focus = undefined;
    },
    hasFocus: () => focus !== undefined,
    focus: requireFocus,
    focusMut: requireFocus,

    terminal: () => terminal,
    clearTerminal: () => {
      clearRequested = true;
    },
    insertBefore: (height: number, draw: DrawFn<D>) => {
      if (!Number.isInteger(height) || height < 0) {
        throw new TesseraError(
          "TSR_INVALID_PROPS",
          `insertBefore: height must be a non-negative integer (got ${String(height)})`,
        );
      }
      insertions.push(Object.freeze({ height, draw }));
    },
    setScreenCursor: (pos: Position | undefined) => {
      cursor = pos;
    },
    setWindowTitle: (next: string) => {
      title = next;
    },

    count: () => frameCount,
    lastRenderMs: () => lastRender,
    lastEventMs: () => lastEvent,
  });

  const internals: ContextInternals<D> = Object.freeze({
    takeClearRequest: () => {
      const r = clearRequested;
      clearRequested = false;
      return r;
    },
    takeInsertions: () => {
      const r = insertions;
      insertions = [];
      return r;
    },
    takeCursor: () => {
      const r = cursor;
      cursor = undefined;
      return r;
    },
    takeTitle: () => {
      const r = title;
      title = undefined;
      return r;
    },
    recordRender: (durationMs: number) => {
      frameCount++;
      lastRender = durationMs;
    },
    recordEvent: (durationMs: number) => {
      lastEvent = durationMs;
    },
  });

  return Object.freeze({ context, internals });
}

/**
 * packages/core/src/app/runLoop.ts — The run loop.
 *
 * Why: turns any number of independently timed poll sources into one ordered sequence
 * of handler calls and at most one render per tick.
 *
 * One tick:
 *   1. poll every source once, in registration order, and keep the ready ones
 *   2. read each ready source once (timers: until they stop being ready) and drain the
 *      control queue after every read, so follow-ups run before the next source
 *   3. render once if anything in the tick asked for it
 *
 * Draining rules:
 *   - queue entries run strictly FIFO, follow-ups are appended at the back
 *   - an error entry is set aside until the queue is empty, then handed to the error
 *     hook; whatever the hook returns goes back on the queue
 *   - `quit` stops the tick: remaining ready sources are skipped, the queue is still
 *     drained to the end and no frame is rendered
 *
 * Handler throws become TSR_USER_CODE_THROW values for the error hook. A throw from the
 * error hook itself is fatal and rejects `run()`.
 */

import {
  type Control,
  type ControlResult,
  controlErr,
  controlEvent,
  controlOk,
} from "../control/control.js";
import { createControlQueue } from "../control/queue.js";
import { TesseraError, describeThrown, invalidProps } from "../errors.js";
import type { Rect } from "../geometry.js";
import { warnDev } from "../logger.js";
import { perfMarkEnd, perfMarkStart } from "../perf/perf.js";
import type { PollSource } from "../poll/types.js";
import { type RunConfig, resolveRunConfig } from "./config.js";
import { type AppContext, type RunServices, createAppContext } from "./context.js";
import { computeNextSleep, computeSleepMs } from "./idleTiming.js";
import { createSleeper } from "./sleeper.js";
import type { Terminal } from "./terminal.js";

// =============================================================================
// Types
// =============================================================================

export type RunHandlers<S, E, F, D> = Readonly<{
  /** Called once by `run()` before the first frame. */
  init?: (state: S, ctx: AppContext<E, F, D>) => void;
  render: (area: Rect, frame: D, state: S, ctx: AppContext<E, F, D>) => void;
  event: (event: E, state: S, ctx: AppContext<E, F, D>) => Control<E>;
  error: (error: unknown, state: S, ctx: AppContext<E, F, D>) => Control<E>;
}>;

export type RunLoopOptions<S, E, F = unknown, D = unknown> = Readonly<{
  state: S;
  terminal: Terminal<D>;
  handlers: RunHandlers<S, E, F, D>;
  /** Poll sources in priority order. Services must be listed here too. */
  sources?: readonly PollSource<E>[];
  services?: RunServices<E>;
  focus?: F;
  config?: RunConfig;
  now?: () => number;
  /** After every render, queue `event(onRendered())` for the next tick. */
  onRendered?: () => E;
  /**
   * Route a `quit` through the event handler as `event(confirmQuit())` first.
   * The handler confirms with `quit`; any other answer cancels the quit.
   */
  confirmQuit?: () => E;
}>;

export type TickReport = Readonly<{
  /** Labels of the sources that were ready, in read order. */
  ready: readonly string[];
  reads: number;
  /** Events handed to the event handler. */
  dispatched: number;
  /** Errors handed to the error hook. */
  errors: number;
  rendered: boolean;
  quit: boolean;
}>;

export type RunLoopState = "Created" | "Running" | "Stopped" | "Faulted";

export type RunLoop<S, E, F = unknown, D = unknown> = Readonly<{
  context: AppContext<E, F, D>;
  state: S;
  /** One scheduling round. Synchronous; `run()` calls it in a loop. */
  tick: () => TickReport;
  /** Render now, outside a tick. */
  renderNow: () => void;
  /** Run until quit. Resolves after sources and terminal are shut down. */
  run: () => Promise<void>;
  /** Ask a running loop to exit after the current tick, skipping quit confirmation. */
  stop: () => void;
  isQuitting: () => boolean;
  lifecycle: () => RunLoopState;
}>;

// =============================================================================
// Run loop
// =============================================================================

function userThrow(where: string, e: unknown): TesseraError {
  return new TesseraError("TSR_USER_CODE_THROW", `${where} threw: ${describeThrown(e)}`, {
    cause: e,
  });
}

export function createRunLoop<S, E, F = unknown, D = unknown>(
  opts: RunLoopOptions<S, E, F, D>,
): RunLoop<S, E, F, D> {
  const config = resolveRunConfig(opts.config);
  const now = opts.now ?? Date.now;
  const { state, terminal, handlers, onRendered, confirmQuit } = opts;
  const sources: readonly PollSource<E>[] = Object.freeze([...(opts.sources ?? [])]);
  const services: RunServices<E> = opts.services ?? {};

  for (const service of [services.timers, services.workers, services.tasks]) {
    if (service !== undefined && !sources.includes(service)) {
      invalidProps(`service "${service.label}" must also be registered as a poll source`);
    }
  }

  const queue = createControlQueue<E>();
  const { context: ctx, internals } = createAppContext<E, F, D>(
    opts.focus === undefined
      ? { queue, terminal, services }
      : { queue, terminal, services, focus: opts.focus },
  );
  const sleeper = createSleeper();

  let lifecycle: RunLoopState = "Created";
  let inTick = false;
  let quitting = false;
  let renderPending = false;
  let confirmingQuit = false;
  const deferredErrors: unknown[] = [];

  // per-tick counters
  let dispatched = 0;
  let errors = 0;

  function assertNotReentrant(method: string): void {
    if (inTick) {
      throw new TesseraError("TSR_REENTRANT_CALL", `${method}: re-entrant call`);
    }
  }

  // ---------------------------------------------------------------------------
  // Source access
  // ---------------------------------------------------------------------------

  function safePoll(source: PollSource<E>): boolean {
    try {
      return source.poll();
    } catch (e) {
      warnDev("run-loop", `source "${source.label}" threw from poll(): ${describeThrown(e)}`);
      queue.pushErr(e);
      return false;
    }
  }

  function safeRead(source: PollSource<E>): ControlResult<E> {
    try {
      return source.read();
    } catch (e) {
      warnDev("run-loop", `source "${source.label}" threw from read(): ${describeThrown(e)}`);
      return controlErr(e);
    }
  }

  // ---------------------------------------------------------------------------
  // Dispatch
  // ---------------------------------------------------------------------------

  function callEvent(event: E): ControlResult<E> {
    const start = now();
    dispatched++;
    try {
      return controlOk(handlers.event(event, state, ctx));
    } catch (e) {
      return controlErr(userThrow("event handler", e));
    } finally {
      internals.recordEvent(now() - start);
    }
  }

  function requestQuit(): void {
    if (confirmQuit === undefined || confirmingQuit) {
      quitting = true;
      return;
    }
    confirmingQuit = true;
    let answer: ControlResult<E>;
    try {
      answer = callEvent(confirmQuit());
    } finally {
      confirmingQuit = false;
    }
    if (answer.ok && answer.value.kind === "quit") {
      quitting = true;
      return;
    }
    queue.push(answer);
  }

  function dispatch(control: Control<E>): void {
    switch (control.kind) {
      case "continue":
      case "unchanged":
        return;
      case "changed":
        renderPending = true;
        return;
      case "event":
        queue.push(callEvent(control.event));
        return;
      case "quit":
        requestQuit();
        return;
    }
  }

  function drain(): void {
    for (;;) {
      const item = queue.take();
      if (item === undefined) {
        if (deferredErrors.length === 0) return;
        while (deferredErrors.length > 0) {
          const [error] = deferredErrors.splice(0, 1);
          errors++;
          // A throw here leaves the tick; the errors still waiting stay for the next one.
          queue.pushOk(handlers.error(error, state, ctx));
        }
        continue;
      }
      if (!item.ok) {
        deferredErrors.push(item.error);
        continue;
      }
      dispatch(item.value);
    }
  }

  // ---------------------------------------------------------------------------
  // Rendering
  // ---------------------------------------------------------------------------

  function render(): void {
    renderPending = false;
    const token = perfMarkStart();
    const start = now();
    try {
      if (internals.takeClearRequest()) terminal.clear();
      for (const ins of internals.takeInsertions()) terminal.insertBefore(ins.height, ins.draw);
      terminal.render((frame, area) => handlers.render(area, frame, state, ctx));
      internals.recordRender(now() - start);
    } catch (e) {
      queue.pushErr(userThrow("render", e));
    }
    terminal.setCursor(internals.takeCursor());
    const title = internals.takeTitle();
    if (title !== undefined) terminal.setTitle(title);
    perfMarkEnd("render", token);
    if (onRendered !== undefined) queue.pushOk(controlEvent(onRendered()));
  }

  // ---------------------------------------------------------------------------
  // Tick
  // ---------------------------------------------------------------------------

  function tick(): TickReport {
    assertNotReentrant("tick");
    inTick = true;
    dispatched = 0;
    errors = 0;
    const ready: PollSource<E>[] = [];
    let reads = 0;
    let rendered = false;
    try {
      // follow-ups queued outside a tick (render, init, handlers run by the caller)
      drain();

      if (!quitting) {
        const pollToken = perfMarkStart();
        for (const source of sources) {
          if (safePoll(source)) ready.push(source);
        }
        perfMarkEnd("poll", pollToken);
        drain();

        const dispatchToken = perfMarkStart();
        for (const source of ready) {
          if (quitting) break;
          for (;;) {
            queue.push(safeRead(source));
            reads++;
            drain();
            if (quitting || source.readUntilIdle !== true || !safePoll(source)) break;
          }
        }
        drain();
        perfMarkEnd("dispatch", dispatchToken);
      }

      if (renderPending && !quitting) {
        render();
        rendered = true;
      }
    } finally {
      inTick = false;
    }
    return Object.freeze({
      ready: Object.freeze(ready.map((s) => s.label)),
      reads,
      dispatched,
      errors,
      rendered,
      quit: quitting,
    });
  }

  function renderNow(): void {
    assertNotReentrant("renderNow");
    render();
  }

  // ---------------------------------------------------------------------------
  // Run
  // ---------------------------------------------------------------------------

  function timerSleepMs(): number | undefined {
    let min: number | undefined;
    for (const source of sources) {
      const ms = source.sleepTimeMs?.();
      if (ms !== undefined && (min === undefined || ms < min)) min = ms;
    }
    return min;
  }

  function shutdownAll(): void {
    for (const source of sources) {
      try {
        source.shutdown?.();
      } catch (e) {
        warnDev("run-loop", `source "${source.label}" threw on shutdown: ${describeThrown(e)}`);
      }
    }
    if (!config.manualTerminal) terminal.shutdown();
  }

  async function run(): Promise<void> {
    if (lifecycle !== "Created") {
      throw new TesseraError("TSR_INVALID_STATE", `run: loop is ${lifecycle}`);
    }
    lifecycle = "Running";
    for (const source of sources) source.setWaker?.(sleeper.wake);
    if (!config.manualTerminal) terminal.init();

    try {
      if (handlers.init !== undefined) {
        try {
          handlers.init(state, ctx);
        } catch (e) {
          queue.pushErr(userThrow("init", e));
        }
      }
      renderNow();

      let sleepMs = config.fastSleepMs;
      while (!quitting) {
        const report = tick();
        if (quitting) break;
        const didWork = report.reads > 0 || report.rendered || report.dispatched > 0;
        if (didWork) {
          await sleeper.sleep(0);
        } else {
          const ms = computeSleepMs(sleepMs, timerSleepMs());
          const token = perfMarkStart();
          await sleeper.sleep(ms);
          perfMarkEnd("idle", token);
        }
        sleepMs = computeNextSleep(sleepMs, didWork, config);
      }
      lifecycle = "Stopped";
    } catch (e) {
      lifecycle = "Faulted";
      throw e;
    } finally {
      shutdownAll();
    }
  }

  return Object.freeze({
    context: ctx,
    state,
    tick,
    renderNow,
    run,
    stop: () => {
      quitting = true;
      sleeper.wake();
    },
    isQuitting: () => quitting,
    lifecycle: () => lifecycle,
  });
}

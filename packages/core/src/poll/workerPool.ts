/**
 * packages/core/src/poll/workerPool.ts — Background job pool.
 *
 * Jobs run on a fixed number of worker threads ("lanes"); extra spawns wait in a FIFO
 * until a lane frees up. A job is named by module and export (see jobWire.ts) and gets
 * a structured-cloned input, so blocking work in a job never stalls the UI thread.
 * Lanes start on first use and are reused. An idle lane does not keep the process alive.
 *
 * Invariants:
 *   - every job delivers exactly one final result; a throw, a rejection or a crashed
 *     thread becomes an error value carrying TSR_JOB_FAILED and never escapes the pool
 *   - the liveness flag is set exactly once, after the final result is sent
 *   - cancellation is only ever observed by the job itself
 *
 * Closures cannot cross a thread boundary; work that needs one belongs on the async
 * task runtime.
 */

import { Worker } from "node:worker_threads";
import {
  CHANGED,
  CONTINUE,
  type Control,
  type ControlResult,
  QUIT,
  UNCHANGED,
  controlErr,
  controlEvent,
  controlOk,
} from "../control/control.js";
import { TesseraError, describeThrown, invalidProps } from "../errors.js";
import { warnDev } from "../logger.js";
import { createResultChannel } from "./channel.js";
import { CANCEL_CELL, type RunMessage, parseThreadMessage } from "./jobWire.js";
import {
  type CancelToken,
  type Liveness,
  type LivenessSetter,
  createCancelToken,
  createLiveness,
} from "./liveness.js";
import type { PollSource } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type JobHandle = Readonly<{ cancel: CancelToken; liveness: Liveness }>;

/** A job: the module to import on the job thread, its export and its input. */
export type JobSpec = Readonly<{
  /** Absolute file URL or package specifier. */
  module: URL | string;
  /** Defaults to "default". */
  exportName?: string;
  /** Structured-cloned into the job thread. */
  input?: unknown;
}>;

export type WorkerPoolOptions<E> = Readonly<{
  /** Number of job threads. */
  lanes: number;
  /** Turns an event payload sent by a job into an application event. A throw fails the result. */
  toEvent: (payload: unknown) => E;
}>;

export type WorkerPool<E> = PollSource<E> &
  Readonly<{
    spawn: (job: JobSpec) => JobHandle;
    /** Like `spawn`, but the job may `send` intermediate results before its final one. */
    spawnExt: (job: JobSpec) => JobHandle;
    /** Number of spawned jobs whose liveness flag is not set yet. */
    checkLiveness: () => number;
    /** Refuse new spawns and cancel queued jobs. Running jobs finish normally. */
    close: () => void;
    isClosed: () => boolean;
  }>;

type QueuedJob = {
  readonly message: RunMessage;
  readonly cancel: CancelToken;
  readonly done: LivenessSetter;
};

type Lane = {
  readonly worker: Worker;
  readonly cells: Int32Array;
  job: QueuedJob | null;
  onAbort: (() => void) | null;
};

// Sources run through a TypeScript loader load the entry from source as well.
const JOB_THREAD_ENTRY = new URL(
  import.meta.url.endsWith(".ts") ? "./jobThread.ts" : "./jobThread.js",
  import.meta.url,
);

// =============================================================================
// Pool
// =============================================================================

function jobFailed(detail: string, cause?: unknown): TesseraError {
  return new TesseraError(
    "TSR_JOB_FAILED",
    `background job failed: ${detail}`,
    cause === undefined ? undefined : { cause },
  );
}

export function createWorkerPool<E>(opts: WorkerPoolOptions<E>): WorkerPool<E> {
  if (!Number.isInteger(opts.lanes) || opts.lanes < 1) {
    invalidProps(`worker pool lanes must be an integer >= 1 (got ${String(opts.lanes)})`);
  }
  const maxLanes = opts.lanes;
  const toEvent = opts.toEvent;
  const channel = createResultChannel<E>();
  const waiting: QueuedJob[] = [];
  const lanes: Lane[] = [];
  let lastSeq = 0;
  let alive = 0;
  let closed = false;

  function finish(job: QueuedJob, result: ControlResult<E>): void {
    channel.send(result);
    if (job.done.markDone()) alive--;
  }

  function toResult(control: Control<unknown>): ControlResult<E> {
    switch (control.kind) {
      case "continue":
        return controlOk(CONTINUE);
      case "unchanged":
        return controlOk(UNCHANGED);
      case "changed":
        return controlOk(CHANGED);
      case "quit":
        return controlOk(QUIT);
      case "event":
        try {
          return controlOk(controlEvent(toEvent(control.event)));
        } catch (e) {
          return controlErr(jobFailed(describeThrown(e), e));
        }
    }
  }

  // ---------------------------------------------------------------------------
  // Lanes
  // ---------------------------------------------------------------------------

  function terminate(lane: Lane): void {
    const i = lanes.indexOf(lane);
    if (i >= 0) lanes.splice(i, 1);
    void lane.worker.terminate().catch((e: unknown) => {
      warnDev("workers", `stopping a job thread failed: ${describeThrown(e)}`);
    });
  }

  function release(lane: Lane): QueuedJob | null {
    const job = lane.job;
    if (job !== null && lane.onAbort !== null) {
      job.cancel.signal.removeEventListener("abort", lane.onAbort);
    }
    lane.job = null;
    lane.onAbort = null;
    lane.worker.unref();
    return job;
  }

  /** The lane's thread is gone: fail its job and let a fresh lane take the queue. */
  function lost(lane: Lane, detail: string, cause?: unknown): void {
    if (!lanes.includes(lane)) return;
    const job = release(lane);
    terminate(lane);
    if (job !== null) finish(job, controlErr(jobFailed(detail, cause)));
    pump();
  }

  function onMessage(lane: Lane, m: unknown): void {
    const msg = parseThreadMessage(m);
    if (msg === undefined) {
      warnDev("workers", "unrecognized message from a job thread; dropped");
      return;
    }
    const job = lane.job;
    if (job === null || job.message.seq !== msg.seq) {
      warnDev("workers", "result sent after the job finished; dropped");
      return;
    }
    switch (msg.type) {
      case "send":
        channel.send(toResult(msg.control));
        return;
      case "done":
        release(lane);
        finish(job, toResult(msg.control));
        break;
      case "failed":
        release(lane);
        finish(job, controlErr(jobFailed(msg.message)));
        break;
    }
    if (closed) terminate(lane);
    pump();
  }

  function openLane(): Lane {
    const cells = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
    const worker = new Worker(JOB_THREAD_ENTRY, { workerData: cells.buffer });
    const lane: Lane = { worker, cells, job: null, onAbort: null };
    worker.on("message", (m: unknown) => onMessage(lane, m));
    worker.on("error", (err) => lost(lane, `job thread crashed: ${describeThrown(err)}`, err));
    worker.on("exit", (code) => lost(lane, `job thread exited with code ${code}`));
    worker.unref();
    lanes.push(lane);
    return lane;
  }

  function start(lane: Lane, job: QueuedJob): void {
    lane.job = job;
    Atomics.store(lane.cells, CANCEL_CELL, job.cancel.isCanceled() ? 1 : 0);
    const onAbort = () => {
      if (lane.job === job) Atomics.store(lane.cells, CANCEL_CELL, 1);
    };
    lane.onAbort = onAbort;
    job.cancel.signal.addEventListener("abort", onAbort, { once: true });
    lane.worker.ref();
    try {
      lane.worker.postMessage(job.message);
    } catch (e) {
      // the input could not be cloned; the thread never saw the job
      release(lane);
      finish(job, controlErr(jobFailed(describeThrown(e), e)));
    }
  }

  function pump(): void {
    while (waiting.length > 0) {
      const lane =
        lanes.find((l) => l.job === null) ?? (lanes.length < maxLanes ? openLane() : undefined);
      if (lane === undefined) return;
      const job = waiting.shift();
      if (job === undefined) return;
      start(lane, job);
    }
  }

  // ---------------------------------------------------------------------------
  // Public surface
  // ---------------------------------------------------------------------------

  function enqueue(spec: JobSpec, canSend: boolean): JobHandle {
    if (closed) {
      throw new TesseraError("TSR_POOL_CLOSED", "spawn: worker pool is closed");
    }
    lastSeq++;
    const job: QueuedJob = {
      message: {
        type: "run",
        seq: lastSeq,
        module: typeof spec.module === "string" ? spec.module : spec.module.href,
        exportName: spec.exportName ?? "default",
        input: spec.input,
        canSend,
      },
      cancel: createCancelToken(),
      done: createLiveness(),
    };
    alive++;
    waiting.push(job);
    pump();
    return Object.freeze({ cancel: job.cancel, liveness: job.done.liveness });
  }

  function close(): void {
    if (closed) return;
    closed = true;
    for (const job of waiting.splice(0)) {
      job.cancel.cancel();
      finish(
        job,
        controlErr(new TesseraError("TSR_POOL_CLOSED", "job dropped: worker pool closed")),
      );
    }
    for (const lane of lanes.filter((l) => l.job === null)) terminate(lane);
  }

  return Object.freeze({
    label: "workers",
    poll: channel.poll,
    read: channel.read,
    setWaker: channel.setWaker,
    shutdown: close,
    spawn: (job: JobSpec) => enqueue(job, false),
    spawnExt: (job: JobSpec) => enqueue(job, true),
    checkLiveness: () => alive,
    close,
    isClosed: () => closed,
  });
}

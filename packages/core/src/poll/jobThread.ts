/**
 * packages/core/src/poll/jobThread.ts — Entry point of a worker-pool thread.
 *
 * Runs one job at a time, as ordered by the pool. Job modules are imported on first use
 * and cached for the life of the thread. A job that throws, rejects or returns something
 * other than a control is reported as `failed`; the thread itself keeps serving.
 */

import { parentPort, workerData } from "node:worker_threads";
import type { Control } from "../control/control.js";
import { describeThrown } from "../errors.js";
import {
  CANCEL_CELL,
  type JobContext,
  type RunMessage,
  type ThreadMessage,
  parseControl,
  parseRunMessage,
} from "./jobWire.js";

type LoadedJob = (input: unknown, job: JobContext) => unknown;

if (parentPort === null) {
  throw new Error("jobThread: parentPort is null (not running in worker_threads)");
}
if (!(workerData instanceof SharedArrayBuffer)) {
  throw new Error("jobThread: workerData must be the pool's SharedArrayBuffer");
}

const port = parentPort;
const cells = new Int32Array(workerData);
const loaded = new Map<string, LoadedJob>();

function post(msg: ThreadMessage): void {
  port.postMessage(msg);
}

async function load(specifier: string, exportName: string): Promise<LoadedJob> {
  const key = `${specifier}#${exportName}`;
  const cached = loaded.get(key);
  if (cached !== undefined) return cached;

  const ns: unknown = await import(specifier);
  const fn: unknown = typeof ns === "object" && ns !== null ? Reflect.get(ns, exportName) : undefined;
  if (typeof fn !== "function") {
    throw new Error(`${specifier} has no function export "${exportName}"`);
  }
  const job: LoadedJob = (input, ctx) => Reflect.apply(fn, undefined, [input, ctx]);
  loaded.set(key, job);
  return job;
}

async function run(msg: RunMessage): Promise<void> {
  const { seq } = msg;
  const ctx: JobContext = Object.freeze({
    isCanceled: () => Atomics.load(cells, CANCEL_CELL) === 1,
    send: (control: Control<unknown>) => {
      if (!msg.canSend) throw new Error("send: job was not started with spawnExt");
      post({ type: "send", seq, control });
    },
  });

  try {
    const job = await load(msg.module, msg.exportName);
    const out: unknown = await job(msg.input, ctx);
    const control = parseControl(out);
    if (control === undefined) {
      post({ type: "failed", seq, message: `job result is not a control (${String(out)})` });
      return;
    }
    post({ type: "done", seq, control });
  } catch (e) {
    post({ type: "failed", seq, message: describeThrown(e) });
  }
}

port.on("message", (m: unknown) => {
  const msg = parseRunMessage(m);
  if (msg === undefined) {
    throw new Error("jobThread: unrecognized message from the pool");
  }
  void run(msg);
});

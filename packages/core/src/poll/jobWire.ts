/**
 * packages/core/src/poll/jobWire.ts — Messages between the worker pool and its job threads.
 *
 * A background job is a function exported from a module. The pool posts `run` to an idle
 * job thread; the thread imports the module, calls the export with the job's input and a
 * JobContext, and answers with any number of `send` messages followed by exactly one
 * `done` or `failed`. Everything crossing the thread boundary is structured-cloned, so
 * inputs and event payloads must be plain data.
 *
 * Cancellation does not use messages: each thread shares one Int32Array cell with the
 * pool, and the pool stores 1 in it when the running job is canceled. A job blocked in a
 * synchronous loop can still read it.
 */

import {
  CHANGED,
  CONTINUE,
  type Control,
  QUIT,
  UNCHANGED,
  controlEvent,
} from "../control/control.js";

/** Index of the cancel flag in the shared cell array. */
export const CANCEL_CELL = 0;

/** What a job function receives besides its input. */
export type JobContext = Readonly<{
  /** True once the spawner canceled the job. Nothing stops the job but the job itself. */
  isCanceled: () => boolean;
  /** Send an intermediate result. Only jobs started with `spawnExt` may send. */
  send: (control: Control<unknown>) => void;
}>;

/** The shape of a job export. */
export type JobFunction = (
  input: unknown,
  job: JobContext,
) => Control<unknown> | Promise<Control<unknown>>;

export type RunMessage = Readonly<{
  type: "run";
  seq: number;
  module: string;
  exportName: string;
  input: unknown;
  canSend: boolean;
}>;

export type ThreadMessage =
  | Readonly<{ type: "send"; seq: number; control: Control<unknown> }>
  | Readonly<{ type: "done"; seq: number; control: Control<unknown> }>
  | Readonly<{ type: "failed"; seq: number; message: string }>;

// =============================================================================
// Parsing
// =============================================================================

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

export function parseControl(v: unknown): Control<unknown> | undefined {
  if (!isRecord(v)) return undefined;
  switch (v["kind"]) {
    case "continue":
      return CONTINUE;
    case "unchanged":
      return UNCHANGED;
    case "changed":
      return CHANGED;
    case "quit":
      return QUIT;
    case "event":
      return "event" in v ? controlEvent(v["event"]) : undefined;
    default:
      return undefined;
  }
}

export function parseRunMessage(m: unknown): RunMessage | undefined {
  if (!isRecord(m) || m["type"] !== "run") return undefined;
  const { seq, module, exportName, canSend } = m;
  if (typeof seq !== "number" || typeof module !== "string") return undefined;
  if (typeof exportName !== "string" || typeof canSend !== "boolean") return undefined;
  return { type: "run", seq, module, exportName, input: m["input"], canSend };
}

export function parseThreadMessage(m: unknown): ThreadMessage | undefined {
  if (!isRecord(m)) return undefined;
  const seq = m["seq"];
  if (typeof seq !== "number") return undefined;
  switch (m["type"]) {
    case "send":
    case "done": {
      const control = parseControl(m["control"]);
      if (control === undefined) return undefined;
      return m["type"] === "send" ? { type: "send", seq, control } : { type: "done", seq, control };
    }
    case "failed": {
      const message = m["message"];
      return typeof message === "string" ? { type: "failed", seq, message } : undefined;
    }
    default:
      return undefined;
  }
}

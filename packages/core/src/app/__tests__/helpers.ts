import {
  CONTINUE,
  type Control,
  type ControlResult,
  controlErr,
  controlOk,
} from "../../control/control.js";
import type { PollSource } from "../../poll/types.js";

export type ScriptedSource = PollSource<string> &
  Readonly<{
    /** Queue a control to be handed out by the next read. */
    give: (control: Control<string>) => void;
    giveError: (error: unknown) => void;
    /** Make the next poll throw. */
    failPoll: (error: unknown) => void;
  }>;

/**
 * A poll source that is ready exactly while it holds scripted results.
 * Every poll and read is appended to `log` as "poll:<label>" / "read:<label>".
 */
export function scriptedSource(label: string, log: string[]): ScriptedSource {
  const pending: ControlResult<string>[] = [];
  let pollError: { error: unknown } | null = null;
  return Object.freeze({
    label,
    poll: () => {
      log.push(`poll:${label}`);
      if (pollError !== null) {
        const { error } = pollError;
        pollError = null;
        throw error;
      }
      return pending.length > 0;
    },
    read: () => {
      log.push(`read:${label}`);
      return pending.shift() ?? controlOk(CONTINUE);
    },
    give: (control: Control<string>) => {
      pending.push(controlOk(control));
    },
    giveError: (error: unknown) => {
      pending.push(controlErr(error));
    },
    failPoll: (error: unknown) => {
      pollError = { error };
    },
  });
}

export function describeError(e: unknown): string {
  if (e instanceof Error) {
    return "code" in e && typeof e.code === "string" ? `${e.code}: ${e.message}` : e.message;
  }
  return String(e);
}

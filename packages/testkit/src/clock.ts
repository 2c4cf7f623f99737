/**
 * packages/testkit/src/clock.ts — Deterministic clock for time-driven tests.
 *
 * Why: timers and the run loop read time through an injected `now()`; tests drive
 * that function by hand instead of sleeping.
 */

export type ManualClock = Readonly<{
  /** Current time in milliseconds. Pass this where a `now` option is taken. */
  now: () => number;
  /** Move time forward; negative steps are rejected. */
  advance: (ms: number) => number;
  /** Jump to an absolute time that is not in the past. */
  set: (ms: number) => void;
}>;

export function createManualClock(startMs = 0): ManualClock {
  let current = startMs;
  return Object.freeze({
    now: () => current,
    advance: (ms: number) => {
      if (!Number.isFinite(ms) || ms < 0) {
        throw new RangeError(`clock.advance: expected a non-negative step, got ${String(ms)}`);
      }
      current += ms;
      return current;
    },
    set: (ms: number) => {
      if (!Number.isFinite(ms) || ms < current) {
        throw new RangeError(`clock.set: cannot move from ${current} to ${String(ms)}`);
      }
      current = ms;
    },
  });
}

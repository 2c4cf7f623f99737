import type { ResolvedRunConfig } from "./config.js";

type SleepTimingConfig = Pick<ResolvedRunConfig, "pollSleepMs" | "backoffMs" | "fastSleepMs">;

/** How long to sleep before the next tick, given the current back-off and timer deadline. */
export function computeSleepMs(currentSleepMs: number, timerSleepMs: number | undefined): number {
  if (timerSleepMs === undefined || !Number.isFinite(timerSleepMs)) return currentSleepMs;
  return Math.max(0, Math.min(timerSleepMs, currentSleepMs));
}

/** The back-off to use after a tick. Work resets it; idleness grows it up to the cap. */
export function computeNextSleep(
  currentSleepMs: number,
  didWork: boolean,
  config: SleepTimingConfig,
): number {
  if (didWork) return config.fastSleepMs;
  if (currentSleepMs >= config.pollSleepMs) return config.pollSleepMs;
  return Math.min(config.pollSleepMs, currentSleepMs + config.backoffMs);
}

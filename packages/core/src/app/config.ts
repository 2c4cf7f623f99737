/**
 * packages/core/src/app/config.ts — Run loop configuration.
 *
 * Sleep regime between ticks: after a tick that did work the loop sleeps `fastSleepMs`;
 * each idle tick adds `backoffMs` to the sleep, up to `pollSleepMs`. A pending timer
 * deadline always shortens the sleep.
 */

import { invalidProps } from "../errors.js";

export type RunConfig = Readonly<{
  pollSleepMs?: number;
  backoffMs?: number;
  fastSleepMs?: number;
  /** Leave terminal init/shutdown to the caller. */
  manualTerminal?: boolean;
}>;

export type ResolvedRunConfig = Readonly<{
  pollSleepMs: number;
  backoffMs: number;
  fastSleepMs: number;
  manualTerminal: boolean;
}>;

export const DEFAULT_RUN_CONFIG: ResolvedRunConfig = Object.freeze({
  pollSleepMs: 250,
  backoffMs: 10,
  fastSleepMs: 0.1,
  manualTerminal: false,
});

function requireNonNegative(name: string, v: number): number {
  if (!Number.isFinite(v) || v < 0) invalidProps(`${name} must be a finite number >= 0`);
  return v;
}

export function resolveRunConfig(config: RunConfig | undefined): ResolvedRunConfig {
  if (!config) return DEFAULT_RUN_CONFIG;
  const pollSleepMs =
    config.pollSleepMs === undefined
      ? DEFAULT_RUN_CONFIG.pollSleepMs
      : requireNonNegative("pollSleepMs", config.pollSleepMs);
  const backoffMs =
    config.backoffMs === undefined
      ? DEFAULT_RUN_CONFIG.backoffMs
      : requireNonNegative("backoffMs", config.backoffMs);
  const fastSleepMs =
    config.fastSleepMs === undefined
      ? DEFAULT_RUN_CONFIG.fastSleepMs
      : requireNonNegative("fastSleepMs", config.fastSleepMs);
  if (fastSleepMs > pollSleepMs) {
    invalidProps(`fastSleepMs (${fastSleepMs}) must not exceed pollSleepMs (${pollSleepMs})`);
  }

  return Object.freeze({
    pollSleepMs,
    backoffMs,
    fastSleepMs,
    manualTerminal: config.manualTerminal === true,
  });
}

/**
 * packages/core/src/logger.ts — Development-only diagnostics.
 *
 * Messages are prefixed `[tessera][area]` and dropped when NODE_ENV is "production".
 * Uses globalThis.process so the kernel carries no Node import for it.
 */

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";
const DEV_MODE = NODE_ENV !== "production";

export type WarnArea = "run-loop" | "workers" | "tasks";

export function warnDev(area: WarnArea, message: string): void {
  if (!DEV_MODE) return;
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(`[tessera][${area}] ${message}`);
}

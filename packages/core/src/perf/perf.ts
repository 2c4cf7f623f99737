/**
 * packages/core/src/perf/perf.ts — Run-loop phase timing.
 *
 * Why: a loop that sleeps, polls and renders in turns is hard to profile from the outside.
 * With TESSERA_PERF=1 the run loop times each phase of every iteration and keeps the most
 * recent samples per phase; `perfSnapshot()` summarizes them.
 *
 * Disabled, the exported functions do nothing and `perfMarkStart()` returns 0.
 */

export type InstrumentationPhase = "poll" | "dispatch" | "render" | "idle";

export const PERF_PHASES: readonly InstrumentationPhase[] = Object.freeze([
  "poll",
  "dispatch",
  "render",
  "idle",
]);

export type PhaseStats = Readonly<{
  count: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
  max: number;
}>;

export type PerfSnapshot = Readonly<{
  phases: Readonly<{ [K in InstrumentationPhase]?: PhaseStats }>;
}>;

/** Start time handed back to `perfMarkEnd`. */
export type PerfToken = number;

export type PerfRecorder = Readonly<{
  record: (phase: InstrumentationPhase, durationMs: number) => void;
  snapshot: () => PerfSnapshot;
  reset: () => void;
}>;

const DEFAULT_WINDOW = 512;

// Read through globalThis so core carries no Node import.
export const PERF_ENABLED: boolean =
  (globalThis as { process?: { env?: { TESSERA_PERF?: string } } }).process?.env?.TESSERA_PERF ===
  "1";

const clock = (globalThis as { performance?: { now(): number } }).performance;

function nowMs(): number {
  return clock !== undefined ? clock.now() : Date.now();
}

// =============================================================================
// Recorder
// =============================================================================

/** Keeps the last `window` samples of one phase. */
class SampleWindow {
  private readonly samples: number[] = [];
  private next = 0;
  private total = 0;

  constructor(private readonly window: number) {}

  add(ms: number): void {
    if (this.samples.length < this.window) {
      this.samples.push(ms);
    } else {
      this.total -= this.samples[this.next] ?? 0;
      this.samples[this.next] = ms;
    }
    this.total += ms;
    this.next = (this.next + 1) % this.window;
  }

  stats(): PhaseStats | undefined {
    const count = this.samples.length;
    if (count === 0) return undefined;
    const sorted = [...this.samples].sort((a, b) => a - b);
    const at = (q: number): number => sorted[Math.min(count - 1, Math.floor(count * q))] ?? 0;
    return Object.freeze({
      count,
      avg: this.total / count,
      p50: at(0.5),
      p95: at(0.95),
      p99: at(0.99),
      max: sorted[count - 1] ?? 0,
    });
  }
}

/** A standalone recorder; the run loop feeds the process-wide one. */
export function createPerfRecorder(window = DEFAULT_WINDOW): PerfRecorder {
  const windows = new Map<InstrumentationPhase, SampleWindow>();

  return Object.freeze({
    record(phase: InstrumentationPhase, durationMs: number): void {
      let w = windows.get(phase);
      if (w === undefined) {
        w = new SampleWindow(window);
        windows.set(phase, w);
      }
      w.add(durationMs);
    },
    snapshot(): PerfSnapshot {
      const phases: { [K in InstrumentationPhase]?: PhaseStats } = {};
      for (const phase of PERF_PHASES) {
        const stats = windows.get(phase)?.stats();
        if (stats !== undefined) phases[phase] = stats;
      }
      return Object.freeze({ phases: Object.freeze(phases) });
    },
    reset(): void {
      windows.clear();
    },
  });
}

// =============================================================================
// Process-wide entry points
// =============================================================================

const shared = createPerfRecorder();

export function perfMarkStart(): PerfToken {
  return PERF_ENABLED ? nowMs() : 0;
}

export function perfMarkEnd(phase: InstrumentationPhase, token: PerfToken): void {
  if (PERF_ENABLED) shared.record(phase, nowMs() - token);
}

export function perfSnapshot(): PerfSnapshot {
  return shared.snapshot();
}

export function perfReset(): void {
  shared.reset();
}

/**
 * packages/core/src/poll/liveness.ts — Cancellation tokens and liveness flags.
 *
 * Both are shared flags between a background job and whoever spawned it.
 * A cancel token is advisory: the job reads it at its own checkpoints and nothing
 * ever interrupts the job. A liveness flag is set once by the pool when the job
 * has finished, whatever the reason.
 */

type Deferred<T> = {
  promise: Promise<T>;
  resolve: (v: T) => void;
};

function deferred<T>(): Deferred<T> {
  let resolve!: (v: T) => void;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

// =============================================================================
// CancelToken
// =============================================================================

export type CancelToken = Readonly<{
  cancel: () => void;
  isCanceled: () => boolean;
  /** Aborted on cancel, for APIs that take an AbortSignal. */
  signal: AbortSignal;
}>;

export function createCancelToken(): CancelToken {
  const controller = new AbortController();
  return Object.freeze({
    cancel: () => {
      if (!controller.signal.aborted) controller.abort();
    },
    isCanceled: () => controller.signal.aborted,
    signal: controller.signal,
  });
}

// =============================================================================
// Liveness
// =============================================================================

export type Liveness = Readonly<{
  /** True once the job has terminated. */
  isDone: () => boolean;
  /** Resolves when the job has terminated. Never rejects. */
  whenDone: () => Promise<void>;
}>;

/** The writable side of a liveness flag, kept by the pool. */
export type LivenessSetter = Readonly<{
  liveness: Liveness;
  /** Returns false if the flag was already set. */
  markDone: () => boolean;
}>;

export function createLiveness(): LivenessSetter {
  const done = deferred<void>();
  let isDone = false;
  const liveness: Liveness = Object.freeze({
    isDone: () => isDone,
    whenDone: () => done.promise,
  });
  return Object.freeze({
    liveness,
    markDone: () => {
      if (isDone) return false;
      isDone = true;
      done.resolve();
      return true;
    },
  });
}

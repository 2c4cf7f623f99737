/**
 * Idle sleep that a waker can cut short.
 *
 * A wake that arrives while the loop is busy is remembered, so the next sleep returns
 * at once instead of missing a result that landed mid-tick.
 */

export type Sleeper = Readonly<{
  sleep: (ms: number) => Promise<void>;
  wake: () => void;
}>;

export function createSleeper(): Sleeper {
  let pendingWake = false;
  let interrupt: (() => void) | null = null;

  function sleep(ms: number): Promise<void> {
    if (pendingWake) {
      pendingWake = false;
      return new Promise<void>((resolve) => setImmediate(resolve));
    }
    return new Promise<void>((resolve) => {
      const finish = () => {
        interrupt = null;
        resolve();
      };
      if (ms <= 0) {
        const handle = setImmediate(finish);
        interrupt = () => {
          clearImmediate(handle);
          finish();
        };
        return;
      }
      const handle = setTimeout(finish, ms);
      interrupt = () => {
        clearTimeout(handle);
        finish();
      };
    });
  }

  function wake(): void {
    if (interrupt !== null) {
      interrupt();
      return;
    }
    pendingWake = true;
  }

  return Object.freeze({ sleep, wake });
}

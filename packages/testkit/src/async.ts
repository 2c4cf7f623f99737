/** Yield to the event loop `count` times, so queued timers and I/O callbacks get a turn. */
export async function flushMacrotasks(count = 1): Promise<void> {
  for (let i = 0; i < count; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

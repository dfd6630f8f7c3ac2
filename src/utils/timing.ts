/**
 * Cancellable waits for background loops.
 */

interface PendingWait {
  resolve: (completed: boolean) => void;
  timer?: ReturnType<typeof setTimeout>;
}

/**
 * A sleep that another party can cut short.
 *
 * `wait(ms)` resolves `true` when the full delay elapsed and `false` when
 * `wake()` ended it early. Without `ms` it waits until woken.
 * A `wake()` with nobody waiting does nothing; loops re-check their state
 * before every wait.
 */
export class Wakeup {
  private pending: PendingWait | null = null;

  wait(ms?: number): Promise<boolean> {
    // A second waiter would orphan the first; each Wakeup serves one loop.
    this.wake();

    return new Promise((resolve) => {
      const entry: PendingWait = { resolve };
      if (ms !== undefined) {
        entry.timer = setTimeout(() => {
          if (this.pending === entry) this.pending = null;
          resolve(true);
        }, Math.max(0, ms));
      }
      this.pending = entry;
    });
  }

  wake(): void {
    const entry = this.pending;
    if (!entry) return;
    this.pending = null;
    if (entry.timer !== undefined) clearTimeout(entry.timer);
    entry.resolve(false);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Per-controller background task tracking.
 *
 * Every task shares one AbortSignal; `cancel()` aborts all of them, and the
 * timers they sleep on (see `sleep` in artnet-shared) are cleared with it.
 */

export type Task = (signal: AbortSignal) => Promise<void>;

export class TaskGroup {
  private readonly abort = new AbortController();
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly onError: (err: unknown) => void) {}

  get signal(): AbortSignal {
    return this.abort.signal;
  }

  get cancelled(): boolean {
    return this.abort.signal.aborted;
  }

  get size(): number {
    return this.pending.size;
  }

  /** Run a task in the group. Ignored once the group is cancelled. */
  spawn(task: Task): void {
    if (this.cancelled) return;
    const tracked: Promise<void> = task(this.abort.signal)
      .catch((err: unknown) => {
        // Rejections caused by cancellation are expected
        if (!this.cancelled) this.onError(err);
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }

  cancel(): void {
    this.abort.abort();
  }

  /** Resolves once every task spawned so far has finished. */
  async settled(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}

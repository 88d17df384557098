/**
 * Wake-up signal for async loops.
 *
 * A notify() with nobody waiting is remembered, so a loop that checks its
 * condition and then waits never misses a wake-up issued in between.
 */
export class Signal {
  private waiters: Array<() => void> = [];
  private pending = false;

  /**
   * Wake every current waiter, or the next one if nobody waits
   */
  notify(): void {
    if (this.waiters.length === 0) {
      this.pending = true;
      return;
    }
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }

  wait(): Promise<void> {
    if (this.pending) {
      this.pending = false;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /** Forget a remembered notification */
  reset(): void {
    this.pending = false;
  }

  get waiting(): number {
    return this.waiters.length;
  }
}

/**
 * Counting semaphore for capping simultaneous log subprocesses
 */

export type Release = () => void;

export class Semaphore {
  private active = 0;
  private waiters: Array<() => void> = [];

  /**
   * @param limit - Maximum concurrent holders; 0 or less means unbounded
   */
  constructor(readonly limit: number = 0) {}

  get inFlight(): number {
    return this.active;
  }

  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Wait for a slot. The returned release function is idempotent.
   */
  async acquire(): Promise<Release> {
    if (this.limit > 0 && this.active >= this.limit) {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    } else {
      this.active++;
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Slot passes straight to the next waiter; active count is unchanged
      next();
    } else {
      this.active--;
    }
  }
}

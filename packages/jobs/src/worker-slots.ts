/**
 * Counting semaphore for extraction workers. The coordinator owns one and
 * never dispatches more jobs than it has permits.
 */
export class WorkerSlots {
  private inUse = 0;

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Worker count must be a positive integer, got ${size}`);
    }
  }

  get available(): number {
    return this.size - this.inUse;
  }

  /** Returns a release function, or null when every permit is taken. Releasing twice is a no-op. */
  tryAcquire(): (() => void) | null {
    if (this.inUse >= this.size) return null;
    this.inUse++;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.inUse--;
    };
  }
}

/**
 * Counting admission control bounding in-flight probe units. Waiters are
 * admitted in FIFO order; a released slot goes straight to the next waiter.
 */
export class AdmissionControl {
  readonly capacity: number;
  private active = 0;
  private peak = 0;
  private readonly waiters: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Admission capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get inFlight(): number {
    return this.active;
  }

  get peakInFlight(): number {
    return this.peak;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  acquire(): Promise<void> {
    if (this.active < this.capacity) {
      this.admit();
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(() => {
        this.admit();
        resolve();
      });
    });
  }

  release(): void {
    if (this.active === 0) {
      throw new Error('AdmissionControl.release() called with no slot held');
    }
    this.active--;

    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }

    if (this.active === 0 && this.idleWaiters.length > 0) {
      const idle = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of idle) resolve();
    }
  }

  /** Resolves once no slot is held and nobody is waiting. */
  drain(): Promise<void> {
    if (this.active === 0 && this.waiters.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private admit(): void {
    this.active++;
    if (this.active > this.peak) {
      this.peak = this.active;
    }
  }
}

/**
 * Admission control for the execution service: the only shared mutable
 * resource. One counter, passed explicitly to whoever submits work.
 */
export class AdmissionControl {
  private inFlight = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Admission capacity must be a positive integer, got ${capacity}`);
    }
  }

  get active(): number {
    return this.inFlight;
  }

  get queued(): number {
    return this.waiters.length;
  }

  /** Wait for a slot. The returned release function is idempotent. */
  async acquire(): Promise<() => void> {
    if (this.inFlight < this.capacity) {
      this.inFlight++;
    } else {
      // The releasing caller hands its slot over, so inFlight stays unchanged.
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.inFlight--;
      }
    };
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

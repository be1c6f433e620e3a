import { StageFailure } from "./errors.js";

type Waiter = {
  grant: () => void;
  detach: () => void;
};

export type Release = () => void;

/**
 * Counting semaphore guarding the external execution stage across jobs.
 * Waiters are served FIFO; a waiter whose signal aborts leaves the queue.
 */
export class ExecutionLimiter {
  private readonly capacity: number;
  private inUse = 0;
  private readonly waiters: Waiter[] = [];

  constructor(maxConcurrent: number) {
    this.capacity = Math.max(1, Math.floor(maxConcurrent));
  }

  get max(): number {
    return this.capacity;
  }

  get held(): number {
    return this.inUse;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  async acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) throw new StageFailure("Cancelled", "Cancelled while waiting for an execution slot");

    if (this.inUse < this.capacity && this.waiters.length === 0) {
      this.inUse += 1;
      return this.releaser();
    }

    await new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const idx = this.waiters.indexOf(waiter);
        if (idx !== -1) this.waiters.splice(idx, 1);
        reject(new StageFailure("Cancelled", "Cancelled while waiting for an execution slot"));
      };
      const waiter: Waiter = {
        grant: resolve,
        detach: () => signal?.removeEventListener("abort", onAbort)
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
    return this.releaser();
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Slot passes straight to the next waiter; inUse is unchanged.
        next.detach();
        next.grant();
        return;
      }
      this.inUse -= 1;
    };
  }
}

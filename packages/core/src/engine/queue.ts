import { QueueFullError } from "agentry-shared";

/**
 * A slot taken ahead of `offer`, so the caller can create the run record
 * only once space is guaranteed.
 */
export interface QueueReservation {
  commit(runId: string): void;
  release(): void;
}

type Waiter = (runId: string | null) => void;

/**
 * Bounded FIFO of run ids waiting for a worker.
 *
 * Full-queue policy is fail fast: `offer` and `reserve` throw
 * `QueueFullError` instead of waiting for space. Reserved slots count
 * against the capacity.
 */
export class ExecutionQueue {
  private readonly items: string[] = [];
  private readonly waiters: Waiter[] = [];
  private reserved = 0;
  private closed = false;

  constructor(public readonly capacity: number) {}

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  reserve(): QueueReservation {
    this.ensureSpace();
    this.reserved++;
    let done = false;
    return {
      commit: (runId) => {
        if (done) return;
        done = true;
        this.reserved--;
        this.push(runId);
      },
      release: () => {
        if (done) return;
        done = true;
        this.reserved--;
      },
    };
  }

  offer(runId: string): void {
    this.ensureSpace();
    this.push(runId);
  }

  /**
   * Wait for the next run id. Resolves with null once the queue is closed.
   */
  take(): Promise<string | null> {
    if (this.closed) {
      return Promise.resolve(null);
    }
    const next = this.items.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Drop a waiting run id.
   * @returns false when the id was not queued
   */
  remove(runId: string): boolean {
    const index = this.items.indexOf(runId);
    if (index === -1) {
      return false;
    }
    this.items.splice(index, 1);
    return true;
  }

  has(runId: string): boolean {
    return this.items.includes(runId);
  }

  /**
   * Stop accepting and handing out work, and wake every waiting worker.
   * Ids still queued are left in place.
   * @returns the ids still queued
   */
  close(): string[] {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
    return [...this.items];
  }

  private ensureSpace(): void {
    if (this.closed || this.items.length + this.reserved >= this.capacity) {
      throw new QueueFullError(this.capacity);
    }
  }

  private push(runId: string): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(runId);
      return;
    }
    this.items.push(runId);
  }
}

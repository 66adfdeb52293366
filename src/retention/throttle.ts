import pLimit, { type LimitFunction } from "p-limit";

export interface Admission<T> {
  /** Settles when the task itself finishes. */
  done: Promise<T>;
}

/**
 * Caps the number of destroy operations in flight at once. One instance is
 * shared by every pass of a run.
 */
export class DeletionThrottle {
  private readonly limit: LimitFunction;
  readonly ceiling: number;

  constructor(ceiling: number) {
    if (!Number.isInteger(ceiling) || ceiling < 1) {
      throw new RangeError(`Deletion ceiling must be a positive integer, got ${ceiling}`);
    }
    this.ceiling = ceiling;
    this.limit = pLimit(ceiling);
  }

  get activeCount(): number {
    return this.limit.activeCount;
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  /**
   * Wait until a slot is free and `task` has started, then hand back its
   * completion without waiting for it.
   */
  async admit<T>(task: () => Promise<T>): Promise<Admission<T>> {
    let started: () => void = () => {};
    const admitted = new Promise<void>((resolve) => {
      started = resolve;
    });
    const done = this.limit(() => {
      started();
      return task();
    });
    await admitted;
    return { done };
  }
}

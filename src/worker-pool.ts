export type SettledTask<T> =
  | { status: "fulfilled"; index: number; value: T }
  | { status: "rejected"; index: number; reason: unknown };

/**
 * A fixed-capacity pool of async workers that lives for one batch.
 * Tasks run at most `capacity` at a time; results arrive in completion order.
 * Once shut down, the pool refuses new work.
 */
export class WorkerPool {
  private active = 0;
  private shutDown = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Worker pool capacity must be a positive integer, got ${capacity}`);
    }
  }

  get activeCount(): number {
    return this.active;
  }

  async run<T>(
    tasks: Array<() => Promise<T>>,
    onSettled?: (result: SettledTask<T>) => void,
  ): Promise<Array<SettledTask<T>>> {
    if (this.shutDown) {
      throw new Error("Worker pool has been shut down");
    }

    const settled: Array<SettledTask<T>> = [];
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < tasks.length) {
        const index = next++;
        this.active++;
        let result: SettledTask<T>;
        try {
          result = { status: "fulfilled", index, value: await tasks[index]() };
        } catch (reason) {
          result = { status: "rejected", index, reason };
        } finally {
          this.active--;
        }
        settled.push(result);
        onSettled?.(result);
      }
    };

    const workerCount = Math.min(this.capacity, tasks.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return settled;
  }

  shutdown(): void {
    this.shutDown = true;
  }
}

import { PoolClosedError } from "./errors.js";

export type TaskOutcome<T> =
  | { status: "fulfilled"; value: T }
  | { status: "rejected"; error: unknown }
  | { status: "abandoned" };

export type PoolTask<T> = (signal: AbortSignal) => Promise<T>;

interface QueuedTask {
  start: () => void;
  abandon: () => void;
}

/**
 * Fixed-concurrency task runner with an explicit lifecycle: created at the
 * start of a run and shut down at its end.
 */
export class WorkerPool {
  readonly concurrency: number;
  private readonly controller = new AbortController();
  private readonly queue: QueuedTask[] = [];
  private readonly running = new Set<Promise<void>>();
  private readonly abandonHandlers = new Set<() => void>();
  private closed = false;

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Worker pool concurrency must be a positive integer (got ${String(concurrency)}).`);
    }
    this.concurrency = concurrency;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get activeCount(): number {
    return this.running.size;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  submit<T>(task: PoolTask<T>): Promise<TaskOutcome<T>> {
    if (this.closed) {
      return Promise.reject(new PoolClosedError());
    }

    return new Promise<TaskOutcome<T>>((resolve) => {
      let settled = false;
      const settle = (outcome: TaskOutcome<T>): void => {
        if (!settled) {
          settled = true;
          this.abandonHandlers.delete(abandon);
          resolve(outcome);
        }
      };
      const abandon = (): void => settle({ status: "abandoned" });
      this.abandonHandlers.add(abandon);

      this.queue.push({
        abandon,
        start: () => {
          const execution = (async () => {
            try {
              const value = await task(this.controller.signal);
              settle({ status: "fulfilled", value });
            } catch (error) {
              settle(this.controller.signal.aborted ? { status: "abandoned" } : { status: "rejected", error });
            }
          })();

          const tracked = execution.finally(() => {
            this.running.delete(tracked);
            this.drain();
          });
          this.running.add(tracked);
        }
      });

      this.drain();
    });
  }

  /**
   * Stops accepting tasks and waits for queued and running ones until the
   * deadline. Whatever has not finished by then is aborted and resolves as
   * abandoned. Returns true when everything finished in time.
   */
  async shutdown(timeoutMs: number): Promise<boolean> {
    this.closed = true;

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), Math.max(0, timeoutMs));
    });

    const finished = await Promise.race([this.idle().then(() => true as const), deadline]);
    clearTimeout(timer);

    if (!finished) {
      this.controller.abort(new Error(`worker pool shutdown timed out after ${timeoutMs}ms`));
      for (const queued of this.queue.splice(0)) {
        queued.abandon();
      }
      for (const abandon of Array.from(this.abandonHandlers)) {
        abandon();
      }
    }

    return finished;
  }

  private async idle(): Promise<void> {
    while (this.running.size > 0 || this.queue.length > 0) {
      if (this.running.size === 0) {
        this.drain();
        if (this.running.size === 0) {
          return;
        }
      }
      await Promise.race(this.running);
    }
  }

  private drain(): void {
    if (this.controller.signal.aborted) {
      return;
    }
    while (this.running.size < this.concurrency && this.queue.length > 0) {
      const next = this.queue.shift();
      next?.start();
    }
  }
}

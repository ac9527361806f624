import type { Logger } from "../logger.js";

/** Resolve after `ms` milliseconds. */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Race `promise` against a timer. The timer is cleared as soon as either side
 * settles; `onTimeout` builds the rejection reason.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Keeps track of fire-and-forget work so it can be awaited on shutdown.
 * Failures are logged against the task label.
 */
export class TaskTracker {
  private readonly pending = new Set<Promise<void>>();
  private readonly log: Logger;

  constructor(log: Logger) {
    this.log = log;
  }

  track(task: Promise<unknown>, label: string): void {
    const tracked: Promise<void> = task
      .then(() => undefined)
      .catch((err: unknown) => {
        this.log.error({ err, task: label }, "background task failed");
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }

  get size(): number {
    return this.pending.size;
  }

  /** Wait until every tracked task (including ones started while draining) settles. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}

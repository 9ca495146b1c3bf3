import { logger } from "../logger";

type Task = () => Promise<void>;

interface QueuedTask {
  id: string;
  task: Task;
}

/**
 * Background task runner with one slot per id. At most `maxConcurrent` tasks
 * run at once; the rest wait in FIFO order. A task never starts in the same
 * turn that enqueued it, and a failing task is logged without touching the
 * others.
 */
export class TaskQueue {
  private readonly pending: QueuedTask[] = [];
  private readonly running = new Set<string>();
  private idleWaiters: (() => void)[] = [];

  constructor(private readonly maxConcurrent = Number.POSITIVE_INFINITY) {
    if (!(maxConcurrent >= 1)) {
      throw new RangeError("maxConcurrent must be at least 1");
    }
  }

  /** Returns false when a task with this id is already pending or running. */
  enqueue(id: string, task: Task): boolean {
    if (this.running.has(id) || this.pending.some((entry) => entry.id === id)) {
      return false;
    }
    this.pending.push({ id, task });
    this.drain();
    return true;
  }

  get pendingCount() {
    return this.pending.length;
  }

  get runningCount() {
    return this.running.size;
  }

  /** Resolves once nothing is pending or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private isIdle() {
    return this.pending.length === 0 && this.running.size === 0;
  }

  private drain() {
    while (this.running.size < this.maxConcurrent && this.pending.length) {
      const next = this.pending.shift();
      if (!next) {
        break;
      }
      this.running.add(next.id);
      setImmediate(() => {
        void this.execute(next);
      });
    }
  }

  private async execute(entry: QueuedTask) {
    try {
      await entry.task();
    } catch (error) {
      logger.error({ error, taskId: entry.id }, "Background task failed");
    } finally {
      this.running.delete(entry.id);
      this.drain();
      if (this.isIdle()) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach((resolve) => resolve());
      }
    }
  }
}

import { describeError } from '../errors/http-error';
import { logger as rootLogger, Logger } from '../utils/logger';

export interface QueuedTask {
  jobId: string;
  run: () => Promise<unknown>;
}

/**
 * In-process hand-off between the submission path and job execution.
 * `enqueue` returns immediately and tasks run with bounded concurrency.
 * A jobId stays claimed while its task is queued or running; afterwards the
 * stored record is what blocks a resubmission.
 */
export class JobQueue {
  private readonly pending: QueuedTask[] = [];
  private readonly claimed = new Set<string>();
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly concurrency: number,
    private readonly log: Logger = rootLogger.child('JobQueue'),
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Job concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  isClaimed(jobId: string): boolean {
    return this.claimed.has(jobId);
  }

  /** Returns false when the jobId is already queued or running. */
  enqueue(task: QueuedTask): boolean {
    if (this.claimed.has(task.jobId)) {
      return false;
    }

    this.claimed.add(task.jobId);
    this.pending.push(task);
    this.log.debug('Job queued', { jobId: task.jobId, pending: this.pending.length, running: this.running });
    this.drain();
    return true;
  }

  size(): { pending: number; running: number } {
    return { pending: this.pending.length, running: this.running };
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.running === 0 && this.pending.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private drain(): void {
    while (this.running < this.concurrency && this.pending.length > 0) {
      const task = this.pending.shift();
      if (!task) {
        continue;
      }

      this.running += 1;
      void this.runTask(task);
    }

    if (this.running === 0 && this.pending.length === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }

  private async runTask(task: QueuedTask): Promise<void> {
    try {
      await task.run();
    } catch (error) {
      this.log.error('Job execution failed', { jobId: task.jobId, error: describeError(error) });
    } finally {
      this.claimed.delete(task.jobId);
      this.running -= 1;
      this.drain();
    }
  }
}

import Queue from 'better-queue';
import { IJobScheduler } from '../domain/ports';
import { errorMessage } from '../domain/errors';

// Interface for the data passed into the Queue
interface ScheduledRun {
  jobId: string;
}

export type JobRunner = (jobId: string) => Promise<void>;

export interface JobQueueOptions {
  concurrency?: number;       // Local transcription is CPU bound, default is one at a time
  afterProcessDelay?: number; // Cool down between jobs (ms)
}

/**
 * Background drain loop.
 * A job id that is already waiting is not queued twice; the runner itself
 * ignores ids whose job is no longer `queued`.
 */
export class JobQueue implements IJobScheduler {
  private queue: Queue<ScheduledRun, void>;
  private waiting = new Set<string>();
  private running = 0;
  private idleWaiters: Array<() => void> = [];
  private stopped = false;

  constructor(private runner: JobRunner, options: JobQueueOptions = {}) {
    this.queue = new Queue<ScheduledRun, void>(
      (task, cb) => {
        this.waiting.delete(task.jobId);
        this.running++;
        this.runner(task.jobId).then(
          () => cb(null),
          (error: unknown) => cb(error)
        );
      },
      {
        id: 'jobId',
        concurrent: options.concurrency ?? 1,
        afterProcessDelay: options.afterProcessDelay ?? 0
      }
    );

    // Queue Events for global logging
    this.queue.on('task_finish', () => this.settle());
    this.queue.on('task_failed', (taskId: string, err: unknown) => {
      console.error(`💥 [Queue] Run for job ${taskId} failed: ${errorMessage(err)}`);
      this.settle();
    });
  }

  schedule(jobId: string): void {
    if (this.stopped || this.waiting.has(jobId)) return;
    this.waiting.add(jobId);
    this.queue.push({ jobId });
  }

  idle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  stop(): Promise<void> {
    this.stopped = true;
    this.waiting.clear();
    return new Promise(resolve => this.queue.destroy(() => {
      this.releaseWaiters();
      resolve();
    }));
  }

  private isIdle(): boolean {
    return this.waiting.size === 0 && this.running === 0;
  }

  private settle(): void {
    this.running = Math.max(0, this.running - 1);
    if (this.isIdle()) this.releaseWaiters();
  }

  private releaseWaiters(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}

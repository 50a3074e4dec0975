import { JobEvent } from '../domain/models';
import { errorMessage } from '../domain/errors';

export type JobEventListener = (event: JobEvent) => void;

const ALL_JOBS = '*';

function eventJobId(event: JobEvent): string {
  return event.type === 'status' || event.type === 'stage' ? event.job.id : event.jobId;
}

/**
 * Per-job observer fan-out.
 * Delivery is deferred to the next macrotask so a slow listener never holds up
 * the orchestrator. Consecutive progress events for one job collapse into the
 * latest value; status, stage and removal events are never dropped.
 */
export class JobEventHub {
  private listeners = new Map<string, Set<JobEventListener>>();
  private pending: JobEvent[] = [];
  private flushScheduled = false;

  subscribe(listener: JobEventListener, jobId: string = ALL_JOBS): () => void {
    let set = this.listeners.get(jobId);
    if (!set) {
      set = new Set();
      this.listeners.set(jobId, set);
    }
    set.add(listener);
    return () => {
      const current = this.listeners.get(jobId);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) this.listeners.delete(jobId);
    };
  }

  publish(event: JobEvent): void {
    if (this.listeners.size === 0) return;

    if (event.type === 'progress') {
      const last = this.pending[this.pending.length - 1];
      if (last && last.type === 'progress' && last.jobId === event.jobId) {
        this.pending[this.pending.length - 1] = event;
        return;
      }
    }

    this.pending.push(event);
    this.scheduleFlush();
  }

  /** Resolves after every event published so far has been delivered. */
  flushed(): Promise<void> {
    return new Promise(resolve => setImmediate(resolve));
  }

  private scheduleFlush(): void {
    if (this.flushScheduled) return;
    this.flushScheduled = true;
    setImmediate(() => {
      this.flushScheduled = false;
      const batch = this.pending;
      this.pending = [];
      for (const event of batch) {
        this.deliver(event);
      }
    });
  }

  private deliver(event: JobEvent): void {
    const targets = [
      ...(this.listeners.get(eventJobId(event)) ?? []),
      ...(this.listeners.get(ALL_JOBS) ?? [])
    ];
    for (const listener of targets) {
      try {
        listener(event);
      } catch (error) {
        console.error('❌ [Events] Listener failed:', errorMessage(error));
      }
    }
  }
}

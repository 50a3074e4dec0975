import { JobRecord, JobStatus } from '@voxqueue/shared';
import { InvalidTransitionError } from './errors';

// queued -> failed covers jobs rejected before any backend ran (missing audio, no candidates).
// recording/transcribing -> same status is a stage change within one attempt sequence.
const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ['recording', 'transcribing', 'failed', 'cancelled'],
  recording: ['recording', 'transcribing', 'completed', 'failed', 'cancelled'],
  transcribing: ['transcribing', 'completed', 'failed', 'cancelled'],
  failed: ['queued'],
  completed: [],
  cancelled: []
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Throws on a transition the lifecycle does not allow.
 * Reaching one means a job was dispatched twice or its run lost ownership.
 */
export function assertTransition(job: JobRecord, to: JobStatus): void {
  if (!canTransition(job.status, to)) {
    throw new InvalidTransitionError(job.id, job.status, to);
  }
}

export function cloneJob(job: JobRecord): JobRecord {
  return structuredClone(job);
}

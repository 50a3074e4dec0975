import path from 'path';
import { JobRecord, JobSummary, JobView } from '@voxqueue/shared';

/**
 * Helper to safely validate enum-like strings from request input
 */
export function parseOneOf<T extends string>(value: unknown, allowed: readonly T[]): T | undefined {
  return allowed.find(candidate => candidate === value);
}

export function toJobView(job: JobRecord): JobView {
  // Strip local paths before a record leaves the server
  const { audioPath: _audioPath, sourcePath: _sourcePath, ...view } = job;
  return view;
}

export function toJobSummary(job: JobRecord): JobSummary {
  const summary: JobSummary = {
    id: job.id,
    createdAt: job.createdAt,
    filename: job.filename,
    status: job.status,
    progress: job.progress
  };
  if (job.stage !== undefined) summary.stage = job.stage;
  if (job.error !== undefined) summary.error = job.error;
  return summary;
}

// {UUID}_{OriginalName}, with anything that could escape the upload folder replaced
export function uploadFileName(id: string, original: string): string {
  return `${id}_${path.basename(original).replace(/[^a-zA-Z0-9.-]/g, '_')}`;
}

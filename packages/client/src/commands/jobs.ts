import fs from 'fs';
import path from 'path';
import { ExportFormat, JOB_STATUSES, JobRecord, JobStatus } from '@voxqueue/shared';
import { InputError, errorMessage } from '../domain/errors';
import { JobEvent } from '../domain/models';
import { AppContainer } from '../container';
import { safeBaseName } from '../utils/transcriptText';

export type JobsContext = Pick<AppContainer, 'orchestrator' | 'importer' | 'exporter' | 'paths'>;

export function parseStatus(value: string | undefined): JobStatus | undefined {
  if (value === undefined) return undefined;
  const status = JOB_STATUSES.find(s => s === value);
  if (!status) throw new InputError(`Unknown status "${value}". Expected one of: ${JOB_STATUSES.join(', ')}`);
  return status;
}

export function parseFormat(value: string | undefined): ExportFormat {
  if (value === undefined) return ExportFormat.TEXT;
  const format = Object.values(ExportFormat).find(f => f === value);
  if (!format) throw new InputError(`Unknown export format "${value}"`);
  return format;
}

export function describeJob(job: JobRecord): string {
  const progress = `${Math.round(job.progress * 100)}%`.padStart(4);
  const line = `${job.id.slice(0, 8)}  ${job.status.padEnd(12)} ${progress}  ${job.filename}`;
  return job.error ? `${line}  (${job.error})` : line;
}

export function describeEvent(event: JobEvent): string {
  switch (event.type) {
    case 'status':
      return `🔄 [Job ${event.job.id}] ${event.previous} -> ${event.job.status} (${event.job.stage ?? '-'})`;
    case 'stage':
      return `⚙️  [Job ${event.job.id}] Stage ${event.job.stage ?? '-'}`;
    case 'progress':
      return `⏳ [Job ${event.jobId}] ${Math.round(event.progress * 100)}%`;
    case 'removed':
      return `🗑️  [Job ${event.jobId}] Removed`;
  }
}

/**
 * Accepts a full id or an unambiguous prefix, as printed by `jobs`.
 */
export function findJob(ctx: Pick<JobsContext, 'orchestrator'>, idOrPrefix: string): JobRecord {
  const exact = ctx.orchestrator.get(idOrPrefix);
  if (exact) return exact;

  const matches = ctx.orchestrator.list().filter(job => job.id.startsWith(idOrPrefix));
  if (matches.length === 1) return matches[0];
  if (matches.length > 1) throw new InputError(`Job id "${idOrPrefix}" is ambiguous`);
  throw new InputError(`Job not found: ${idOrPrefix}`);
}

export function listJobs(ctx: Pick<JobsContext, 'orchestrator'>, status?: string): JobRecord[] {
  const wanted = parseStatus(status);
  const jobs = ctx.orchestrator.list().filter(job => wanted === undefined || job.status === wanted);

  if (jobs.length === 0) {
    console.log('No jobs.');
  }
  for (const job of jobs) {
    console.log(describeJob(job));
  }
  return jobs;
}

/**
 * Imports files (or every new file in a folder), then follows the queue
 * until it drains.
 */
export async function enqueueFiles(ctx: JobsContext, inputs: readonly string[], title?: string): Promise<string[]> {
  const unsubscribe = ctx.orchestrator.subscribeAll(event => console.log(describeEvent(event)));
  const ids: string[] = [];

  try {
    for (const input of inputs) {
      try {
        if (fs.existsSync(input) && fs.statSync(input).isDirectory()) {
          ids.push(...(await ctx.importer.scanDirectory(input)));
        } else {
          ids.push(await ctx.importer.importFile(input, inputs.length === 1 ? title : undefined));
        }
      } catch (error) {
        if (!(error instanceof InputError)) throw error;
        console.error(`❌ ${error.message}`);
      }
    }

    await ctx.orchestrator.idle();
  } finally {
    unsubscribe();
  }

  for (const id of ids) {
    const job = ctx.orchestrator.get(id);
    if (job) console.log(describeJob(job));
  }
  return ids;
}

export async function retryJob(ctx: JobsContext, idOrPrefix: string): Promise<boolean> {
  const job = findJob(ctx, idOrPrefix);
  if (!ctx.orchestrator.retry(job.id)) {
    console.log(`ℹ️  Job ${job.id} is ${job.status}; only failed jobs can be retried.`);
    return false;
  }

  const unsubscribe = ctx.orchestrator.subscribe(job.id, event => console.log(describeEvent(event)));
  try {
    await ctx.orchestrator.idle();
  } finally {
    unsubscribe();
  }
  return true;
}

export async function cancelJob(ctx: JobsContext, idOrPrefix: string): Promise<boolean> {
  const job = findJob(ctx, idOrPrefix);
  const cancelled = await ctx.orchestrator.cancel(job.id);
  if (!cancelled) console.log(`ℹ️  Job ${job.id} is ${job.status} and cannot be cancelled.`);
  return cancelled;
}

export async function removeJob(ctx: JobsContext, idOrPrefix: string): Promise<boolean> {
  const job = findJob(ctx, idOrPrefix);
  return ctx.orchestrator.removeJob(job.id);
}

/**
 * Writes one export of a completed job. Returns the written path.
 */
export async function exportJob(
  ctx: JobsContext,
  idOrPrefix: string,
  format: string | undefined,
  outDir?: string
): Promise<string> {
  const job = findJob(ctx, idOrPrefix);
  if (job.status !== 'completed' || !job.result) {
    throw new InputError(`Job ${job.id} is ${job.status}; only completed jobs can be exported`);
  }

  const [written] = await ctx.exporter.writeAll(
    job.result,
    path.resolve(outDir ?? ctx.paths.exports),
    safeBaseName(job.filename),
    [parseFormat(format)]
  );
  console.log(`📝 Exported to ${written}`);
  return written;
}

export function reportFailure(error: unknown): void {
  console.error(`❌ ${errorMessage(error)}`);
}

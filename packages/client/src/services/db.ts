import { LowSync } from 'lowdb';
import { JSONFileSync } from 'lowdb/node';
import path from 'path';
import { z } from 'zod';
import { JobRecord, isActiveStatus } from '@voxqueue/shared';
import { IJobLedger, LedgerListener } from '../domain/ports';
import { LedgerError, PersistenceError, errorMessage } from '../domain/errors';
import { cloneJob } from '../domain/jobStateMachine';

const LEDGER_VERSION = 1;

interface LedgerSchema {
  version: number;
  jobs: unknown[];
}

// Null and missing both decode to absent so older/newer files still load
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined);
}

const segmentSchema = z.object({
  start: z.number(),
  end: z.number(),
  text: z.string()
});

const resultSchema = z.object({
  text: z.string(),
  segments: z.array(segmentSchema),
  language: optional(z.string()),
  duration: z.number()
});

const jobSchema = z.object({
  id: z.string().min(1),
  createdAt: z.string(),
  audioPath: z.string(),
  filename: z.string(),
  sourcePath: optional(z.string()),
  status: z.enum(['queued', 'recording', 'transcribing', 'completed', 'failed', 'cancelled']),
  stage: optional(z.string()),
  progress: z.number().min(0).max(1),
  error: optional(z.string()),
  result: optional(resultSchema),
  duration: optional(z.number()),
  captureInProgress: optional(z.boolean())
});

const ledgerFileSchema = z.object({
  jobs: z.array(z.unknown())
});

/**
 * Decodes a persisted ledger payload.
 * Records that fail validation are dropped individually; a payload without a
 * `jobs` array yields an empty ledger.
 */
export function decodeLedger(raw: unknown): JobRecord[] {
  const file = ledgerFileSchema.safeParse(raw);
  if (!file.success) {
    console.warn('⚠️ [Ledger] Unrecognized ledger format, starting empty.');
    return [];
  }

  const jobs: JobRecord[] = [];
  const seen = new Set<string>();
  for (const entry of file.data.jobs) {
    const parsed = jobSchema.safeParse(entry);
    if (!parsed.success) {
      console.warn(`⚠️ [Ledger] Dropping unreadable job record: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      continue;
    }
    if (seen.has(parsed.data.id)) continue;
    seen.add(parsed.data.id);
    jobs.push(stripUndefined(parsed.data));
  }
  return jobs;
}

function stripUndefined(job: z.output<typeof jobSchema>): JobRecord {
  const record: JobRecord = {
    id: job.id,
    createdAt: job.createdAt,
    audioPath: job.audioPath,
    filename: job.filename,
    status: job.status,
    progress: job.progress
  };
  if (job.sourcePath !== undefined) record.sourcePath = job.sourcePath;
  if (job.stage !== undefined) record.stage = job.stage;
  if (job.error !== undefined) record.error = job.error;
  if (job.duration !== undefined) record.duration = job.duration;
  if (job.captureInProgress !== undefined) record.captureInProgress = job.captureInProgress;
  if (job.result !== undefined) {
    record.result = {
      text: job.result.text,
      segments: job.result.segments,
      duration: job.result.duration
    };
    if (job.result.language !== undefined) record.result.language = job.result.language;
  }
  return record;
}

/**
 * Durable, ordered store of job records.
 * Every mutation rewrites the whole snapshot (temp file + rename) before returning.
 * Write failures are logged; the in-memory collection stays authoritative.
 */
export class JobLedger implements IJobLedger {
  private db: LowSync<LedgerSchema>;
  private jobs: JobRecord[] = [];
  private listeners = new Set<LedgerListener>();
  private notifyScheduled = false;

  constructor(dbPath?: string) {
    const finalPath = dbPath || path.join(process.cwd(), 'jobs.json');
    const adapter = new JSONFileSync<LedgerSchema>(finalPath);
    this.db = new LowSync(adapter, { version: LEDGER_VERSION, jobs: [] });
    this.load();
  }

  private load(): void {
    try {
      this.db.read();
      this.jobs = decodeLedger(this.db.data);
    } catch (error) {
      console.error('❌ [Ledger] Failed to load jobs, starting empty:', errorMessage(error));
      this.jobs = [];
    }
    this.db.data = { version: LEDGER_VERSION, jobs: this.jobs };
  }

  private persist(): void {
    try {
      this.db.data = { version: LEDGER_VERSION, jobs: this.jobs };
      this.db.write();
    } catch (error) {
      const failure = new PersistenceError(`Failed to save jobs: ${errorMessage(error)}`, error);
      console.error(`❌ [Ledger] ${failure.message}`);
    }
    this.scheduleNotify();
  }

  public add(job: JobRecord): void {
    if (this.jobs.some(j => j.id === job.id)) {
      throw new LedgerError(`Job ${job.id} already exists`);
    }
    this.jobs.push(cloneJob(job));
    this.persist();
  }

  public update(job: JobRecord): boolean {
    const index = this.jobs.findIndex(j => j.id === job.id);
    if (index === -1) {
      console.warn(`⚠️ [Ledger] Update ignored, job ${job.id} no longer exists.`);
      return false;
    }
    this.jobs[index] = cloneJob(job);
    this.persist();
    return true;
  }

  public remove(id: string): void {
    const before = this.jobs.length;
    this.jobs = this.jobs.filter(j => j.id !== id);
    if (this.jobs.length !== before) {
      this.persist();
    }
  }

  public get(id: string): JobRecord | undefined {
    const job = this.jobs.find(j => j.id === id);
    return job ? cloneJob(job) : undefined;
  }

  public list(): JobRecord[] {
    return this.jobs.map(cloneJob);
  }

  public queued(): JobRecord[] {
    return this.list().filter(j => j.status === 'queued');
  }

  public running(): JobRecord[] {
    return this.list().filter(j => isActiveStatus(j.status));
  }

  public completed(): JobRecord[] {
    return this.list().filter(j => j.status === 'completed');
  }

  public failed(): JobRecord[] {
    return this.list().filter(j => j.status === 'failed');
  }

  public subscribe(listener: LedgerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // Coalesced to one notification per tick so slow listeners never stall writers
  private scheduleNotify(): void {
    if (this.listeners.size === 0 || this.notifyScheduled) return;
    this.notifyScheduled = true;
    setImmediate(() => {
      this.notifyScheduled = false;
      const snapshot = this.list();
      for (const listener of this.listeners) {
        try {
          listener(snapshot);
        } catch (error) {
          console.error('❌ [Ledger] Listener failed:', errorMessage(error));
        }
      }
    });
  }
}

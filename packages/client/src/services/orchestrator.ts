import { randomUUID } from 'crypto';
import { JobRecord, JobStatus, TranscriptionLanguage, TranscriptionResult, isActiveStatus } from '@voxqueue/shared';
import { SettingsSnapshot } from '../domain/configs';
import { BackendError, CancellationError, InputError, errorMessage } from '../domain/errors';
import { assertTransition } from '../domain/jobStateMachine';
import { CaptureHandle, CaptureOutcome, DecodeOptions, JobEvent, Strategy } from '../domain/models';
import {
  IBackendFactory,
  ICaptureStatusWriter,
  IConnectivity,
  IFileManager,
  IJobLedger,
  IJobScheduler,
  IModelCatalog,
  ISettingsSource,
  LedgerListener
} from '../domain/ports';
import { selectStrategies } from './backendSelector';
import { JobEventHub, JobEventListener } from './jobEvents';
import { JobQueue, JobRunner } from './queue';
import { sanitizeResult } from '../utils/transcriptText';

export const NO_BACKEND_ERROR = 'No available transcription backend';
export const CANCELLED_ERROR = 'Cancelled by user';
export const INTERRUPTED_ERROR = 'Interrupted before completion';

export type SchedulerFactory = (runner: JobRunner) => IJobScheduler;

export interface OrchestratorDeps {
  ledger: IJobLedger;
  settings: ISettingsSource;
  connectivity: IConnectivity;
  catalog: IModelCatalog;
  backends: IBackendFactory;
  files: Pick<IFileManager, 'fileExists'>;
  events?: JobEventHub;
  captureStatus?: ICaptureStatusWriter;
  createScheduler?: SchedulerFactory;
}

export interface EnqueueOptions {
  sourcePath?: string;
  duration?: number;
}

export interface CompletedJobInput {
  audioPath: string;
  filename: string;
  result: TranscriptionResult;
  stage?: string;
}

interface ActiveRun {
  controller: AbortController;
  done: Promise<void>;
  // Lets the drain loop move on when a cancelled backend never settles
  release: () => void;
}

function delay(ms: number): { promise: Promise<void>; cancel: () => void } {
  let timer: NodeJS.Timeout | undefined;
  const promise = new Promise<void>(resolve => {
    timer = setTimeout(resolve, ms);
  });
  return { promise, cancel: () => clearTimeout(timer) };
}

// Rejects with CancellationError as soon as the signal aborts
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal, jobId: string): Promise<T> {
  if (signal.aborted) return Promise.reject(new CancellationError(jobId));
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancellationError(jobId));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function clampProgress(fraction: number): number {
  if (!Number.isFinite(fraction)) return 0;
  return Math.min(1, Math.max(0, fraction));
}

export function decodeOptionsFor(settings: SettingsSnapshot, strategy: Strategy, job: JobRecord): DecodeOptions {
  const language =
    settings.autoLanguageDetect || settings.language === TranscriptionLanguage.AUTO ? undefined : settings.language;

  // The fallback engine runs greedy decoding on the smaller model
  if (strategy.kind === 'fallback') {
    return {
      language,
      translate: false,
      temperature: 0,
      beamSize: 1,
      preserveTimestamps: settings.showTimestamps,
      durationEstimate: job.duration
    };
  }

  return {
    language,
    translate: settings.translate,
    temperature: settings.temperature,
    beamSize: settings.beamSize,
    preserveTimestamps: settings.showTimestamps,
    durationEstimate: job.duration
  };
}

/**
 * Drives every job through its lifecycle.
 *
 * All ledger writes for a job go through `write`, which refuses to touch a
 * record once the run that issued the write has been superseded (cancel,
 * remove). Backends run off the owner path and report back via promises and
 * the progress callback; nothing they do mutates a record directly.
 */
export class JobOrchestrator {
  public readonly events: JobEventHub;

  private readonly ledger: IJobLedger;
  private readonly scheduler?: IJobScheduler;
  private epochs = new Map<string, number>();
  private inFlight = new Map<string, ActiveRun>();
  private captures = new Map<string, CaptureHandle>();
  private cancelling = new Map<string, Promise<boolean>>();

  constructor(private deps: OrchestratorDeps, options: { autoRun?: boolean } = {}) {
    this.ledger = deps.ledger;
    this.events = deps.events ?? new JobEventHub();

    if (options.autoRun ?? true) {
      const createScheduler: SchedulerFactory =
        deps.createScheduler ??
        (runner => new JobQueue(runner, { concurrency: deps.settings.snapshot().concurrency }));
      this.scheduler = createScheduler(jobId => this.run(jobId));
    }
  }

  // --- Public operations ---

  /**
   * Creates a `queued` job and returns its id without waiting for transcription.
   */
  public enqueue(audioPath: string, filename: string, options: EnqueueOptions = {}): string {
    const job = this.createQueuedJob(audioPath, filename, options);
    this.ledger.add(job);
    console.log(`📥 [Job ${job.id}] Queued ${filename}`);
    this.scheduler?.schedule(job.id);
    return job.id;
  }

  /**
   * Enqueues audio that is still being recorded. The job is held in
   * `recording` until `capture.done` settles.
   */
  public enqueueCapture(audioPath: string, filename: string, capture: CaptureHandle): string {
    const job = this.createQueuedJob(audioPath, filename, {});
    job.captureInProgress = true;
    this.captures.set(job.id, capture);
    this.ledger.add(job);
    console.log(`🎙️  [Job ${job.id}] Capture queued for ${filename}`);
    this.scheduler?.schedule(job.id);
    return job.id;
  }

  /**
   * Registers a transcript produced outside the file pipeline (live sessions)
   * as an already completed job.
   */
  public addCompletedLiveJob(input: CompletedJobInput): JobRecord {
    const job: JobRecord = {
      id: randomUUID(),
      createdAt: new Date().toISOString(),
      audioPath: input.audioPath,
      filename: input.filename,
      status: 'completed',
      stage: input.stage ?? 'live',
      progress: 1,
      result: input.result,
      duration: input.result.duration
    };
    this.ledger.add(job);
    console.log(`✅ [Job ${job.id}] Live transcript saved (${input.result.segments.length} segments)`);
    return job;
  }

  /**
   * Advances a `queued` job through its candidate backends.
   * A second call for a job that is already running, or no longer queued, is a no-op.
   */
  public async run(jobId: string): Promise<void> {
    if (this.inFlight.has(jobId)) return;
    const job = this.ledger.get(jobId);
    if (!job || job.status !== 'queued') return;

    const epoch = this.nextEpoch(jobId);
    const controller = new AbortController();
    let release: () => void = () => undefined;
    const released = new Promise<void>(resolve => {
      release = resolve;
    });
    const done = this.execute(jobId, epoch, controller.signal);
    const active: ActiveRun = { controller, done, release };
    this.inFlight.set(jobId, active);

    try {
      await Promise.race([done, released]);
    } finally {
      if (this.inFlight.get(jobId) === active) this.inFlight.delete(jobId);
    }
  }

  /**
   * Re-queues a failed job. Any other status is left untouched.
   */
  public retry(jobId: string): boolean {
    const job = this.ledger.get(jobId);
    if (!job || job.status !== 'failed') return false;

    const epoch = this.nextEpoch(jobId);
    const next = { ...job, status: 'queued' as const, stage: 'queued', progress: 0 };
    delete next.error;
    delete next.result;
    this.write(jobId, epoch, job, next);
    console.log(`🔁 [Job ${jobId}] Re-queued for another attempt`);
    this.scheduler?.schedule(jobId);
    return true;
  }

  /**
   * Stops a queued or running job. Resolves once the job is `cancelled`,
   * which happens when the backend settles or the grace period elapses.
   */
  public cancel(jobId: string): Promise<boolean> {
    const pending = this.cancelling.get(jobId);
    if (pending) return pending;

    const job = this.ledger.get(jobId);
    if (!job || !isCancellable(job.status)) {
      return Promise.resolve(false);
    }

    const task = this.performCancel(jobId).finally(() => this.cancelling.delete(jobId));
    this.cancelling.set(jobId, task);
    return task;
  }

  /**
   * Deletes a job, cancelling it first when it is still running.
   */
  public async removeJob(jobId: string): Promise<boolean> {
    if (this.inFlight.has(jobId) || this.captures.has(jobId) || this.cancelling.has(jobId)) {
      await this.cancel(jobId);
    }

    const existed = this.ledger.get(jobId) !== undefined;
    this.nextEpoch(jobId);
    this.captures.delete(jobId);
    this.ledger.remove(jobId);
    this.epochs.delete(jobId);
    if (existed) {
      console.log(`🗑️  [Job ${jobId}] Removed`);
      this.publish({ type: 'removed', jobId });
    }
    return existed;
  }

  /**
   * Drops records whose audio file is gone. Returns how many were removed.
   */
  public async purgeOrphanedJobs(): Promise<number> {
    let removed = 0;
    for (const job of this.ledger.list()) {
      if (this.inFlight.has(job.id) || this.captures.has(job.id)) continue;
      // Live transcripts saved without audio never referenced a file
      if (!job.audioPath) continue;
      if (await this.deps.files.fileExists(job.audioPath)) continue;
      this.ledger.remove(job.id);
      this.publish({ type: 'removed', jobId: job.id });
      removed++;
    }
    if (removed > 0) console.log(`🧹 [Ledger] Removed ${removed} job(s) whose audio is missing`);
    return removed;
  }

  /**
   * Jobs left active by a process that died cannot resume; they become
   * `failed` so the user can retry them.
   */
  public recoverInterrupted(): number {
    let recovered = 0;
    for (const job of this.ledger.list()) {
      if (this.inFlight.has(job.id)) continue;
      const orphanCapture = job.status === 'queued' && job.captureInProgress === true && !this.captures.has(job.id);
      if (!isActiveStatus(job.status) && !orphanCapture) continue;

      const next: JobRecord = { ...job, status: 'failed', stage: 'error', error: INTERRUPTED_ERROR };
      delete next.captureInProgress;
      delete next.result;
      this.write(job.id, this.nextEpoch(job.id), job, next);
      recovered++;
    }
    if (recovered > 0) console.warn(`⚠️ [Ledger] Marked ${recovered} interrupted job(s) as failed`);
    return recovered;
  }

  /**
   * Startup sequence: purge, recover, then hand every queued job to the drain loop.
   */
  public async start(): Promise<void> {
    await this.purgeOrphanedJobs();
    this.recoverInterrupted();
    for (const job of this.ledger.queued()) {
      this.scheduler?.schedule(job.id);
    }
  }

  public idle(): Promise<void> {
    return this.scheduler ? this.scheduler.idle() : Promise.resolve();
  }

  public async shutdown(): Promise<void> {
    const running = [...this.inFlight.keys()];
    await Promise.all(running.map(id => this.cancel(id)));
    await this.scheduler?.stop();
  }

  // --- Observers ---

  public subscribe(jobId: string, listener: JobEventListener): () => void {
    return this.events.subscribe(listener, jobId);
  }

  public subscribeAll(listener: JobEventListener): () => void {
    return this.events.subscribe(listener);
  }

  public onLedgerChange(listener: LedgerListener): () => void {
    return this.ledger.subscribe(listener);
  }

  public get(jobId: string): JobRecord | undefined {
    return this.ledger.get(jobId);
  }

  public list(): JobRecord[] {
    return this.ledger.list();
  }

  // --- Run loop ---

  private async execute(jobId: string, epoch: number, signal: AbortSignal): Promise<void> {
    try {
      try {
        await this.attemptCandidates(jobId, epoch, signal);
      } catch (error) {
        if (!(error instanceof InputError)) throw error;
        // Bad input is fatal to the job, no other backend is tried
        console.error(`❌ [Job ${jobId}] ${error.message}`);
        this.fail(jobId, epoch, error.message);
      }
    } catch (error) {
      if (error instanceof CancellationError) {
        console.log(`⏹️  [Job ${jobId}] Run stopped`);
        return;
      }
      throw error;
    }
  }

  private async attemptCandidates(jobId: string, epoch: number, signal: AbortSignal): Promise<void> {
    await this.awaitCapture(jobId, epoch, signal);

    const job = this.current(jobId, epoch);
    if (!(await this.deps.files.fileExists(job.audioPath))) {
      throw new InputError(`Audio file not found: ${job.audioPath}`);
    }

    const settings = this.deps.settings.snapshot();
    const candidates = selectStrategies(
      { audioPath: job.audioPath, filename: job.filename, duration: job.duration },
      settings,
      this.deps.connectivity,
      this.deps.catalog
    );

    if (candidates.length === 0) {
      console.warn(`⚠️ [Job ${jobId}] No backend is usable with the current settings`);
      this.fail(jobId, epoch, NO_BACKEND_ERROR);
      return;
    }

    let lastError: unknown;
    for (const [index, strategy] of candidates.entries()) {
      const before = this.current(jobId, epoch);
      this.write(jobId, epoch, before, { ...before, status: 'transcribing', stage: strategy.stage });
      console.log(`⚙️  [Job ${jobId}] Attempt ${index + 1}/${candidates.length} via ${strategy.stage}`);

      try {
        const backend = this.deps.backends.backendFor(strategy);
        const result = await backend.transcribe(
          {
            jobId,
            audioPath: before.audioPath,
            strategy,
            options: decodeOptionsFor(settings, strategy, before)
          },
          fraction => this.reportProgress(jobId, epoch, fraction),
          signal
        );
        this.complete(jobId, epoch, sanitizeResult(result, settings.showTimestamps));
        return;
      } catch (error) {
        if (error instanceof CancellationError || error instanceof InputError) throw error;
        this.assertCurrent(jobId, epoch);
        lastError = error;
        const transient = error instanceof BackendError && error.isTransient ? ' (transient)' : '';
        console.warn(`⚠️ [Job ${jobId}] ${strategy.stage} failed${transient}: ${errorMessage(error)}`);
      }
    }

    this.fail(jobId, epoch, errorMessage(lastError));
  }

  private async awaitCapture(jobId: string, epoch: number, signal: AbortSignal): Promise<void> {
    const capture = this.captures.get(jobId);
    if (!capture) return;

    const queued = this.current(jobId, epoch);
    this.write(jobId, epoch, queued, { ...queued, status: 'recording', stage: 'recording' });
    this.deps.captureStatus?.addRecordingJob(jobId);

    let outcome: CaptureOutcome;
    try {
      outcome = await untilAborted(capture.done, signal, jobId);
    } catch (error) {
      if (error instanceof CancellationError) throw error;
      throw new InputError(`Capture failed: ${errorMessage(error)}`);
    } finally {
      this.captures.delete(jobId);
      this.deps.captureStatus?.removeRecordingJob(jobId);
    }

    const recording = this.current(jobId, epoch);
    const next: JobRecord = { ...recording, audioPath: outcome.audioPath };
    delete next.captureInProgress;
    if (outcome.duration !== undefined) next.duration = outcome.duration;
    this.write(jobId, epoch, recording, next);
  }

  private reportProgress(jobId: string, epoch: number, fraction: number): void {
    if (this.epochs.get(jobId) !== epoch) return;
    const job = this.ledger.get(jobId);
    if (!job || !isActiveStatus(job.status)) return;

    const next = Math.max(job.progress, clampProgress(fraction));
    if (next === job.progress) return;

    if (this.ledger.update({ ...job, progress: next })) {
      this.publish({ type: 'progress', jobId, progress: next });
    }
  }

  private complete(jobId: string, epoch: number, result: TranscriptionResult): void {
    const job = this.current(jobId, epoch);
    const next: JobRecord = { ...job, status: 'completed', stage: 'completed', progress: 1, result };
    delete next.error;
    if (next.duration === undefined && result.duration > 0) next.duration = result.duration;
    this.write(jobId, epoch, job, next);
    console.log(`✅ [Job ${jobId}] Completed (${result.segments.length} segments)`);
  }

  private fail(jobId: string, epoch: number, message: string): void {
    const job = this.current(jobId, epoch);
    const next: JobRecord = { ...job, status: 'failed', stage: 'error', error: message };
    delete next.result;
    this.write(jobId, epoch, job, next);
    console.error(`❌ [Job ${jobId}] Failed: ${message}`);
  }

  private async performCancel(jobId: string): Promise<boolean> {
    const epoch = this.nextEpoch(jobId);
    this.captures.get(jobId)?.stop();

    const active = this.inFlight.get(jobId);
    if (active) {
      active.controller.abort();
      const grace = delay(this.deps.settings.snapshot().cancelGraceMs);
      const settled = Promise.allSettled([active.done]).then(() => 'settled' as const);
      const outcome = await Promise.race([settled, grace.promise.then(() => 'timeout' as const)]);
      grace.cancel();
      if (outcome === 'timeout') {
        console.warn(`⚠️ [Job ${jobId}] Backend did not stop within the grace period, discarding its work`);
        active.done.catch((error: unknown) => {
          console.error(`❌ [Job ${jobId}] Discarded run ended with an error: ${errorMessage(error)}`);
        });
        active.release();
      }
    }

    const job = this.ledger.get(jobId);
    if (!job || !isCancellable(job.status)) return false;
    if (this.epochs.get(jobId) !== epoch) return false;

    const next: JobRecord = { ...job, status: 'cancelled', stage: 'cancelled', error: CANCELLED_ERROR };
    delete next.result;
    delete next.captureInProgress;
    this.write(jobId, epoch, job, next);
    this.captures.delete(jobId);
    console.log(`🛑 [Job ${jobId}] Cancelled`);
    return true;
  }

  // --- Ledger writes ---

  private createQueuedJob(audioPath: string, filename: string, options: EnqueueOptions): JobRecord {
    const job: JobRecord = {
      id: randomUUID(),
      createdAt: new Date().toISOString(),
      audioPath,
      filename,
      status: 'queued',
      stage: 'queued',
      progress: 0
    };
    if (options.sourcePath !== undefined) job.sourcePath = options.sourcePath;
    if (options.duration !== undefined) job.duration = options.duration;
    return job;
  }

  private nextEpoch(jobId: string): number {
    const epoch = (this.epochs.get(jobId) ?? 0) + 1;
    this.epochs.set(jobId, epoch);
    return epoch;
  }

  private assertCurrent(jobId: string, epoch: number): void {
    if (this.epochs.get(jobId) !== epoch) throw new CancellationError(jobId);
  }

  // Latest persisted record, as long as this run still owns the job
  private current(jobId: string, epoch: number): JobRecord {
    this.assertCurrent(jobId, epoch);
    const job = this.ledger.get(jobId);
    if (!job) throw new CancellationError(jobId);
    return job;
  }

  private write(jobId: string, epoch: number, before: JobRecord, next: JobRecord): void {
    this.assertCurrent(jobId, epoch);
    if (next.status !== before.status || isActiveStatus(next.status)) {
      assertTransition(before, next.status);
    }
    if (!this.ledger.update(next)) {
      // Removed underneath us; nothing left to drive
      throw new CancellationError(jobId);
    }
    this.announce(before, next);
  }

  private announce(before: JobRecord, next: JobRecord): void {
    if (before.status !== next.status) {
      this.publish({ type: 'status', job: next, previous: before.status });
    } else if (before.stage !== next.stage) {
      this.publish({ type: 'stage', job: next });
    }
  }

  private publish(event: JobEvent): void {
    this.events.publish(event);
  }
}

export function isCancellable(status: JobStatus): boolean {
  return status === 'queued' || isActiveStatus(status);
}

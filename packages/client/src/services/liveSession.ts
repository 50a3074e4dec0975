import path from 'path';
import { JobRecord, LiveBackend, TranscriptionLanguage, TranscriptionResult } from '@voxqueue/shared';
import { LiveSessionError, errorMessage } from '../domain/errors';
import { ICaptureStatusWriter, IModelCatalog, ISettingsSource, IStreamingEngine, StreamingHandlers } from '../domain/ports';
import { StreamingEngineFactory } from '../streaming';
import { safeBaseName, segmentsFromText, stripTags } from '../utils/transcriptText';
import { selectStreamingBackends } from './backendSelector';
import { ExportService } from './export';
import { CompletedJobInput } from './orchestrator';

export type LiveState = 'idle' | 'streaming' | 'stopped';

export interface LiveSnapshot {
  state: LiveState;
  backend: LiveBackend;         // Preferred backend for the next start
  activeBackend?: LiveBackend;  // Backend that is (or was last) streaming
  finalText: string;
  partialText: string;
  audioPath?: string;
}

export interface LiveSessionDeps {
  createEngine: StreamingEngineFactory;
  catalog: IModelCatalog;
  settings: ISettingsSource;
  jobs: { addCompletedLiveJob(input: CompletedJobInput): JobRecord };
  exporter: ExportService;
  exportDir: () => string;
  captureStatus?: ICaptureStatusWriter;
  now?: () => number;
}

/**
 * Open-ended streaming transcription: idle -> streaming -> stopped -> idle.
 *
 * `finalText` only ever grows. `partialText` is replaced on every hypothesis
 * and cleared whenever text is committed. Callbacks from an engine that has
 * been stopped are ignored through a session generation counter.
 */
export class LiveSessionController {
  private state: LiveState = 'idle';
  private preferred: LiveBackend;
  private active?: LiveBackend;
  private engine?: IStreamingEngine;
  private finalText = '';
  private partialText = '';
  private audioPath?: string;
  private startedAt?: number;
  private endedAt?: number;
  private lastSaveAt?: number;
  private generation = 0;
  private starting = false;
  private stopTask?: Promise<string>;
  private listeners = new Set<(snapshot: LiveSnapshot) => void>();
  private readonly now: () => number;

  constructor(private deps: LiveSessionDeps) {
    this.preferred = deps.settings.snapshot().liveBackend;
    this.now = deps.now ?? Date.now;
  }

  public get backend(): LiveBackend {
    return this.preferred;
  }

  /** Committed text followed by the in-flight hypothesis. */
  public get text(): string {
    return [this.finalText, this.partialText].filter(Boolean).join(' ');
  }

  public snapshot(): LiveSnapshot {
    const snapshot: LiveSnapshot = {
      state: this.state,
      backend: this.preferred,
      finalText: this.finalText,
      partialText: this.partialText
    };
    if (this.active) snapshot.activeBackend = this.active;
    if (this.audioPath) snapshot.audioPath = this.audioPath;
    return snapshot;
  }

  public subscribe(listener: (snapshot: LiveSnapshot) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Engines share no state, so swapping one mid-stream would corrupt the transcript.
   */
  public setBackend(backend: LiveBackend): void {
    if (this.state !== 'idle' || this.starting) {
      throw new LiveSessionError(`Cannot switch live backend while ${this.starting ? 'starting' : this.state}`);
    }
    this.preferred = backend;
    this.emit();
  }

  /**
   * Starts a new session on the first streaming backend that comes up,
   * preferred one first. Resolves with the backend in use.
   */
  public async start(): Promise<LiveBackend> {
    if (this.starting) {
      throw new LiveSessionError('Live session is already starting');
    }
    if (this.state !== 'idle') {
      throw new LiveSessionError(`Live session is already ${this.state}`);
    }

    this.starting = true;
    try {
      return await this.startFirstAvailable();
    } finally {
      this.starting = false;
    }
  }

  private async startFirstAvailable(): Promise<LiveBackend> {
    const settings = this.deps.settings.snapshot();
    const candidates = selectStreamingBackends(this.preferred, this.deps.catalog);
    if (candidates.length === 0) {
      throw new LiveSessionError('No streaming backend available');
    }

    this.finalText = '';
    this.partialText = '';
    this.audioPath = undefined;
    this.endedAt = undefined;
    const generation = ++this.generation;
    const language =
      settings.autoLanguageDetect || settings.language === TranscriptionLanguage.AUTO ? undefined : settings.language;

    let lastError: unknown;
    for (const backend of candidates) {
      const engine = this.deps.createEngine(backend);
      try {
        await engine.start(this.handlersFor(generation), language);
      } catch (error) {
        lastError = error;
        console.warn(`⚠️ [Live] ${backend} could not start: ${errorMessage(error)}`);
        continue;
      }

      this.engine = engine;
      this.active = backend;
      this.state = 'streaming';
      this.startedAt = this.now();
      this.deps.captureStatus?.setLiveStreaming(true);
      console.log(`🔴 [Live] Streaming with ${backend}`);
      this.emit();
      return backend;
    }

    throw new LiveSessionError(`No streaming backend could start: ${errorMessage(lastError)}`);
  }

  /**
   * Commits any partial text, releases the audio tap and returns to idle.
   * Resolves with the final transcript. Calling it while idle is a no-op.
   */
  public stop(): Promise<string> {
    if (this.stopTask) return this.stopTask;
    if (this.state !== 'streaming') return Promise.resolve(this.finalText);

    this.stopTask = this.finishSession().finally(() => {
      this.stopTask = undefined;
    });
    return this.stopTask;
  }

  /**
   * Stores the session as a completed job and writes its exports.
   * Returns undefined when called again within the save interval, or when
   * there is neither text nor audio to keep.
   */
  public async save(title?: string): Promise<JobRecord | undefined> {
    const now = this.now();
    const interval = this.deps.settings.snapshot().liveSaveIntervalMs;
    if (this.lastSaveAt !== undefined && now - this.lastSaveAt < interval) {
      return undefined;
    }

    const text = this.finalText.trim();
    if (!text && !this.audioPath) return undefined;
    this.lastSaveAt = now;

    const end = this.endedAt ?? now;
    const duration = this.startedAt !== undefined ? Math.max(0, (end - this.startedAt) / 1000) : 0;
    const result: TranscriptionResult = {
      text,
      segments: text ? segmentsFromText(text, duration) : [],
      duration
    };

    const filename = title ?? (this.audioPath ? path.basename(this.audioPath) : `Live ${new Date(now).toISOString()}`);
    const job = this.deps.jobs.addCompletedLiveJob({ audioPath: this.audioPath ?? '', filename, result });

    try {
      await this.deps.exporter.writeAll(result, this.deps.exportDir(), safeBaseName(filename));
    } catch (error) {
      // The job is already stored; only the side files are missing
      console.error(`❌ [Live] Failed to write exports: ${errorMessage(error)}`);
    }
    return job;
  }

  private async finishSession(): Promise<string> {
    this.state = 'stopped';
    this.emit();

    const engine = this.engine;
    this.engine = undefined;

    try {
      const captured = await engine?.stop();
      if (captured) this.audioPath = captured;
    } catch (error) {
      console.error(`❌ [Live] Engine did not stop cleanly: ${errorMessage(error)}`);
    } finally {
      // Late callbacks from this engine are dropped from here on
      this.generation++;
      this.commit(this.partialText);
      this.endedAt = this.now();
      this.state = 'idle';
      this.deps.captureStatus?.setLiveStreaming(false);
      console.log('⏹️  [Live] Session stopped');
      this.emit();
    }
    return this.finalText;
  }

  private handlersFor(generation: number): StreamingHandlers {
    const current = () => generation === this.generation;
    return {
      onPartial: text => {
        if (!current()) return;
        this.partialText = stripTags(text).trim();
        this.emit();
      },
      onFinal: text => {
        if (!current()) return;
        this.commit(text);
        this.emit();
      },
      onError: (error, fatal) => {
        if (!current()) return;
        console.error(`❌ [Live] ${error.message}`);
        if (fatal) this.endFromEngine();
      },
      onStop: () => {
        if (!current()) return;
        this.endFromEngine();
      },
      onAudioCaptureStarted: audioPath => {
        if (!current()) return;
        this.audioPath = audioPath;
      }
    };
  }

  // The engine ended on its own; run the normal stop path
  private endFromEngine(): void {
    this.stop().catch((error: unknown) => {
      console.error(`❌ [Live] Failed to stop after engine exit: ${errorMessage(error)}`);
    });
  }

  private commit(text: string): void {
    const clean = stripTags(text).trim();
    this.partialText = '';
    if (!clean) return;
    this.finalText = this.finalText ? `${this.finalText} ${clean}` : clean;
  }

  private emit(): void {
    const snapshot = this.snapshot();
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        console.error('❌ [Live] Listener failed:', errorMessage(error));
      }
    }
  }
}

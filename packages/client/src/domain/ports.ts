import { JobRecord, LiveBackend, TranscriptionResult } from '@voxqueue/shared';
import { BackendRequest, CaptureStatusValue, Strategy } from './models';
import { SettingsSnapshot } from './configs';

export type LedgerListener = (jobs: readonly JobRecord[]) => void;

export interface IJobLedger {
  /** Inserts a new record. Throws LedgerError when the id is already present. */
  add(job: JobRecord): void;
  /** Replaces the record with the same id. Returns false when it no longer exists. */
  update(job: JobRecord): boolean;
  remove(id: string): void;
  get(id: string): JobRecord | undefined;
  list(): JobRecord[];
  queued(): JobRecord[];
  running(): JobRecord[];
  completed(): JobRecord[];
  failed(): JobRecord[];
  subscribe(listener: LedgerListener): () => void;
}

export type ProgressHandler = (fraction: number) => void;

/**
 * One execution path. Reports progress in [0, 1] through `onProgress`,
 * then settles exactly once. Must stop promptly once `signal` aborts.
 */
export interface ITranscriptionBackend {
  transcribe(request: BackendRequest, onProgress: ProgressHandler, signal: AbortSignal): Promise<TranscriptionResult>;
}

export interface IBackendFactory {
  backendFor(strategy: Strategy): ITranscriptionBackend;
}

export interface IModelCatalog {
  isAvailable(modelId: string): boolean;
  checksum(modelId: string): string | undefined;
}

export interface IModelLocator {
  pathFor(modelId: string): string;
}

export interface IConnectivity {
  hasActiveConnection(): boolean;
}

export interface ISettingsSource {
  snapshot(): SettingsSnapshot;
}

export interface IJobScheduler {
  schedule(jobId: string): void;
  /** Resolves once no scheduled run is pending or in flight. */
  idle(): Promise<void>;
  stop(): Promise<void>;
}

export interface IFileManager {
  writeFile(filePath: string, content: string): Promise<void>;
  copyFile(from: string, to: string): Promise<void>;
  fileExists(filePath: string): Promise<boolean>;
  joinPaths(...parts: string[]): string;
}

export interface StreamingHandlers {
  onPartial(text: string): void;
  onFinal(text: string): void;
  onError(error: Error, fatal: boolean): void;
  onStop(): void;
  onAudioCaptureStarted(audioPath: string): void;
}

export interface IStreamingEngine {
  readonly backend: LiveBackend;
  start(handlers: StreamingHandlers, language?: string): Promise<void>;
  /** Releases the audio tap. Resolves with the captured audio file, if any. */
  stop(): Promise<string | undefined>;
}

export interface ICaptureStatusReader {
  get(): CaptureStatusValue;
  subscribe(listener: (value: CaptureStatusValue) => void): () => void;
}

export interface ICaptureStatusWriter extends ICaptureStatusReader {
  setLiveStreaming(active: boolean): void;
  addRecordingJob(jobId: string): void;
  removeRecordingJob(jobId: string): void;
}

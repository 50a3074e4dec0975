import { CloudProvider, JobRecord, JobStatus, TranscriptionLanguage } from '@voxqueue/shared';

export type LocalStrategy = { kind: 'local'; stage: 'local'; modelId: string };
export type CloudStrategy = {
  kind: 'cloud';
  stage: 'cloud-openai' | 'cloud-gemini';
  provider: CloudProvider.OPENAI | CloudProvider.GEMINI;
};
export type FallbackStrategy = { kind: 'fallback'; stage: 'fallback'; modelId: string };

export type Strategy = LocalStrategy | CloudStrategy | FallbackStrategy;

// What the selector needs to know about a job. Ordering never depends on it.
export interface JobInput {
  audioPath: string;
  filename: string;
  duration?: number;
}

export interface DecodeOptions {
  language?: TranscriptionLanguage;
  translate: boolean;
  temperature?: number;
  beamSize?: number;
  preserveTimestamps: boolean;
  durationEstimate?: number;
}

export interface BackendRequest {
  jobId: string;
  audioPath: string;
  strategy: Strategy;
  options: DecodeOptions;
}

export interface CaptureOutcome {
  audioPath: string;
  duration?: number;
}

/**
 * Audio that is still being recorded when its job is enqueued.
 * `done` settles when the recorder releases the file.
 */
export interface CaptureHandle {
  done: Promise<CaptureOutcome>;
  stop(): void;
}

export type JobEvent =
  | { type: 'status'; job: JobRecord; previous: JobStatus }
  | { type: 'stage'; job: JobRecord }
  | { type: 'progress'; jobId: string; progress: number }
  | { type: 'removed'; jobId: string };

export interface CaptureStatusValue {
  liveStreaming: boolean;
  recordingJobIds: readonly string[];
}

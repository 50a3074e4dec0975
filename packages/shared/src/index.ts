export type JobStatus = 'queued' | 'recording' | 'transcribing' | 'completed' | 'failed' | 'cancelled';

export const JOB_STATUSES: readonly JobStatus[] = [
  'queued',
  'recording',
  'transcribing',
  'completed',
  'failed',
  'cancelled'
];

export const ACTIVE_STATUSES: readonly JobStatus[] = ['recording', 'transcribing'];
export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled'];

export enum CloudProvider {
  NONE = 'none',
  OPENAI = 'openai',
  GEMINI = 'gemini'
}

// Execution strategies the Backend Selector can hand to the Orchestrator
export type StrategyKind = 'local' | 'cloud' | 'fallback';

export enum LiveBackend {
  NATIVE = 'native',              // Platform speech recognizer, no model needed
  WHISPER_TINY = 'whisper-tiny',
  WHISPER_BASE = 'whisper-base'
}

export enum TranscriptionLanguage {
  AUTO = 'auto',
  ENGLISH = 'en',
  PORTUGUESE = 'pt',
  SPANISH = 'es'
}

export enum ExportFormat {
  TEXT = 'txt',
  JSON = 'json',
  SRT = 'srt',
  VTT = 'vtt'
}

export interface TranscriptionSegment {
  start: number; // seconds
  end: number;   // seconds
  text: string;
}

export interface TranscriptionResult {
  text: string;
  segments: TranscriptionSegment[];
  language?: string;
  duration: number; // seconds
}

// One transcription request and its lifecycle state
export interface JobRecord {
  readonly id: string;
  readonly createdAt: string; // ISO format
  audioPath: string;
  filename: string;
  sourcePath?: string;
  status: JobStatus;
  stage?: string;
  progress: number;
  error?: string;
  result?: TranscriptionResult;
  duration?: number;
  captureInProgress?: boolean;
}

// What the HTTP surface returns for a job: local file paths stay on the server
export type JobView = Omit<JobRecord, 'audioPath' | 'sourcePath'>;

export type JobSummary = Pick<JobRecord, 'id' | 'createdAt' | 'filename' | 'status' | 'stage' | 'progress' | 'error'>;

// Standardized API Responses
export interface EnqueueResponse {
  success: boolean;
  jobId: string;
  message: string;
}

export interface ErrorResponse {
  error: string;
}

export function isActiveStatus(status: JobStatus): boolean {
  return ACTIVE_STATUSES.includes(status);
}

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

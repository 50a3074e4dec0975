import { CloudProvider, LiveBackend, TranscriptionLanguage } from '@voxqueue/shared';

export interface PathConfig {
  data: string;   // Ledger file and imported recordings
  models: string; // Downloaded/bundled model files and manifest.json
}

export interface LocalEngineConfig {
  command: string; // whisper.cpp compatible CLI
}

export interface LiveConfig {
  nativeCommand: string;  // Platform speech recognizer bridge
  whisperCommand: string; // whisper.cpp compatible streaming CLI
}

export interface AppSettings {
  selectedModel: string;
  fallbackModel: string;
  cloudProvider: CloudProvider;
  openAIAPIKey: string;
  geminiAPIKey: string;
  enableCloudFallback: boolean;
  offlineMode: boolean;
  liveBackend: LiveBackend;
  autoLanguageDetect: boolean;
  language: TranscriptionLanguage;
  translate: boolean;
  temperature: number;
  beamSize: number;
  showTimestamps: boolean;
  cancelGraceMs: number;
  liveSaveIntervalMs: number;
  concurrency: number;
  paths: PathConfig;
  localEngine: LocalEngineConfig;
  live: LiveConfig;
}

/**
 * Immutable view of the settings taken at the start of a run.
 * The selector and the orchestrator never read the live store directly.
 */
export type SettingsSnapshot = Readonly<Omit<AppSettings, 'paths' | 'localEngine' | 'live'>> & {
  readonly paths: Readonly<PathConfig>;
  readonly localEngine: Readonly<LocalEngineConfig>;
  readonly live: Readonly<LiveConfig>;
};

import Conf from 'conf';
import os from 'os';
import path from 'path';
import { CloudProvider, LiveBackend, TranscriptionLanguage } from '@voxqueue/shared';
import { AppSettings, PathConfig, SettingsSnapshot } from '../domain/configs';
import { ISettingsSource } from '../domain/ports';
import { DEFAULT_FALLBACK_MODEL_ID, DEFAULT_MODEL_ID } from '../domain/whisperModels';

const APP_HOME = path.join(os.homedir(), '.voxqueue');

export function defaultSettings(): AppSettings {
  return {
    selectedModel: DEFAULT_MODEL_ID,
    fallbackModel: DEFAULT_FALLBACK_MODEL_ID,
    cloudProvider: CloudProvider.NONE,
    openAIAPIKey: '',
    geminiAPIKey: '',
    enableCloudFallback: false,
    offlineMode: false,
    liveBackend: LiveBackend.NATIVE,
    autoLanguageDetect: true,
    language: TranscriptionLanguage.AUTO,
    translate: false,
    temperature: 0,
    beamSize: 5,
    showTimestamps: false,
    cancelGraceMs: 5000,
    liveSaveIntervalMs: 1500,
    concurrency: 1,
    paths: {
      data: path.join(APP_HOME, 'data'),
      models: path.join(APP_HOME, 'models')
    },
    localEngine: {
      command: 'whisper-cli'
    },
    live: {
      nativeCommand: 'voxqueue-speech',
      whisperCommand: 'whisper-stream'
    }
  };
}

export interface ConfigServiceOptions {
  cwd?: string;        // Overrides the per-user config directory (tests, portable installs)
  configName?: string;
}

export class ConfigService implements ISettingsSource {
  private conf: Conf<AppSettings>;

  constructor(options: ConfigServiceOptions = {}) {
    this.conf = new Conf<AppSettings>({
      projectName: 'voxqueue',
      cwd: options.cwd,
      configName: options.configName,
      defaults: defaultSettings()
    });
  }

  get<K extends keyof AppSettings>(key: K): AppSettings[K] {
    return this.conf.get(key);
  }

  set<K extends keyof AppSettings>(key: K, value: AppSettings[K]): void {
    this.conf.set(key, value);
  }

  setPath(key: keyof PathConfig, value: string): void {
    const currentPaths = this.get('paths');
    this.set('paths', { ...currentPaths, [key]: path.normalize(value) });
  }

  getAll(): AppSettings {
    return this.conf.store;
  }

  reset(): void {
    this.conf.clear();
  }

  hasCloudCredential(): boolean {
    const c = this.getAll();
    switch (c.cloudProvider) {
      case CloudProvider.OPENAI:
        return c.openAIAPIKey.trim().length > 0;
      case CloudProvider.GEMINI:
        return c.geminiAPIKey.trim().length > 0;
      default:
        return false;
    }
  }

  /**
   * Frozen copy of the current settings. Nested groups are merged over the
   * defaults so a hand-edited file missing a sub-key still yields a full shape.
   */
  snapshot(): SettingsSnapshot {
    const defaults = defaultSettings();
    const stored = this.getAll();
    return Object.freeze({
      ...defaults,
      ...stored,
      paths: Object.freeze({ ...defaults.paths, ...stored.paths }),
      localEngine: Object.freeze({ ...defaults.localEngine, ...stored.localEngine }),
      live: Object.freeze({ ...defaults.live, ...stored.live })
    });
  }

  get path(): string {
    return this.conf.path;
  }
}

import { LiveBackend } from '@voxqueue/shared';

export interface WhisperModel {
  id: string;
  displayName: string;
  fileName: string;
  size: string;
  checksum: string | null; // Expected manifest checksum, null when unknown
  languageSupport: string[];
}

export const WHISPER_MODELS: readonly WhisperModel[] = [
  {
    id: 'whisper-tiny-en',
    displayName: 'Tiny (English)',
    fileName: 'ggml-tiny.en.bin',
    size: '75MB',
    checksum: null,
    languageSupport: ['en']
  },
  {
    id: 'whisper-base-en',
    displayName: 'Base (English)',
    fileName: 'ggml-base.en.bin',
    size: '142MB',
    checksum: null,
    languageSupport: ['en']
  },
  {
    id: 'whisper-small-en',
    displayName: 'Small (English)',
    fileName: 'ggml-small.en.bin',
    size: '466MB',
    checksum: null,
    languageSupport: ['en']
  }
];

export const DEFAULT_MODEL_ID = 'whisper-small-en';
export const DEFAULT_FALLBACK_MODEL_ID = 'whisper-tiny-en';

export function findModel(modelId: string): WhisperModel | undefined {
  return WHISPER_MODELS.find(m => m.id === modelId);
}

// Streaming backends that run a Whisper model need it on disk
export function requiredModelFor(backend: LiveBackend): string | undefined {
  switch (backend) {
    case LiveBackend.NATIVE:
      return undefined;
    case LiveBackend.WHISPER_TINY:
      return 'whisper-tiny-en';
    case LiveBackend.WHISPER_BASE:
      return 'whisper-base-en';
  }
}

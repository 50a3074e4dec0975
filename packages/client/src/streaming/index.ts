import path from 'path';
import { LiveBackend } from '@voxqueue/shared';
import { IModelLocator, ISettingsSource, IStreamingEngine } from '../domain/ports';
import { requiredModelFor } from '../domain/whisperModels';
import { CommandStreamingEngine } from './commandStreamingEngine';

export * from './commandStreamingEngine';

export type StreamingEngineFactory = (backend: LiveBackend) => IStreamingEngine;

/**
 * Builds a fresh engine per session. The native recognizer records the audio
 * it hears into `recordingsDir`; the whisper streamers only emit text.
 */
export function createStreamingEngineFactory(
  settings: ISettingsSource,
  models: IModelLocator,
  recordingsDir: () => string
): StreamingEngineFactory {
  return backend => {
    const { live } = settings.snapshot();
    const modelId = requiredModelFor(backend);

    if (modelId === undefined) {
      const audioPath = path.join(recordingsDir(), `live-${Date.now()}.wav`);
      return new CommandStreamingEngine({
        backend,
        command: live.nativeCommand,
        audioPath,
        args: language => [
          '--partial-results',
          '--audio-out', audioPath,
          ...(language ? ['--language', language] : [])
        ]
      });
    }

    const modelPath = models.pathFor(modelId);
    return new CommandStreamingEngine({
      backend,
      command: live.whisperCommand,
      args: language => ['-m', modelPath, '-l', language ?? 'auto', '--step', '500', '--length', '5000']
    });
  };
}

import { CloudProvider } from '@voxqueue/shared';
import { Strategy } from '../../domain/models';
import { IBackendFactory, ITranscriptionBackend } from '../../domain/ports';

export * from './localWhisper';
export * from './openai';
export * from './gemini';

export interface BackendSet {
  local: ITranscriptionBackend; // Serves both the local and the reduced fallback strategy
  openai: ITranscriptionBackend;
  gemini: ITranscriptionBackend;
}

export class BackendFactory implements IBackendFactory {
  constructor(private backends: BackendSet) { }

  public backendFor(strategy: Strategy): ITranscriptionBackend {
    switch (strategy.kind) {
      case 'local':
      case 'fallback':
        return this.backends.local;
      case 'cloud':
        return strategy.provider === CloudProvider.OPENAI ? this.backends.openai : this.backends.gemini;
    }
  }
}

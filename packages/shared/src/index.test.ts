import { describe, it, expect } from 'vitest';
import { ExportFormat, LiveBackend, TranscriptionLanguage, isActiveStatus, isTerminalStatus } from './index';

describe('Shared Definitions', () => {
  it('should have correct language codes', () => {
    expect(TranscriptionLanguage.ENGLISH).toBe('en');
    expect(TranscriptionLanguage.PORTUGUESE).toBe('pt');
  });

  it('should use file extensions as export format values', () => {
    expect(Object.values(ExportFormat)).toEqual(['txt', 'json', 'srt', 'vtt']);
  });

  it('should expose the live backends by their persisted identifiers', () => {
    expect(LiveBackend.NATIVE).toBe('native');
    expect(LiveBackend.WHISPER_BASE).toBe('whisper-base');
  });

  it('should classify statuses as active or terminal', () => {
    expect(isActiveStatus('transcribing')).toBe(true);
    expect(isActiveStatus('queued')).toBe(false);
    expect(isTerminalStatus('cancelled')).toBe(true);
    expect(isTerminalStatus('recording')).toBe(false);
  });
});

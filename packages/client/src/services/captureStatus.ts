import { CaptureStatusValue } from '../domain/models';
import { ICaptureStatusWriter } from '../domain/ports';
import { errorMessage } from '../domain/errors';

const IDLE: CaptureStatusValue = Object.freeze({ liveStreaming: false, recordingJobIds: Object.freeze([]) });

/**
 * Process-wide "something is capturing audio" value.
 * Created once by the composition root. Readers get the reader view, only the
 * orchestrator and the live session controller are handed the writer.
 */
export class CaptureStatus implements ICaptureStatusWriter {
  private value: CaptureStatusValue = IDLE;
  private listeners = new Set<(value: CaptureStatusValue) => void>();

  get(): CaptureStatusValue {
    return this.value;
  }

  subscribe(listener: (value: CaptureStatusValue) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setLiveStreaming(active: boolean): void {
    if (this.value.liveStreaming === active) return;
    this.emit({ ...this.value, liveStreaming: active });
  }

  addRecordingJob(jobId: string): void {
    if (this.value.recordingJobIds.includes(jobId)) return;
    this.emit({ ...this.value, recordingJobIds: [...this.value.recordingJobIds, jobId] });
  }

  removeRecordingJob(jobId: string): void {
    if (!this.value.recordingJobIds.includes(jobId)) return;
    this.emit({ ...this.value, recordingJobIds: this.value.recordingJobIds.filter(id => id !== jobId) });
  }

  reset(): void {
    if (this.value === IDLE) return;
    this.emit(IDLE);
  }

  private emit(next: CaptureStatusValue): void {
    this.value = Object.freeze(next);
    for (const listener of this.listeners) {
      try {
        listener(this.value);
      } catch (error) {
        console.error('❌ [Capture] Listener failed:', errorMessage(error));
      }
    }
  }
}

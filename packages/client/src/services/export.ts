import { ExportFormat, TranscriptionResult } from '@voxqueue/shared';
import { IFileManager } from '../domain/ports';

export interface ExportPayload {
  content: string;
  filename: string;
  mimeType: string;
}

const MIME_TYPES: Record<ExportFormat, string> = {
  [ExportFormat.TEXT]: 'text/plain',
  [ExportFormat.JSON]: 'application/json',
  [ExportFormat.SRT]: 'application/x-subrip',
  [ExportFormat.VTT]: 'text/vtt'
};

export const ALL_EXPORT_FORMATS: readonly ExportFormat[] = [
  ExportFormat.TEXT,
  ExportFormat.JSON,
  ExportFormat.SRT,
  ExportFormat.VTT
];

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

// HH:MM:SS<sep>mmm
export function formatTimestamp(seconds: number, separator: ',' | '.'): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const secs = Math.floor((totalMs % 60_000) / 1000);
  const ms = totalMs % 1000;
  return `${pad(hours)}:${pad(minutes)}:${pad(secs)}${separator}${pad(ms, 3)}`;
}

export class ExportService {
  constructor(private fs?: Pick<IFileManager, 'writeFile' | 'joinPaths'>) { }

  public export(result: TranscriptionResult, format: ExportFormat, basename = 'transcript'): ExportPayload {
    return {
      content: this.render(result, format),
      filename: `${basename}.${format}`,
      mimeType: MIME_TYPES[format]
    };
  }

  /**
   * Writes one file per format into `dir`. Returns the written paths.
   */
  public async writeAll(
    result: TranscriptionResult,
    dir: string,
    basename: string,
    formats: readonly ExportFormat[] = ALL_EXPORT_FORMATS
  ): Promise<string[]> {
    if (!this.fs) throw new Error('ExportService was created without a file system');

    const written: string[] = [];
    for (const format of formats) {
      const payload = this.export(result, format, basename);
      const target = this.fs.joinPaths(dir, payload.filename);
      await this.fs.writeFile(target, payload.content);
      written.push(target);
    }
    return written;
  }

  private render(result: TranscriptionResult, format: ExportFormat): string {
    switch (format) {
      case ExportFormat.TEXT:
        return result.segments.map(s => s.text).join(' ');
      case ExportFormat.JSON:
        return JSON.stringify(result, null, 2);
      case ExportFormat.SRT:
        return result.segments
          .map((s, i) => `${i + 1}\n${formatTimestamp(s.start, ',')} --> ${formatTimestamp(s.end, ',')}\n${s.text}\n`)
          .join('\n');
      case ExportFormat.VTT:
        return ['WEBVTT', '', ...result.segments.map(s =>
          `${formatTimestamp(s.start, '.')} --> ${formatTimestamp(s.end, '.')}\n${s.text}\n`
        )].join('\n');
    }
  }
}

import { TranscriptionResult, TranscriptionSegment } from '@voxqueue/shared';

const SPECIAL_TOKEN = /<\|[^|>]*\|>/g;          // <|startoftranscript|>, <|0.00|>
const LEADING_BRACKET = /^\s*\[[^\]]*\]\s*/;    // [ 0m0s118ms - 0m3s918ms ]
const PARENTHETICAL = /\([^)]*\)/g;             // (Engine sounds)

/**
 * Removes decoder markers and non-speech cues from backend output.
 * With `preserveTimestamps` the text is returned untouched.
 */
export function sanitizeTranscript(text: string, preserveTimestamps = false): string {
  if (preserveTimestamps || !text) return text;

  const lines = text
    .replace(SPECIAL_TOKEN, '')
    .split(/\r?\n/)
    .map(line => {
      const withoutRange = line.replace(LEADING_BRACKET, '');
      const trimmed = withoutRange.trim();
      // A line that is only a cue is dropped entirely
      if (trimmed.startsWith('(') && trimmed.endsWith(')')) return '';
      return withoutRange.replace(PARENTHETICAL, '').trim();
    })
    .filter(line => line.length > 0);

  return lines.join('\n').replace(/\s+/g, ' ').trim();
}

export function sanitizeResult(result: TranscriptionResult, preserveTimestamps = false): TranscriptionResult {
  if (preserveTimestamps) return result;
  return {
    ...result,
    text: sanitizeTranscript(result.text),
    segments: result.segments
      .map(segment => ({ ...segment, text: sanitizeTranscript(segment.text) }))
      .filter(segment => segment.text.length > 0)
  };
}

// Live engines wrap words in markup such as <b> or <i>
export function stripTags(text: string): string {
  return text.replace(/<[^>]*>/g, '');
}

export function splitSentences(text: string): string[] {
  const matches = text.match(/[^.!?]+[.!?]*/g) ?? [];
  return matches.map(s => s.trim()).filter(s => /[^.!?\s]/.test(s));
}

/**
 * Spreads sentences evenly across `duration`.
 * Text without any sentence yields one segment covering the whole duration.
 */
export function segmentsFromText(text: string, duration: number): TranscriptionSegment[] {
  const sentences = splitSentences(text);
  if (sentences.length === 0) {
    return [{ start: 0, end: duration, text }];
  }

  const slice = duration / sentences.length;
  return sentences.map((sentence, index) => {
    const start = index * slice;
    return { start, end: Math.min(start + slice, duration), text: sentence };
  });
}

/**
 * Filesystem-safe base name: spaces become underscores, punctuation is dropped.
 */
export function safeBaseName(filename: string): string {
  const withoutExtension = filename.replace(/\.[^/.]+$/, '');
  const cleaned = withoutExtension
    .replace(/&/g, 'and')
    .replace(/@/g, 'at')
    .replace(/\+/g, 'plus')
    .replace(/[\s/]+/g, '_')
    .replace(/[^A-Za-z0-9_-]/g, '')
    .slice(0, 100);
  return cleaned || 'transcript';
}

import { describe, it, expect } from 'vitest';
import {
    safeBaseName,
    sanitizeResult,
    sanitizeTranscript,
    segmentsFromText,
    splitSentences,
    stripTags
} from '../../src/utils/transcriptText';

describe('sanitizeTranscript()', () => {
    it('should remove special tokens and timestamp markers', () => {
        const raw = '<|startoftranscript|><|0.00|> Hello there.<|2.50|>';

        expect(sanitizeTranscript(raw)).toBe('Hello there.');
    });

    it('should drop leading bracketed ranges but keep the spoken text', () => {
        const raw = '[ 0m0s118ms - 0m3s918ms ] First line\n[ 0m4s000ms - 0m6s000ms ] Second line';

        expect(sanitizeTranscript(raw)).toBe('First line Second line');
    });

    it('should drop cue-only lines and inline parenthetical cues', () => {
        const raw = '(Engine sounds)\nWe start (laughs) now';

        expect(sanitizeTranscript(raw)).toBe('We start now');
    });

    it('should return the text untouched when timestamps are preserved', () => {
        const raw = '[00:00.000 --> 00:01.000] (music) Hi';

        expect(sanitizeTranscript(raw, true)).toBe(raw);
    });
});

describe('sanitizeResult()', () => {
    it('should clean the text and every segment, dropping emptied segments', () => {
        const result = sanitizeResult({
            text: '<|0.00|> Hi (cough) there',
            segments: [
                { start: 0, end: 1, text: 'Hi (cough) there' },
                { start: 1, end: 2, text: '(silence)' }
            ],
            duration: 2
        });

        expect(result).toEqual({
            text: 'Hi there',
            segments: [{ start: 0, end: 1, text: 'Hi there' }],
            duration: 2
        });
    });
});

describe('stripTags()', () => {
    it('should remove markup around live words', () => {
        expect(stripTags('<b>hello</b> <i>world</i>')).toBe('hello world');
    });
});

describe('splitSentences() / segmentsFromText()', () => {
    it('should keep sentence punctuation', () => {
        expect(splitSentences('One. Two! Three?')).toEqual(['One.', 'Two!', 'Three?']);
    });

    it('should spread sentences evenly over the duration', () => {
        expect(segmentsFromText('Good morning. Let us begin.', 10)).toEqual([
            { start: 0, end: 5, text: 'Good morning.' },
            { start: 5, end: 10, text: 'Let us begin.' }
        ]);
    });

    it('should fall back to a single segment when there is no sentence', () => {
        expect(segmentsFromText('...', 4)).toEqual([{ start: 0, end: 4, text: '...' }]);
    });
});

describe('safeBaseName()', () => {
    it('should strip the extension and unsafe characters', () => {
        expect(safeBaseName('Team Sync (Q3) & Plans.m4a')).toBe('Team_Sync_Q3_and_Plans');
    });

    it('should fall back to a default name', () => {
        expect(safeBaseName('???.wav')).toBe('transcript');
    });
});

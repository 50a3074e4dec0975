import { GenerateContentParameters, GoogleGenAI } from '@google/genai';
import fsPromises from 'fs/promises';
import path from 'path';
import { TranscriptionResult } from '@voxqueue/shared';
import { BackendError, CancellationError, InputError, errorMessage } from '../../domain/errors';
import { BackendRequest } from '../../domain/models';
import { ISettingsSource, ITranscriptionBackend, ProgressHandler } from '../../domain/ports';

const MIME_TYPES: Record<string, string> = {
  '.wav': 'audio/wav',
  '.mp3': 'audio/mp3',
  '.m4a': 'audio/aac',
  '.aac': 'audio/aac',
  '.ogg': 'audio/ogg',
  '.opus': 'audio/ogg',
  '.flac': 'audio/flac',
  '.aiff': 'audio/aiff'
};

const TRANSCRIBE_PROMPT =
  'Transcribe this audio verbatim. Return only the spoken words as plain text, without timestamps, speaker labels or commentary.';
const TRANSLATE_PROMPT =
  'Transcribe this audio and translate it into English. Return only the English text, without timestamps, speaker labels or commentary.';

// The slice of the SDK client this backend calls
export interface GenAIClient {
  models: {
    generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
  };
}

export type GenAIFactory = (apiKey: string) => GenAIClient;

/**
 * Gemini has no segment timing, so the result is one segment spanning the
 * duration estimate.
 */
export class GeminiBackend implements ITranscriptionBackend {
  private modelId = 'gemini-2.5-flash';

  constructor(
    private settings: ISettingsSource,
    private createClient: GenAIFactory = apiKey => new GoogleGenAI({ apiKey })
  ) { }

  public async transcribe(
    request: BackendRequest,
    onProgress: ProgressHandler,
    signal: AbortSignal
  ): Promise<TranscriptionResult> {
    const apiKey = this.settings.snapshot().geminiAPIKey.trim();
    if (!apiKey) {
      throw new BackendError('Gemini API key is not configured', 'gemini', false, 401);
    }

    let audio: Buffer;
    try {
      audio = await fsPromises.readFile(request.audioPath);
    } catch (error) {
      throw new InputError(`Audio file not readable: ${errorMessage(error)}`);
    }
    onProgress(0.2);

    const mimeType = MIME_TYPES[path.extname(request.audioPath).toLowerCase()] ?? 'audio/wav';
    const prompt = request.options.translate ? TRANSLATE_PROMPT : TRANSCRIBE_PROMPT;
    console.log(`🧠 [Job ${request.jobId}] Sending audio to Gemini...`);

    let text: string | undefined;
    try {
      const response = await this.createClient(apiKey).models.generateContent({
        model: this.modelId,
        contents: [
          {
            role: 'user',
            parts: [
              { inlineData: { mimeType, data: audio.toString('base64') } },
              { text: prompt }
            ]
          }
        ],
        config: {
          abortSignal: signal,
          temperature: request.options.temperature
        }
      });
      text = response.text;
    } catch (error) {
      if (signal.aborted) throw new CancellationError(request.jobId);
      throw new BackendError(`Gemini: ${errorMessage(error)}`, 'gemini', true);
    }

    if (!text || !text.trim()) {
      throw new BackendError('No text returned from Gemini API', 'gemini', false);
    }
    onProgress(1);

    const trimmed = text.trim();
    const duration = request.options.durationEstimate ?? 0;
    return {
      text: trimmed,
      segments: [{ start: 0, end: duration, text: trimmed }],
      duration
    };
  }
}

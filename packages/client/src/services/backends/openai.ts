import axios, { AxiosError, AxiosInstance } from 'axios';
import fs from 'fs';
import FormData from 'form-data';
import { z } from 'zod';
import { TranscriptionResult } from '@voxqueue/shared';
import { BackendError, CancellationError, InputError } from '../../domain/errors';
import { BackendRequest } from '../../domain/models';
import { ISettingsSource, ITranscriptionBackend, ProgressHandler } from '../../domain/ports';

const OPENAI_BASE_URL = 'https://api.openai.com/v1';
const WHISPER_MODEL = 'whisper-1';

const verboseJsonSchema = z.object({
  text: z.string(),
  language: z.string().optional(),
  duration: z.number().optional(),
  segments: z
    .array(z.object({ start: z.number(), end: z.number(), text: z.string() }))
    .optional()
});

const errorBodySchema = z.object({ error: z.object({ message: z.string() }) });

export class OpenAIBackend implements ITranscriptionBackend {
  private readonly client: AxiosInstance;

  constructor(private settings: ISettingsSource, client?: AxiosInstance) {
    this.client = client ?? axios.create({
      baseURL: OPENAI_BASE_URL,
      timeout: 0, // Long recordings take as long as they need
      maxContentLength: Infinity,
      maxBodyLength: Infinity
    });
  }

  public async transcribe(
    request: BackendRequest,
    onProgress: ProgressHandler,
    signal: AbortSignal
  ): Promise<TranscriptionResult> {
    const apiKey = this.settings.snapshot().openAIAPIKey.trim();
    if (!apiKey) {
      throw new BackendError('OpenAI API key is not configured', 'openai', false, 401);
    }
    if (!fs.existsSync(request.audioPath)) {
      throw new InputError(`Audio file not found: ${request.audioPath}`);
    }

    const { options } = request;
    const form = new FormData();
    form.append('file', fs.createReadStream(request.audioPath));
    form.append('model', WHISPER_MODEL);
    form.append('response_format', 'verbose_json');
    if (!options.translate) {
      form.append('timestamp_granularities[]', 'segment');
      if (options.language) form.append('language', options.language);
    }
    if (options.temperature !== undefined) form.append('temperature', String(options.temperature));

    const endpoint = options.translate ? '/audio/translations' : '/audio/transcriptions';

    try {
      const response = await this.client.post<unknown>(endpoint, form, {
        headers: {
          ...form.getHeaders(),
          Authorization: `Bearer ${apiKey}`
        },
        signal,
        onUploadProgress: (progressEvent) => {
          // Upload is the only phase we can observe; it covers the first half
          if (progressEvent.total) {
            onProgress((progressEvent.loaded / progressEvent.total) * 0.5);
          }
        }
      });

      const body = verboseJsonSchema.safeParse(response.data);
      if (!body.success) {
        throw new BackendError('Unexpected response from OpenAI', 'openai', false, response.status);
      }
      onProgress(1);
      return this.toResult(body.data, options.durationEstimate);
    } catch (error) {
      throw this.formatError(error, request.jobId);
    }
  }

  private toResult(body: z.output<typeof verboseJsonSchema>, durationEstimate?: number): TranscriptionResult {
    const duration = body.duration ?? durationEstimate ?? 0;
    const segments = body.segments?.length
      ? body.segments.map(s => ({ start: s.start, end: s.end, text: s.text.trim() }))
      : [{ start: 0, end: duration, text: body.text.trim() }];

    const result: TranscriptionResult = { text: body.text.trim(), segments, duration };
    if (body.language) result.language = body.language;
    return result;
  }

  // Translates raw Axios errors into our domain BackendError
  private formatError(error: unknown, jobId: string): Error {
    if (error instanceof BackendError || error instanceof InputError) return error;
    if (axios.isCancel(error)) return new CancellationError(jobId);

    if (axios.isAxiosError(error)) {
      const axiosError: AxiosError = error;
      const statusCode = axiosError.response?.status;
      const body = errorBodySchema.safeParse(axiosError.response?.data);
      const msg = body.success ? body.data.error.message : axiosError.message;

      // Network errors and 5xx may succeed later; 4xx (bad key, bad file) will not
      const isTransient = !statusCode || statusCode >= 500 || ['ECONNREFUSED', 'ECONNRESET'].includes(axiosError.code || '');

      return new BackendError(`OpenAI: ${msg}`, 'openai', isTransient, statusCode);
    }

    if (error instanceof Error) return new BackendError(`OpenAI: ${error.message}`, 'openai', true);
    return new BackendError('Unknown OpenAI error occurred', 'openai', true);
  }
}

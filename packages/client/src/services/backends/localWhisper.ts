import fsPromises from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { TranscriptionResult, TranscriptionSegment } from '@voxqueue/shared';
import { BackendError, CancellationError, InputError, errorMessage } from '../../domain/errors';
import { BackendRequest } from '../../domain/models';
import { IModelLocator, ITranscriptionBackend, ProgressHandler } from '../../domain/ports';
import { SpawnFn, spawnProcess } from '../../utils/process';

export interface LocalWhisperOptions {
  command: string | (() => string); // whisper.cpp compatible CLI, read per run when a getter
  models: IModelLocator;
  outputDir: string;
  spawnProcess?: SpawnFn;
}

const PROGRESS_LINE = /progress\s*=\s*(\d{1,3})%/g;

const whisperJsonSchema = z.object({
  result: z.object({ language: z.string().optional() }).optional(),
  transcription: z.array(
    z.object({
      offsets: z.object({ from: z.number(), to: z.number() }),
      text: z.string()
    })
  )
});

/**
 * Runs a whisper.cpp style CLI on a local model.
 * Progress comes from `progress = NN%` lines on stderr; the transcript from
 * the JSON file written next to `outputDir`.
 */
export class LocalWhisperBackend implements ITranscriptionBackend {
  private readonly spawnProcess: SpawnFn;

  constructor(private options: LocalWhisperOptions) {
    this.spawnProcess = options.spawnProcess ?? spawnProcess;
  }

  public async transcribe(
    request: BackendRequest,
    onProgress: ProgressHandler,
    signal: AbortSignal
  ): Promise<TranscriptionResult> {
    const { strategy } = request;
    if (strategy.kind === 'cloud') {
      throw new BackendError(`Local engine cannot run ${strategy.stage}`, 'local', false);
    }

    try {
      await fsPromises.access(request.audioPath);
    } catch {
      throw new InputError(`Audio file not readable: ${request.audioPath}`);
    }

    await fsPromises.mkdir(this.options.outputDir, { recursive: true });
    const outputBase = path.join(this.options.outputDir, request.jobId);
    const args = this.buildArgs(request, this.options.models.pathFor(strategy.modelId), outputBase);

    await this.runProcess(request.jobId, args, onProgress, signal);
    return this.readResult(`${outputBase}.json`, request.options.durationEstimate);
  }

  private buildArgs(request: BackendRequest, modelPath: string, outputBase: string): string[] {
    const { options } = request;
    const args = ['-m', modelPath, '-f', request.audioPath, '-oj', '-of', outputBase, '-pp'];
    args.push('-l', options.language ?? 'auto');
    if (options.translate) args.push('-tr');
    if (options.beamSize !== undefined) args.push('-bs', String(options.beamSize));
    if (options.temperature !== undefined) args.push('-tp', String(options.temperature));
    return args;
  }

  private runProcess(jobId: string, args: string[], onProgress: ProgressHandler, signal: AbortSignal): Promise<void> {
    const command = typeof this.options.command === 'function' ? this.options.command() : this.options.command;

    return new Promise((resolve, reject) => {
      if (signal.aborted) return reject(new CancellationError(jobId));

      console.log(`🎙️  [Job ${jobId}] Spawning ${command}`);
      const child = this.spawnProcess(command, args);
      let stderrData = '';

      const onAbort = () => {
        child.kill('SIGTERM');
      };
      signal.addEventListener('abort', onAbort, { once: true });

      // Segment lines on stdout are not used, but the pipe must keep flowing or the engine blocks
      child.stdout?.on('data', () => undefined);

      child.stderr?.on('data', (data: Buffer | string) => {
        const chunk = data.toString();
        stderrData = (stderrData + chunk).slice(-4000);
        for (const match of chunk.matchAll(PROGRESS_LINE)) {
          onProgress(Number(match[1]) / 100);
        }
      });

      child.on('error', (err: Error) => {
        signal.removeEventListener('abort', onAbort);
        reject(new BackendError(`Local engine failed to start: ${err.message}`, 'local', false));
      });

      child.on('close', (code: number | null) => {
        signal.removeEventListener('abort', onAbort);
        if (signal.aborted) return reject(new CancellationError(jobId));
        if (code !== 0) {
          const tail = stderrData.trim().split('\n').slice(-1)[0] ?? '';
          return reject(new BackendError(`Local engine exited with code ${code}${tail ? `: ${tail}` : ''}`, 'local', false));
        }
        resolve();
      });
    });
  }

  private async readResult(outputPath: string, durationEstimate?: number): Promise<TranscriptionResult> {
    let raw: string;
    try {
      raw = await fsPromises.readFile(outputPath, 'utf-8');
    } catch (error) {
      throw new BackendError(`Process succeeded, but output is missing: ${errorMessage(error)}`, 'local', false);
    }

    let parsed: z.output<typeof whisperJsonSchema>;
    try {
      parsed = whisperJsonSchema.parse(JSON.parse(raw));
    } catch (error) {
      throw new BackendError(`Unreadable engine output: ${errorMessage(error)}`, 'local', false);
    }

    const segments: TranscriptionSegment[] = parsed.transcription
      .map(entry => ({ start: entry.offsets.from / 1000, end: entry.offsets.to / 1000, text: entry.text.trim() }))
      .filter(segment => segment.text.length > 0);

    const result: TranscriptionResult = {
      text: segments.map(s => s.text).join(' '),
      segments,
      duration: segments.length > 0 ? segments[segments.length - 1].end : durationEstimate ?? 0
    };
    const language = parsed.result?.language;
    if (language) result.language = language;
    return result;
  }
}

import fs from 'fs';
import { LiveBackend } from '@voxqueue/shared';
import { LiveSessionError, errorMessage } from '../domain/errors';
import { IStreamingEngine, StreamingHandlers } from '../domain/ports';
import { SpawnFn, SpawnedProcess, spawnProcess } from '../utils/process';
import { stripTags } from '../utils/transcriptText';

export interface CommandStreamingOptions {
  backend: LiveBackend;
  command: string;
  args: (language?: string) => string[];
  audioPath?: string;   // Where the recognizer writes the captured audio, if it does
  stopTimeoutMs?: number;
  spawnProcess?: SpawnFn;
}

// ESC[2K (erase line), then any other CSI sequence
const ERASE_LINE = '\u001b[2K';
const ANSI_SEQUENCE = /\u001b\[[0-9;]*[A-Za-z]/g;

// The visible hypothesis is whatever follows the last carriage return or erase-line
function visibleText(raw: string): string {
  const erase = raw.lastIndexOf(ERASE_LINE);
  const start = Math.max(raw.lastIndexOf('\r') + 1, erase === -1 ? 0 : erase + ERASE_LINE.length);
  return stripTags(raw.slice(start).replace(ANSI_SEQUENCE, '')).trim();
}

// Status lines such as "[Start speaking]" are not speech
function isStatusLine(text: string): boolean {
  return /^\[[^\]]*\]$/.test(text);
}

/**
 * Streaming recognizer run as a child process.
 * Each completed stdout line is a final hypothesis; the unterminated tail is
 * the current partial, rewritten in place by the recognizer.
 */
export class CommandStreamingEngine implements IStreamingEngine {
  public readonly backend: LiveBackend;

  private child?: SpawnedProcess;
  private buffer = '';
  private lastPartial = '';
  private stopping = false;
  private readonly spawnProcess: SpawnFn;

  constructor(private options: CommandStreamingOptions) {
    this.backend = options.backend;
    this.spawnProcess = options.spawnProcess ?? spawnProcess;
  }

  public start(handlers: StreamingHandlers, language?: string): Promise<void> {
    if (this.child) {
      return Promise.reject(new LiveSessionError(`${this.backend} engine is already running`));
    }

    this.buffer = '';
    this.lastPartial = '';
    this.stopping = false;
    const child = this.spawnProcess(this.options.command, this.options.args(language));
    this.child = child;

    child.stdout?.on('data', (data: Buffer | string) => this.consume(data.toString(), handlers));

    return new Promise((resolve, reject) => {
      let started = false;

      child.once('spawn', () => {
        started = true;
        console.log(`🎧 [Live] ${this.backend} engine started`);
        if (this.options.audioPath) handlers.onAudioCaptureStarted(this.options.audioPath);
        resolve();
      });

      child.on('error', (err: Error) => {
        if (!started) {
          this.child = undefined;
          reject(new LiveSessionError(`Could not start ${this.backend} engine: ${err.message}`));
          return;
        }
        handlers.onError(err, false);
      });

      child.on('close', (code: number | null) => {
        this.flush(handlers);
        const expected = this.stopping;
        this.child = undefined;
        if (!started) return;
        if (!expected && code !== 0) {
          handlers.onError(new LiveSessionError(`${this.backend} engine exited with code ${code}`), true);
        }
        if (!expected) handlers.onStop();
      });
    });
  }

  public async stop(): Promise<string | undefined> {
    const child = this.child;
    if (child) {
      this.stopping = true;
      await new Promise<void>(resolve => {
        const timer = setTimeout(() => {
          console.warn(`⚠️ [Live] ${this.backend} engine ignored SIGINT, killing it`);
          child.kill('SIGKILL');
          resolve();
        }, this.options.stopTimeoutMs ?? 2000);
        child.once('close', () => {
          clearTimeout(timer);
          resolve();
        });
        child.kill('SIGINT');
      });
    }

    const audioPath = this.options.audioPath;
    if (audioPath && fs.existsSync(audioPath)) return audioPath;
    return undefined;
  }

  private consume(chunk: string, handlers: StreamingHandlers): void {
    this.buffer += chunk;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    for (const line of lines) {
      const text = visibleText(line);
      if (text && !isStatusLine(text)) {
        // A final replaces whatever partial was showing
        this.lastPartial = '';
        this.emit(() => handlers.onFinal(text), handlers);
      }
    }

    const partial = visibleText(this.buffer);
    if (partial === this.lastPartial || isStatusLine(partial)) return;
    this.lastPartial = partial;
    this.emit(() => handlers.onPartial(partial), handlers);
  }

  // Whatever is left unterminated when the process exits is committed
  private flush(handlers: StreamingHandlers): void {
    const text = visibleText(this.buffer);
    this.buffer = '';
    if (text && !isStatusLine(text)) this.emit(() => handlers.onFinal(text), handlers);
  }

  private emit(deliver: () => void, handlers: StreamingHandlers): void {
    try {
      deliver();
    } catch (error) {
      handlers.onError(new LiveSessionError(`Transcript handler failed: ${errorMessage(error)}`), false);
    }
  }
}

import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import { Readable } from 'stream';

// The part of a ChildProcess the engines rely on; tests hand in an EventEmitter with two streams
export interface SpawnedProcess extends EventEmitter {
  stdout: Readable | null;
  stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFn = (command: string, args: string[]) => SpawnedProcess;

export const spawnProcess: SpawnFn = (command, args) => spawn(command, args);

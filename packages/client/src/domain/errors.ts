import { JobStatus } from '@voxqueue/shared';

/**
 * Missing or unreadable source audio. Fatal to the job: no other backend is tried.
 */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

export class BackendError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly isTransient: boolean, // true for ECONNREFUSED/ECONNRESET and 5xx, false for 401 (Bad Key)
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'BackendError';
  }
}

/**
 * Ledger read/write failure. Logged, never propagated to callers.
 */
export class PersistenceError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PersistenceError';
  }
}

// Not a failure: short-circuits a run whose job was cancelled or removed
export class CancellationError extends Error {
  constructor(public readonly jobId: string) {
    super(`Job ${jobId} was cancelled`);
    this.name = 'CancellationError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    public readonly jobId: string,
    public readonly from: JobStatus,
    public readonly to: JobStatus
  ) {
    super(`Invalid transition for job ${jobId}: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerError';
  }
}

export class LiveSessionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LiveSessionError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

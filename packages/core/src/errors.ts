// Dispatcher error taxonomy
// Every error carries a stable code so the gateway can map it without string matching

import type { ChunkErrorCode } from './types/job.js';

export type DispatchErrorCode =
  | ChunkErrorCode
  | 'ROUTING_ERROR'
  | 'ENCODING_ERROR'
  | 'QUEUE_FULL'
  | 'INVALID_REQUEST';

export class DispatchError extends Error {
  readonly code: DispatchErrorCode;

  constructor(code: DispatchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Selector names no worker. Raised before anything is enqueued. */
export class RoutingError extends DispatchError {
  constructor(message: string) {
    super('ROUTING_ERROR', message);
  }
}

/** Output cannot be framed as requested, e.g. a chunk size that is not a positive integer. */
export class EncodingError extends DispatchError {
  constructor(message: string) {
    super('ENCODING_ERROR', message);
  }
}

/** The model raised while producing a job's output. */
export class AdapterError extends DispatchError {
  readonly jobId: string;

  constructor(jobId: string, cause: unknown) {
    super('ADAPTER_ERROR', `Job ${jobId} failed: ${describeError(cause)}`, { cause });
    this.jobId = jobId;
  }
}

/** The worker's execution loop itself crashed. */
export class WorkerFault extends DispatchError {
  readonly workerIndex: number;

  constructor(workerIndex: number, cause: unknown) {
    super('WORKER_FAULT', `Worker ${workerIndex} crashed: ${describeError(cause)}`, { cause });
    this.workerIndex = workerIndex;
  }
}

export class QueueFullError extends DispatchError {
  constructor(capacity: number) {
    super('QUEUE_FULL', `Worker queue is full (capacity ${capacity})`);
  }
}

export class JobCancelledError extends DispatchError {
  constructor(jobId: string, reason = 'cancelled') {
    super('CANCELLED', `Job ${jobId} ${reason}`);
  }
}

export class PoolStoppedError extends DispatchError {
  constructor(message = 'Worker pool is not running') {
    super('POOL_STOPPED', message);
  }
}

export class InvalidRequestError extends DispatchError {
  constructor(message: string) {
    super('INVALID_REQUEST', message);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

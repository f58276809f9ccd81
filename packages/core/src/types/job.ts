// Job types - one normalised inference request and the chunks it produces

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** A unit of result data: raw bytes, a text fragment, or any JSON value. */
export type Payload = Uint8Array | JsonValue;

export type ResponseMode = 'unary' | 'sse-stream' | 'binary-stream';

export type WorkerSelector =
  | { kind: 'any' }
  | { kind: 'index'; index: number }
  | { kind: 'tag'; tag: string };

export interface JobInput {
  args: readonly unknown[];
  kwargs: Readonly<Record<string, unknown>>;
}

export interface Job {
  readonly id: string;
  readonly selector: WorkerSelector;
  readonly input: JobInput;
  readonly response_mode: ResponseMode;
  readonly chunk_size: number;
  readonly media_type?: string;
  readonly created_at: string;
}

export enum JobStatus {
  QUEUED = 'queued',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

export type ChunkErrorCode = 'ADAPTER_ERROR' | 'WORKER_FAULT' | 'CANCELLED' | 'POOL_STOPPED';

export interface ChunkError {
  code: ChunkErrorCode;
  message: string;
}

export interface OutputChunk {
  job_id: string;
  seq: number;
  payload?: Payload;
  terminal: boolean;
  error?: ChunkError;
}

/**
 * Structured call handed over by the gateway. Field names follow the wire body
 * so that a parsed request can be passed through untouched.
 */
export interface InferenceRequest {
  args?: unknown[];
  kwargs?: Record<string, unknown>;
  stream?: boolean;
  media_type?: string;
  chunk_size?: number;
  target?: number | string;
}

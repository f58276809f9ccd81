// Job construction - validates a gateway request and freezes it into a Job

import { v4 as uuidv4 } from 'uuid';
import { EncodingError, RoutingError } from './errors.js';
import type { InferenceRequest, Job, ResponseMode, WorkerSelector } from './types/job.js';

export const DEFAULT_CHUNK_SIZE = 4096;
export const SSE_MEDIA_TYPE = 'text/event-stream';

export interface JobDefaults {
  chunkSize?: number;
}

/**
 * Turn a request `target` into a selector.
 * Integers (or integer strings) pick a worker by index, "any" or an absent target
 * picks any worker, every other string is a tag.
 */
export function parseSelector(target: number | string | undefined): WorkerSelector {
  if (target === undefined) {
    return { kind: 'any' };
  }

  if (typeof target === 'number') {
    if (!Number.isInteger(target) || target < 0) {
      throw new RoutingError(`Worker index must be a non-negative integer, got ${target}`);
    }
    return { kind: 'index', index: target };
  }

  const trimmed = target.trim();
  if (trimmed === '' || trimmed === 'any') {
    return { kind: 'any' };
  }
  if (/^\d+$/.test(trimmed)) {
    return { kind: 'index', index: Number(trimmed) };
  }
  return { kind: 'tag', tag: trimmed };
}

export function resolveResponseMode(stream: boolean | undefined, mediaType: string | undefined): ResponseMode {
  if (!stream) {
    return 'unary';
  }
  if (mediaType === undefined || mediaType.split(';')[0].trim().toLowerCase() === SSE_MEDIA_TYPE) {
    return 'sse-stream';
  }
  return 'binary-stream';
}

export function validateChunkSize(chunkSize: number): number {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new EncodingError(`chunk_size must be a positive integer, got ${chunkSize}`);
  }
  return chunkSize;
}

export function describeSelector(selector: WorkerSelector): string {
  switch (selector.kind) {
    case 'any':
      return 'any';
    case 'index':
      return `index ${selector.index}`;
    case 'tag':
      return `tag "${selector.tag}"`;
  }
}

/**
 * Build an immutable Job from a gateway request.
 * A bad chunk size is rejected here so that it never reaches a worker.
 */
export function createJob(request: InferenceRequest, defaults: JobDefaults = {}): Job {
  const chunkSize = validateChunkSize(request.chunk_size ?? defaults.chunkSize ?? DEFAULT_CHUNK_SIZE);
  const args = Object.freeze([...(request.args ?? [])]);
  const kwargs = Object.freeze({ ...(request.kwargs ?? {}) });

  const job: Job = {
    id: uuidv4(),
    selector: Object.freeze(parseSelector(request.target)),
    input: Object.freeze({ args, kwargs }),
    response_mode: resolveResponseMode(request.stream, request.media_type),
    chunk_size: chunkSize,
    created_at: new Date().toISOString(),
    ...(request.media_type !== undefined ? { media_type: request.media_type } : {}),
  };

  return Object.freeze(job);
}

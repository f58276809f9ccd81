// Stream encoder - turns one job's chunk sequence into the frames its response mode needs
//
//   unary          one body once the terminal chunk arrived
//   sse-stream     one server-sent event per payload, as soon as it arrives
//   binary-stream  payload bytes re-sliced into frames of exactly chunk_size bytes
//                  (the last frame may be shorter)

import {
  EncodingError,
  describeError,
  isBytes,
  payloadToBytes,
  payloadToText,
  validateChunkSize,
  type ChunkError,
  type Job,
  type OutputChunk,
  type Payload,
  type ResponseMode,
} from '@lightinfer/core';

export enum EncoderState {
  WAITING = 'waiting',
  STREAMING = 'streaming',
  COMPLETE = 'complete',
  FAILED = 'failed',
}

export type EncodedFrame =
  | { type: 'body'; body: Payload }
  | { type: 'event'; data: string }
  | { type: 'bytes'; bytes: Uint8Array }
  | { type: 'end' }
  | { type: 'error'; error: ChunkError };

export function formatSseEvent(data: string, event?: string): string {
  const lines = data.split(/\r\n|\r|\n/).map(line => `data: ${line}`);
  return `${event ? `event: ${event}\n` : ''}${lines.join('\n')}\n\n`;
}

export function formatSseError(error: ChunkError): string {
  return formatSseEvent(JSON.stringify({ error }), 'error');
}

export function formatSseDone(): string {
  return formatSseEvent('[DONE]', 'done');
}

/** Combine every payload of a unary response into one body. */
export function mergePayloads(payloads: readonly Payload[]): Payload {
  if (payloads.length === 0) {
    return null;
  }
  if (payloads.length === 1) {
    return payloads[0];
  }
  if (payloads.every(isBytes)) {
    return Buffer.concat(payloads);
  }

  const texts: string[] = [];
  for (const payload of payloads) {
    if (typeof payload !== 'string') {
      return payloads.map(item => (isBytes(item) ? payloadToText(item) : item));
    }
    texts.push(payload);
  }
  return texts.join('');
}

export class StreamEncoder {
  private currentState = EncoderState.WAITING;
  private readonly chunkSize: number;
  private buffered: Uint8Array[] = [];
  private bufferedBytes = 0;
  private collected: Payload[] = [];

  constructor(
    readonly mode: ResponseMode,
    chunkSize: number
  ) {
    this.chunkSize = validateChunkSize(chunkSize);
  }

  static forJob(job: Job): StreamEncoder {
    return new StreamEncoder(job.response_mode, job.chunk_size);
  }

  get state(): EncoderState {
    return this.currentState;
  }

  get isFinished(): boolean {
    return this.currentState === EncoderState.COMPLETE || this.currentState === EncoderState.FAILED;
  }

  /** Encode one chunk. Chunks after the job finished are rejected with EncodingError. */
  accept(chunk: OutputChunk): EncodedFrame[] {
    if (this.isFinished) {
      throw new EncodingError(`Job ${chunk.job_id} already ${this.currentState}, chunk ${chunk.seq} rejected`);
    }

    if (chunk.error) {
      return this.fail(chunk.error);
    }

    const frames: EncodedFrame[] = [];
    if (chunk.payload !== undefined) {
      this.currentState = EncoderState.STREAMING;
      frames.push(...this.encodePayload(chunk.payload));
    }

    if (chunk.terminal) {
      frames.push(...this.finish());
    }
    return frames;
  }

  /** End the stream with an error, e.g. when the chunk source itself broke. */
  fail(error: ChunkError): EncodedFrame[] {
    if (this.isFinished) {
      return [];
    }
    this.currentState = EncoderState.FAILED;
    this.buffered = [];
    this.bufferedBytes = 0;
    this.collected = [];
    return [{ type: 'error', error }];
  }

  /**
   * Encode a whole chunk sequence. The sequence ending without a terminal chunk
   * is a failure, never a silently short response.
   */
  async *encode(source: AsyncIterable<OutputChunk>): AsyncGenerator<EncodedFrame, void, undefined> {
    try {
      for await (const chunk of source) {
        yield* this.accept(chunk);
        if (this.isFinished) return;
      }
    } catch (error) {
      if (error instanceof EncodingError) throw error;
      yield* this.fail({ code: 'WORKER_FAULT', message: describeError(error) });
      return;
    }

    yield* this.fail({ code: 'WORKER_FAULT', message: 'Output ended without a terminal chunk' });
  }

  private encodePayload(payload: Payload): EncodedFrame[] {
    switch (this.mode) {
      case 'unary':
        this.collected.push(payload);
        return [];

      case 'sse-stream':
        return [{ type: 'event', data: formatSseEvent(payloadToText(payload)) }];

      case 'binary-stream':
        return this.resegment(payloadToBytes(payload));
    }
  }

  private resegment(bytes: Uint8Array): EncodedFrame[] {
    if (bytes.length === 0) {
      return [];
    }
    this.buffered.push(bytes);
    this.bufferedBytes += bytes.length;
    if (this.bufferedBytes < this.chunkSize) {
      return [];
    }

    const joined = Buffer.concat(this.buffered, this.bufferedBytes);
    const frames: EncodedFrame[] = [];
    let offset = 0;
    while (joined.length - offset >= this.chunkSize) {
      frames.push({ type: 'bytes', bytes: joined.subarray(offset, offset + this.chunkSize) });
      offset += this.chunkSize;
    }

    const rest = joined.subarray(offset);
    this.buffered = rest.length > 0 ? [rest] : [];
    this.bufferedBytes = rest.length;
    return frames;
  }

  private finish(): EncodedFrame[] {
    const frames: EncodedFrame[] = [];

    if (this.mode === 'unary') {
      frames.push({ type: 'body', body: mergePayloads(this.collected) });
      this.collected = [];
    } else if (this.mode === 'binary-stream' && this.bufferedBytes > 0) {
      frames.push({ type: 'bytes', bytes: Buffer.concat(this.buffered, this.bufferedBytes) });
      this.buffered = [];
      this.bufferedBytes = 0;
    }

    this.currentState = EncoderState.COMPLETE;
    frames.push({ type: 'end' });
    return frames;
  }
}

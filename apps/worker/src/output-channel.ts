// OutputChannel - per-job rendezvous between the worker producing chunks and the
// gateway relaying them. A push resolves only once the consumer has taken the
// chunk, so at most one chunk is in flight and a slow caller slows the producer.

import type { ChunkError, OutputChunk } from '@lightinfer/core';

interface PendingChunk {
  chunk: OutputChunk;
  taken: () => void;
}

export class OutputChannel implements AsyncIterable<OutputChunk> {
  private pending: PendingChunk[] = [];
  private consumerWaiting?: () => void;
  private terminated = false;
  private discarded = false;
  private iterating = false;
  private nextSeq = 0;

  constructor(
    readonly jobId: string,
    private readonly onDiscard?: () => void
  ) {}

  /** True once a terminal chunk has been accepted. */
  get isTerminated(): boolean {
    return this.terminated;
  }

  /** True once the consumer has gone away; further output is dropped. */
  get isDiscarded(): boolean {
    return this.discarded;
  }

  /**
   * Hand a chunk to the consumer. Resolves when it has been taken, or straight
   * away for terminal chunks and for channels nobody reads any more.
   */
  push(chunk: OutputChunk): Promise<void> {
    if (this.terminated || this.discarded) {
      return Promise.resolve();
    }
    if (chunk.terminal) {
      this.enqueue(chunk, () => undefined);
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      this.enqueue(chunk, resolve);
    });
  }

  /**
   * End the job from the owner side with an error chunk, e.g. on cancellation or
   * a worker crash. Ignored once a terminal chunk was accepted. Chunks already
   * pushed are still delivered, but their producer no longer waits for them.
   */
  fail(error: ChunkError): void {
    if (this.terminated || this.discarded) return;
    for (const entry of this.pending) {
      entry.taken();
    }
    this.enqueue({ job_id: this.jobId, seq: this.nextSeq, terminal: true, error }, () => undefined);
  }

  /**
   * Drop the channel from the consumer side: pending and future pushes resolve
   * immediately and their chunks are lost. Notifies the owner once.
   */
  discard(): void {
    if (this.discarded) return;
    this.discarded = true;

    const pending = this.pending;
    this.pending = [];
    for (const entry of pending) {
      entry.taken();
    }
    this.wakeConsumer();
    this.onDiscard?.();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<OutputChunk, void, undefined> {
    if (this.iterating) {
      throw new Error(`Output of job ${this.jobId} is already being consumed`);
    }
    this.iterating = true;

    let finished = false;
    try {
      while (true) {
        const next = this.pending.shift();
        if (next) {
          next.taken();
          if (next.chunk.terminal) {
            finished = true;
          }
          yield next.chunk;
          if (finished) return;
          continue;
        }

        if (this.discarded) return;
        await new Promise<void>(resolve => {
          this.consumerWaiting = resolve;
        });
      }
    } finally {
      // Leaving before the terminal chunk means the caller is gone
      if (!finished) {
        this.discard();
      }
    }
  }

  private enqueue(chunk: OutputChunk, taken: () => void): void {
    if (chunk.terminal) {
      this.terminated = true;
    }
    this.nextSeq = chunk.seq + 1;
    this.pending.push({ chunk, taken });
    this.wakeConsumer();
  }

  private wakeConsumer(): void {
    const waiting = this.consumerWaiting;
    this.consumerWaiting = undefined;
    waiting?.();
  }
}

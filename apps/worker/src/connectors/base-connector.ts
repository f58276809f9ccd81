// BaseConnector - uniform invocation contract every pool worker executes through
// Subclasses only describe how values are produced; chunk numbering, terminal
// marking and error containment live here.

import {
  AdapterError,
  JobCancelledError,
  describeError,
  logger,
  type ChunkError,
  type Job,
  type JobInput,
  type ModelKind,
  type OutputChunk,
  type Payload,
} from '@lightinfer/core';

/** Passed to models so they can observe cancellation if they support it. */
export interface ModelContext {
  job_id: string;
  signal: AbortSignal;
}

/**
 * Anything with an `infer` method can be registered as a worker.
 * `kind` is inferred from the function type when omitted: generator functions
 * stream, everything else produces a single value.
 */
export interface InferenceModel {
  name?: string;
  tags?: readonly string[];
  kind?: ModelKind;
  infer(input: JobInput, context: ModelContext): unknown;
}

export interface ProducedChunk {
  payload?: Payload;
  terminal: boolean;
}

export interface ConnectorStats {
  jobs_processed: number;
  jobs_failed: number;
}

export abstract class BaseConnector {
  abstract readonly kind: ModelKind;

  readonly connector_id: string;
  readonly tags: readonly string[];

  protected jobsProcessed = 0;
  protected jobsFailed = 0;

  constructor(connectorId: string, tags: readonly string[] = []) {
    this.connector_id = connectorId;
    this.tags = Object.freeze([...tags]);
  }

  /**
   * Run a job and yield its output. Always ends with exactly one terminal chunk;
   * a producer failure becomes an error-bearing terminal chunk instead of a throw.
   */
  async *invoke(job: Job, signal: AbortSignal): AsyncGenerator<OutputChunk, void, undefined> {
    const context: ModelContext = { job_id: job.id, signal };
    let seq = 0;

    try {
      for await (const produced of this.produce(job, context)) {
        yield { job_id: job.id, seq: seq++, ...produced };
        if (produced.terminal) {
          this.jobsProcessed++;
          return;
        }
      }

      this.jobsProcessed++;
      yield { job_id: job.id, seq: seq++, terminal: true };
    } catch (error) {
      this.jobsFailed++;
      const chunkError = toChunkError(error, job.id, signal);

      if (chunkError.code === 'CANCELLED') {
        logger.info(`Job ${job.id} cancelled on connector ${this.connector_id}`);
      } else {
        const failure = new AdapterError(job.id, error);
        logger.error(failure.message, { connector: this.connector_id, chunks: seq });
      }

      yield { job_id: job.id, seq, terminal: true, error: chunkError };
    }
  }

  getStats(): ConnectorStats {
    return {
      jobs_processed: this.jobsProcessed,
      jobs_failed: this.jobsFailed,
    };
  }

  protected abstract produce(job: Job, context: ModelContext): AsyncGenerator<ProducedChunk, void, undefined>;
}

function toChunkError(error: unknown, jobId: string, signal: AbortSignal): ChunkError {
  if (error instanceof JobCancelledError) {
    return { code: 'CANCELLED', message: error.message };
  }
  // Models that honour the signal reject with their own abort error
  if (signal.aborted) {
    return { code: 'CANCELLED', message: new JobCancelledError(jobId).message };
  }
  return { code: 'ADAPTER_ERROR', message: describeError(error) };
}

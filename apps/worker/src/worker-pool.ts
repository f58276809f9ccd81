// Worker pool - the dispatcher context the gateway is handed at startup
//
// Owns the workers, their queues and the routing table for its whole lifetime.
// Nothing here is global: construct it, start it, and stop it to drain or
// cancel whatever is still in flight.

import {
  DEFAULT_CHUNK_SIZE,
  JobStatus,
  PoolStoppedError,
  createJob,
  describeSelector,
  logger,
  validateChunkSize,
  type ChunkError,
  type InferenceRequest,
  type Job,
  type OutputChunk,
  type PoolStatus,
} from '@lightinfer/core';
import { createConnector, type BaseConnector, type InferenceModel } from './connectors/index.js';
import { RoutingTable } from './job-router.js';
import { OutputChannel } from './output-channel.js';
import { PoolWorker, type JobEntry } from './pool-worker.js';

export type WorkerEntry = InferenceModel | BaseConnector;

export interface WorkerPoolOptions {
  /** Ordered workers; a worker's position is its routing index. */
  workerList: readonly WorkerEntry[];
  /** Per-worker queue capacity, 0 for unbounded. */
  queueCapacity?: number;
  /** Binary frame size used when a request does not give one. */
  defaultChunkSize?: number;
}

export interface StopOptions {
  /** Run every queued job to completion before stopping instead of cancelling them. */
  drain?: boolean;
}

/** What the gateway gets back for an accepted job. */
export interface JobTicket {
  readonly job: Job;
  readonly workerIndex: number;
  /** The job's chunks in production order. Can be consumed once; leaving early cancels the job. */
  readonly output: AsyncIterable<OutputChunk>;
  readonly status: JobStatus;
  cancel(reason?: string): boolean;
}

export class WorkerPool {
  private readonly workers: PoolWorker[];
  private readonly routingTable: RoutingTable<PoolWorker>;
  private readonly jobs = new Map<string, JobEntry>();
  private readonly defaultChunkSize: number;
  private running = false;

  constructor(options: WorkerPoolOptions) {
    this.defaultChunkSize = validateChunkSize(options.defaultChunkSize ?? DEFAULT_CHUNK_SIZE);
    const queueCapacity = options.queueCapacity ?? 0;

    this.workers = options.workerList.map(
      (entry, index) =>
        new PoolWorker(index, createConnector(entry, index), {
          queueCapacity,
          onJobSettled: settled => this.jobs.delete(settled.job.id),
        })
    );
    this.routingTable = new RoutingTable(this.workers);
  }

  get isRunning(): boolean {
    return this.running;
  }

  get size(): number {
    return this.workers.length;
  }

  start(): void {
    if (this.running) return;

    for (const worker of this.workers) {
      worker.start();
    }
    this.running = true;
    logger.info(`Worker pool started with ${this.workers.length} workers`, {
      routing_keys: this.routingTable.tags,
    });
  }

  /** Build a job from a gateway request and submit it. */
  dispatch(request: InferenceRequest): JobTicket {
    const job = createJob(request, { chunkSize: this.defaultChunkSize });
    return this.submit(job);
  }

  /**
   * Route a job and put it on exactly one worker's queue.
   * RoutingError, QueueFullError and PoolStoppedError are thrown before any queue changes.
   */
  submit(job: Job): JobTicket {
    if (!this.running) {
      throw new PoolStoppedError();
    }

    const worker = this.routingTable.route(job.selector);
    const entry: JobEntry = {
      job,
      channel: new OutputChannel(job.id, () => {
        this.cancel(job.id, 'client disconnected');
      }),
      abort: new AbortController(),
      workerIndex: worker.index,
      status: JobStatus.QUEUED,
    };

    worker.enqueue(entry);
    this.jobs.set(job.id, entry);

    logger.debug(`Job ${job.id} routed to worker ${worker.index}`, {
      selector: describeSelector(job.selector),
      response_mode: job.response_mode,
      load: worker.load,
    });

    return {
      job,
      workerIndex: worker.index,
      output: entry.channel,
      get status() {
        return entry.status;
      },
      cancel: (reason?: string) => this.cancel(job.id, reason),
    };
  }

  /**
   * Cancel a queued or running job. A queued job leaves its queue at once; a
   * running one has its signal aborted, and the caller gets a CANCELLED chunk.
   * Returns false for unknown or already finished jobs.
   */
  cancel(jobId: string, reason = 'cancelled'): boolean {
    const entry = this.jobs.get(jobId);
    if (!entry || entry.status === JobStatus.CANCELLED) {
      return false;
    }

    this.endEntry(entry, { code: 'CANCELLED', message: `Job ${jobId} ${reason}` });
    logger.info(`Job ${jobId} cancelled: ${reason}`);
    return true;
  }

  getStatus(): PoolStatus {
    const workers = this.workers.map(worker => worker.getInfo());
    return {
      running: this.running,
      workers,
      total_in_flight: workers.reduce((sum, info) => sum + info.in_flight, 0),
    };
  }

  /**
   * Stop every worker loop. Without `drain`, queued and running jobs end with a
   * POOL_STOPPED error chunk.
   */
  async stop(options: StopOptions = {}): Promise<void> {
    if (!this.running) return;
    this.running = false;

    const drain = options.drain ?? false;
    logger.info(`Stopping worker pool (${drain ? 'draining' : 'cancelling'} ${this.jobs.size} jobs)`);

    if (!drain) {
      // Includes jobs already handed to an idle loop that has not started them yet
      const stopped: ChunkError = { code: 'POOL_STOPPED', message: 'Worker pool stopped' };
      for (const entry of [...this.jobs.values()]) {
        if (entry.status === JobStatus.QUEUED || entry.status === JobStatus.RUNNING) {
          this.endEntry(entry, stopped);
        }
      }
    }

    await Promise.all(this.workers.map(worker => worker.stop()));

    logger.info('Worker pool stopped');
  }

  private endEntry(entry: JobEntry, error: ChunkError): void {
    const worker = this.workers[entry.workerIndex];
    const wasQueued = worker.dequeue(entry);

    entry.status = JobStatus.CANCELLED;
    entry.channel.fail(error);
    entry.abort.abort();

    // A job still in its queue never reaches the worker, so nobody else settles it
    if (wasQueued) {
      this.jobs.delete(entry.job.id);
    }
  }
}

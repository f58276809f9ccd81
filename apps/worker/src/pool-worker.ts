// Pool worker - one slot of the pool: its own queue, one connector and one
// execution loop that runs a single job at a time, in queue order

import {
  AsyncQueue,
  JobStatus,
  PoolStoppedError,
  WorkerFault,
  WorkerStatus,
  logger,
  type Job,
  type OutputChunk,
  type WorkerInfo,
} from '@lightinfer/core';
import type { BaseConnector } from './connectors/base-connector.js';
import type { RoutableWorker } from './job-router.js';
import type { OutputChannel } from './output-channel.js';

export interface JobEntry {
  readonly job: Job;
  readonly channel: OutputChannel;
  readonly abort: AbortController;
  readonly workerIndex: number;
  status: JobStatus;
}

export interface PoolWorkerOptions {
  /** Maximum queued jobs, 0 for unbounded */
  queueCapacity: number;
  /** Called once per job when it reaches a final status */
  onJobSettled: (entry: JobEntry) => void;
}

export class PoolWorker implements RoutableWorker {
  readonly index: number;
  readonly name: string;
  readonly tags: readonly string[];

  private readonly queue: AsyncQueue<JobEntry>;
  private status: WorkerStatus = WorkerStatus.INITIALIZING;
  private current?: JobEntry;
  /** Jobs enqueued here and not yet settled, including one handed to a waiting loop. */
  private assigned = 0;
  private accepting = false;
  private loop?: Promise<void>;
  private restarts = 0;
  private jobsProcessed = 0;
  private jobsFailed = 0;

  constructor(
    index: number,
    private readonly connector: BaseConnector,
    private readonly options: PoolWorkerOptions
  ) {
    this.index = index;
    this.name = connector.connector_id;
    this.tags = connector.tags;
    this.queue = new AsyncQueue<JobEntry>(options.queueCapacity);
  }

  get load(): number {
    return this.assigned;
  }

  get currentJobId(): string | undefined {
    return this.current?.job.id;
  }

  start(): void {
    if (this.loop) return;

    this.accepting = true;
    this.status = WorkerStatus.IDLE;
    this.loop = this.supervise();
    logger.info(`Worker ${this.index} (${this.name}) started`, { kind: this.connector.kind, tags: this.tags });
  }

  /** Append a job to this worker's queue. Throws QueueFullError or PoolStoppedError without side effects. */
  enqueue(entry: JobEntry): void {
    if (!this.accepting) {
      throw new PoolStoppedError(`Worker ${this.index} is not accepting jobs`);
    }
    this.queue.push(entry);
    this.assigned++;
  }

  /** Take a job back out of the queue before it started. False if it is not queued here. */
  dequeue(entry: JobEntry): boolean {
    if (!this.queue.remove(entry)) {
      return false;
    }
    this.assigned--;
    return true;
  }

  /** Stop accepting jobs and wait for the loop to finish what is still queued. */
  async stop(): Promise<void> {
    this.accepting = false;
    this.status = WorkerStatus.STOPPING;
    this.queue.close();

    await this.loop;
    this.loop = undefined;
    this.status = WorkerStatus.OFFLINE;
  }

  getInfo(): WorkerInfo {
    return {
      index: this.index,
      name: this.name,
      tags: [...this.tags],
      kind: this.connector.kind,
      status: this.status,
      queued: this.queue.length,
      in_flight: this.load,
      current_job: this.currentJobId,
      jobs_processed: this.jobsProcessed,
      jobs_failed: this.jobsFailed,
      restarts: this.restarts,
    };
  }

  /** Keep the execution loop alive: a crash fails the in-flight job and the loop starts over. */
  private async supervise(): Promise<void> {
    for (;;) {
      try {
        await this.processJobs();
        return;
      } catch (error) {
        const fault = new WorkerFault(this.index, error);
        this.restarts++;
        this.status = WorkerStatus.RESTARTING;
        logger.error(fault.message, { worker: this.name, restarts: this.restarts });

        const inFlight = this.current;
        this.current = undefined;
        if (inFlight) {
          inFlight.channel.fail({ code: 'WORKER_FAULT', message: fault.message });
          inFlight.abort.abort(fault);
          this.settle(inFlight, JobStatus.FAILED);
        }
      }
    }
  }

  private async processJobs(): Promise<void> {
    for (;;) {
      if (this.accepting) {
        this.status = WorkerStatus.IDLE;
      }
      const entry = await this.queue.shift();
      if (!entry) return;

      await this.execute(entry);
    }
  }

  private async execute(entry: JobEntry): Promise<void> {
    // Cancelled between being taken off the queue and getting here
    if (entry.abort.signal.aborted) {
      this.settle(entry, JobStatus.CANCELLED);
      return;
    }

    this.current = entry;
    this.status = WorkerStatus.BUSY;
    entry.status = JobStatus.RUNNING;
    const startedAt = Date.now();
    logger.debug(`Worker ${this.index} running job ${entry.job.id}`);

    let last: OutputChunk | undefined;
    for await (const chunk of this.connector.invoke(entry.job, entry.abort.signal)) {
      last = chunk;
      await entry.channel.push(chunk);
    }

    this.current = undefined;
    const status = !last?.error
      ? JobStatus.COMPLETED
      : last.error.code === 'CANCELLED'
        ? JobStatus.CANCELLED
        : JobStatus.FAILED;
    this.settle(entry, status);

    logger.debug(`Worker ${this.index} finished job ${entry.job.id}`, {
      status,
      chunks: last ? last.seq + 1 : 0,
      duration_ms: Date.now() - startedAt,
    });
  }

  private settle(entry: JobEntry, status: JobStatus): void {
    this.assigned--;
    if (status === JobStatus.COMPLETED) {
      this.jobsProcessed++;
    } else if (status === JobStatus.FAILED) {
      this.jobsFailed++;
    }

    // A cancel issued by the pool wins over however the run ended
    if (entry.status !== JobStatus.CANCELLED) {
      entry.status = status;
    }
    this.options.onJobSettled(entry);
  }
}

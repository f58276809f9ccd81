// Inference API Server - HTTP gateway in front of the worker pool
// Validates requests, turns them into jobs and relays each job's output in the
// response mode it asked for: one JSON or binary body, SSE events, or raw frames.

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { createServer, type Server as HTTPServer } from 'http';
import { once } from 'events';
import {
  DispatchError,
  SSE_MEDIA_TYPE,
  describeError,
  logger,
  type ChunkError,
  type DispatchErrorCode,
  type Payload,
} from '@lightinfer/core';
import {
  StreamEncoder,
  formatSseDone,
  formatSseError,
  type JobTicket,
  type StopOptions,
  type WorkerPool,
} from '@lightinfer/worker';
import type { GatewayConfig } from './config.js';
import { parseInferenceRequest } from './request-schema.js';

export type InferenceAPIConfig = Pick<GatewayConfig, 'port' | 'host' | 'bodyLimit' | 'corsOrigins'>;

const DEFAULT_BINARY_MEDIA_TYPE = 'application/octet-stream';

const STATUS_BY_CODE: Record<DispatchErrorCode, number> = {
  ROUTING_ERROR: 404,
  ENCODING_ERROR: 400,
  INVALID_REQUEST: 400,
  QUEUE_FULL: 503,
  POOL_STOPPED: 503,
  CANCELLED: 409,
  ADAPTER_ERROR: 500,
  WORKER_FAULT: 500,
};

export function statusForCode(code: DispatchErrorCode): number {
  return STATUS_BY_CODE[code];
}

export class InferenceAPIServer {
  private readonly app: express.Express;
  private readonly httpServer: HTTPServer;
  private listening = false;

  constructor(
    private readonly config: InferenceAPIConfig,
    private readonly pool: WorkerPool
  ) {
    this.app = express();
    this.httpServer = createServer(this.app);

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandler();
  }

  /** Port actually bound, which differs from the configured one when that was 0. */
  get port(): number {
    const address = this.httpServer.address();
    return address !== null && typeof address === 'object' ? address.port : this.config.port;
  }

  async start(): Promise<void> {
    this.pool.start();

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      this.httpServer.once('error', onError);
      this.httpServer.listen(this.config.port, this.config.host, () => {
        this.httpServer.off('error', onError);
        resolve();
      });
    });
    this.listening = true;

    logger.info(`Inference API Server started on ${this.config.host}:${this.port}`);
    logger.info('HTTP endpoints:');
    logger.info('  POST /api/v1/infer - Run an inference job');
    logger.info('  DELETE /api/v1/jobs/:jobId - Cancel a job');
    logger.info('  GET /api/v1/workers - Worker pool status');
    logger.info('  GET /health - Health check');
  }

  /** Stop the pool first so open responses receive their terminal event, then close the server. */
  async stop(options: StopOptions = {}): Promise<void> {
    logger.info('Stopping Inference API Server...');
    await this.pool.stop(options);

    if (this.listening) {
      await new Promise<void>((resolve, reject) => {
        this.httpServer.close(error => (error ? reject(error) : resolve()));
        this.httpServer.closeAllConnections();
      });
      this.listening = false;
    }

    logger.info('Inference API Server stopped');
  }

  private setupMiddleware(): void {
    const origins = this.config.corsOrigins;
    this.app.use(
      cors({
        origin: origins.length === 0 || origins.includes('*') ? '*' : origins,
        exposedHeaders: ['X-Job-ID', 'X-Worker-Index'],
      })
    );
    this.app.use(express.json({ limit: this.config.bodyLimit }));
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({
        status: this.pool.isRunning ? 'ok' : 'stopped',
        timestamp: new Date().toISOString(),
        workers: this.pool.size,
      });
    });

    this.app.get('/api/v1/workers', (_req: Request, res: Response) => {
      res.json(this.pool.getStatus());
    });

    this.app.delete('/api/v1/jobs/:jobId', (req: Request, res: Response) => {
      const { jobId } = req.params;
      if (!this.pool.cancel(jobId, 'cancelled by request')) {
        res.status(404).json({
          error: { code: 'JOB_NOT_FOUND', message: `Job ${jobId} is not queued or running` },
        });
        return;
      }
      res.json({ success: true, job_id: jobId });
    });

    this.app.post('/api/v1/infer', (req: Request, res: Response, next: NextFunction) => {
      this.handleInfer(req, res).catch(next);
    });
  }

  private setupErrorHandler(): void {
    this.app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }

      if (error instanceof DispatchError) {
        const status = statusForCode(error.code);
        logger.warn(`Request rejected: ${error.message}`, { code: error.code, status });
        res.status(status).json({ error: { code: error.code, message: error.message } });
        return;
      }

      // body-parser failures carry their own 4xx status
      if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        res.status(error.status).json({ error: { code: 'INVALID_REQUEST', message: describeError(error) } });
        return;
      }

      logger.error('Unhandled gateway error:', error);
      res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: describeError(error) } });
    });
  }

  private async handleInfer(req: Request, res: Response): Promise<void> {
    const ticket = this.pool.dispatch(parseInferenceRequest(req.body));
    const { job } = ticket;

    res.setHeader('X-Job-ID', job.id);
    res.setHeader('X-Worker-Index', String(ticket.workerIndex));
    res.on('close', () => {
      if (!res.writableFinished && ticket.cancel('client disconnected')) {
        logger.info(`Client of job ${job.id} disconnected`);
      }
    });

    logger.info(`Job ${job.id} accepted`, {
      worker: ticket.workerIndex,
      response_mode: job.response_mode,
      chunk_size: job.chunk_size,
    });

    switch (job.response_mode) {
      case 'unary':
        await this.sendUnary(ticket, res);
        break;
      case 'sse-stream':
        await this.sendSse(ticket, res);
        break;
      case 'binary-stream':
        await this.sendBinary(ticket, res);
        break;
    }
  }

  private async sendUnary(ticket: JobTicket, res: Response): Promise<void> {
    const encoder = StreamEncoder.forJob(ticket.job);

    for await (const frame of encoder.encode(ticket.output)) {
      if (res.destroyed) return;

      if (frame.type === 'body') {
        this.sendBody(ticket, res, frame.body);
      } else if (frame.type === 'error') {
        this.sendJobError(ticket, res, frame.error);
      }
    }
  }

  private sendBody(ticket: JobTicket, res: Response, body: Payload): void {
    if (body instanceof Uint8Array) {
      res.setHeader('Content-Type', ticket.job.media_type ?? DEFAULT_BINARY_MEDIA_TYPE);
      res.end(Buffer.from(body.buffer, body.byteOffset, body.byteLength));
      return;
    }
    res.json({ job_id: ticket.job.id, result: body });
  }

  private sendJobError(ticket: JobTicket, res: Response, error: ChunkError): void {
    logger.warn(`Job ${ticket.job.id} ended with ${error.code}: ${error.message}`);
    res.status(statusForCode(error.code)).json({ job_id: ticket.job.id, error });
  }

  private async sendSse(ticket: JobTicket, res: Response): Promise<void> {
    res.status(200);
    res.setHeader('Content-Type', SSE_MEDIA_TYPE);
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    const encoder = StreamEncoder.forJob(ticket.job);
    for await (const frame of encoder.encode(ticket.output)) {
      let text: string | undefined;
      if (frame.type === 'event') {
        text = frame.data;
      } else if (frame.type === 'error') {
        logger.warn(`Job ${ticket.job.id} ended with ${frame.error.code}: ${frame.error.message}`);
        text = formatSseError(frame.error);
      } else if (frame.type === 'end') {
        text = formatSseDone();
      }

      if (text !== undefined && !(await writeChunk(res, text))) return;
    }

    if (!res.destroyed) {
      res.end();
    }
  }

  private async sendBinary(ticket: JobTicket, res: Response): Promise<void> {
    // The media type only applies once output exists; an early failure answers in JSON
    const mediaType = ticket.job.media_type ?? DEFAULT_BINARY_MEDIA_TYPE;

    const encoder = StreamEncoder.forJob(ticket.job);
    for await (const frame of encoder.encode(ticket.output)) {
      if (frame.type === 'bytes') {
        if (!res.headersSent) {
          res.setHeader('Content-Type', mediaType);
        }
        if (!(await writeChunk(res, frame.bytes))) return;
      } else if (frame.type === 'error') {
        if (res.headersSent) {
          // A clean end would look like a complete but short body
          logger.warn(`Job ${ticket.job.id} failed mid-stream, aborting response: ${frame.error.message}`);
          res.destroy();
        } else {
          this.sendJobError(ticket, res, frame.error);
        }
        return;
      } else if (frame.type === 'end') {
        if (!res.destroyed) {
          if (!res.headersSent) {
            res.setHeader('Content-Type', mediaType);
          }
          res.end();
        }
      }
    }
  }
}

/**
 * Write one frame, waiting for the socket to drain when its buffer is full.
 * Resolves false once the client is gone.
 */
async function writeChunk(res: Response, data: string | Uint8Array): Promise<boolean> {
  if (res.destroyed || res.writableEnded) {
    return false;
  }
  if (res.write(data)) {
    return true;
  }

  const settled = new AbortController();
  try {
    await Promise.race([
      once(res, 'drain', { signal: settled.signal }),
      once(res, 'close', { signal: settled.signal }),
    ]);
  } finally {
    settled.abort();
  }
  return !res.destroyed;
}

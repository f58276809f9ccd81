// Worker types - pool slots and the status they report

export type ModelKind = 'unary' | 'stream';

export enum WorkerStatus {
  INITIALIZING = 'initializing',
  IDLE = 'idle',
  BUSY = 'busy',
  RESTARTING = 'restarting',
  STOPPING = 'stopping',
  OFFLINE = 'offline',
}

export interface WorkerInfo {
  index: number;
  name: string;
  tags: string[];
  kind: ModelKind;
  status: WorkerStatus;
  queued: number;
  in_flight: number;
  current_job?: string;
  jobs_processed: number;
  jobs_failed: number;
  restarts: number;
}

export interface PoolStatus {
  running: boolean;
  workers: WorkerInfo[];
  total_in_flight: number;
}

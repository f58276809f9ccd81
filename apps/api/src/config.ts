// Gateway configuration, read once from the environment at startup

import { DEFAULT_CHUNK_SIZE, getEnv, getEnvInt } from '@lightinfer/core';

export interface GatewayConfig {
  port: number;
  host: string;
  /** Per-worker queue capacity, 0 for unbounded */
  queueCapacity: number;
  defaultChunkSize: number;
  /** Largest accepted JSON request body, in the `bytes` notation express uses (e.g. `10mb`) */
  bodyLimit: string;
  corsOrigins: string[];
}

export function loadGatewayConfig(): GatewayConfig {
  const queueCapacity = getEnvInt('LIGHTINFER_QUEUE_CAPACITY', 0);
  if (queueCapacity < 0) {
    throw new Error(`FATAL: LIGHTINFER_QUEUE_CAPACITY must not be negative. Got: ${queueCapacity}`);
  }

  return {
    port: getEnvInt('LIGHTINFER_PORT', 8001),
    host: getEnv('LIGHTINFER_HOST', '0.0.0.0'),
    queueCapacity,
    defaultChunkSize: getEnvInt('LIGHTINFER_DEFAULT_CHUNK_SIZE', DEFAULT_CHUNK_SIZE),
    bodyLimit: getEnv('LIGHTINFER_BODY_LIMIT', '10mb'),
    corsOrigins: getEnv('CORS_ORIGIN', '*')
      .split(',')
      .map(origin => origin.trim())
      .filter(origin => origin !== ''),
  };
}

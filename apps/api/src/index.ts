// API Server Entry Point
// Serves a heterogeneous example pool: an LLM, a TTS model, an async model and a
// model that switches between text and audio.
import { config } from 'dotenv';
import { pathToFileURL } from 'url';
import { logger } from '@lightinfer/core';
import { WorkerPool } from '@lightinfer/worker';
import { loadGatewayConfig } from './config.js';
import { InferenceAPIServer } from './inference-api-server.js';
import { AsyncMockModel, MockLLM, MockTTS, UniversalMockModel } from './models/mock-models.js';

config();

// Also export components for library use
export * from './config.js';
export * from './request-schema.js';
export * from './inference-api-server.js';
export * from './models/mock-models.js';

function logSampleCommands(port: number): void {
  const url = `http://localhost:${port}/api/v1/infer`;
  const curl = (body: object, flags = '') =>
    [
      `   curl ${flags}-X POST "${url}" \\`,
      '   -H "Content-Type: application/json" \\',
      `   -d '${JSON.stringify(body)}'`,
    ].join('\n');

  logger.info(
    [
      'Try the following commands:',
      '',
      '1. LLM stream (SSE) - worker 0:',
      curl({ args: ['Hello'], kwargs: { steps: 5 }, stream: true, target: 0 }, '-N '),
      '',
      '2. TTS stream (binary audio, 256-byte frames) - worker 1:',
      curl({ args: ['Hello world'], stream: true, media_type: 'audio/wav', chunk_size: 256, target: 'tts' }, '-N ') +
        ' \\\n   --output out.wav',
      '',
      '3. Async model (unary JSON) - worker 2:',
      curl({ args: ['test query'], stream: false, target: 'async' }),
      '',
      '4. Universal model in audio mode - worker 3:',
      curl(
        { args: ['Hi'], kwargs: { mode: 'audio' }, stream: true, media_type: 'audio/wav', chunk_size: 300, target: 3 },
        '-N '
      ) + ' \\\n   --output universal.wav',
    ].join('\n')
  );
}

async function main() {
  const gatewayConfig = loadGatewayConfig();
  logger.info('Starting LightInfer server with config:', gatewayConfig);

  const pool = new WorkerPool({
    workerList: [new MockLLM(), new MockTTS(), new AsyncMockModel(), new UniversalMockModel()],
    queueCapacity: gatewayConfig.queueCapacity,
    defaultChunkSize: gatewayConfig.defaultChunkSize,
  });
  const server = new InferenceAPIServer(gatewayConfig, pool);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    server
      .stop({ drain: true })
      .then(() => process.exit(0))
      .catch(error => {
        logger.error('Error during shutdown:', error);
        process.exit(1);
      });
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  try {
    await server.start();
    logSampleCommands(server.port);
  } catch (error) {
    logger.error('Failed to start LightInfer server:', error);
    process.exit(1);
  }
}

// Only run main if this file is executed directly
if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch(error => {
    logger.error('Unhandled error in main:', error);
    process.exit(1);
  });
}

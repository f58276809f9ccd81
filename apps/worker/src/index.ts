// Worker package exports - the dispatcher core the gateway builds on

export * from './connectors/index.js';
export * from './output-channel.js';
export * from './job-router.js';
export * from './pool-worker.js';
export * from './worker-pool.js';
export * from './stream-encoder.js';

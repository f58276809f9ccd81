// Export all types from a central location

export * from './job.js';
export * from './worker.js';

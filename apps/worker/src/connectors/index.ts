// Connector exports

export * from './base-connector.js';
export * from './model-connector.js';

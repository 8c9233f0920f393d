// Connector Manager
export * from './connector-manager.js';

// Connectors, protocol layer and artifact resolver
export * from './connectors/index.js';

// Execution
export * from './job-executor.js';
export * from './worker-pool.js';
export * from './runtime.js';

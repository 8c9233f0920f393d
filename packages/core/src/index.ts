// Core types
export * from './types/index.js';

// Contracts
export * from './interfaces/index.js';

// Lifecycle and errors
export * from './job-lifecycle.js';
export * from './errors.js';

// Redis implementations
export * from './redis-job-store.js';
export * from './redis-job-queue.js';
export * from './in-memory-job-store.js';

// Configuration and utilities
export * from './config.js';
export * from './utils/logger.js';
export * from './utils/params.js';

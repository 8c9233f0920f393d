export * from './job.js';
export * from './connector.js';

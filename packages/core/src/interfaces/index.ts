export * from './job-store.js';
export * from './job-queue.js';

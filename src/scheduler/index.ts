export * from './scheduler.js';
export * from './job-queue.js';

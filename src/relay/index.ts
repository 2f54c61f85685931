export * from './change-detector.js';
export * from './report-service.js';
export { CommandRouter, PROGRESS_TEXT, type CommandRouterOptions } from './command-router.js';

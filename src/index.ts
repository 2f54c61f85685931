// Board relay - Trello board reports and change alerts for Telegram
// Main entry point for library usage

export * from './config/index.js';
export * from './board/index.js';
export * from './reports/report-formatter.js';
export * from './channels/index.js';
export * from './state/state-store.js';
export * from './relay/index.js';
export * from './scheduler/index.js';
export { Gateway, setupGracefulShutdown, JOB_NAMES, type GatewayOptions } from './gateway/gateway.js';
export * from './utils/index.js';

export * from './models';
export * from './engine';
export * from './store';
export * from './reports';
export { createLogger, silentLogger, LOG_LEVELS } from './logging/logger';
export type { LogLevel, Logger, LogSink } from './logging/logger';
export { loadConfig, parseConfig, type LedgerConfig } from './config/env';

// Structured logging
export type { LogContext, LogLevel } from './types.js';

export type { Logger } from './logger.js';
export { createLogger, createSilentLogger, resolveLogLevel } from './logger.js';

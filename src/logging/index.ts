export { logger } from './logger.js';
export { LogLevel, type LogEntry, type LoggerConfig } from './types.js';

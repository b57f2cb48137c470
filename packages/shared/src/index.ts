// Shared configuration and logging for aurora-xcc packages

export { getConfig, loadConfig, logLevelFrom, LOG_LEVELS } from './config.js';
export type { Config, LogLevel } from './config.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';

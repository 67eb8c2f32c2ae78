export * from './constants.js';
export * from './types.js';
export { logger, Logger, formatArg } from './logger.js';
export type { LogLevel } from './logger.js';

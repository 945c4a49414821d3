/**
 * Utils Module - Utility functions and helpers
 */

export { logger, initLogger, getLogger, getDefaultLogDir, LogLevel } from './logger.js';
export type { Logger, LoggerConfig } from './logger.js';
export { SetupError, SetupErrorCode, isSetupError, errorMessage } from './errors.js';

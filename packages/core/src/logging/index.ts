/**
 * @fileoverview Logging exports
 */

export {
  ShellLogger,
  ComponentLogger,
  LOG_LEVELS,
  isLogLevel,
  getLogger,
  configureLogger,
  setLogLevel,
  createLogger,
  resetLogger,
  type LogLevel,
  type LoggerOptions,
  type LogContext,
} from './logger.js';

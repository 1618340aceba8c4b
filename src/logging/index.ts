/**
 * Logging Module
 * @module logging
 */

export {
  type LogContext,
  type LoggerConfig,
  type DomainLogMethods,
  type StructuredLogger,
  createLogger,
  getLogger,
  initLogger,
  resetLogger,
  createModuleLogger,
  withTiming,
} from './logger.js';

/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Structured logging with Pino for the cache hierarchy simulator.
 * Includes domain-specific methods for simulation runs, trace replay,
 * configuration and notifier failures.
 */

import pino, { Logger, LoggerOptions, DestinationStream } from 'pino';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  module?: string;
  simulation?: string;
  level?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  service: string;
  version: string;
  environment: string;
}

/**
 * Domain-specific logging methods
 */
export interface DomainLogMethods {
  child(bindings: LogContext): StructuredLogger;
  withContext(context: LogContext): StructuredLogger;

  // Simulation lifecycle
  simulationStarted(simulation: string, levelCount: number, metadata?: Record<string, unknown>): void;
  simulationCompleted(simulation: string, accesses: number, duration: number, skipped?: number): void;
  simulationFailed(simulation: string, error: Error): void;
  traceLineSkipped(lineNumber: number, error: Error): void;

  // Configuration
  configLoaded(source: string, levelCount: number): void;
  levelConfigured(level: string, geometry: Record<string, unknown>): void;

  // Hierarchy side channels
  notifierFailed(hook: string, level: string, address: number, error: Error): void;

  performanceMetric(operation: string, duration: number, metadata?: Record<string, unknown>): void;
}

/**
 * Pino logger extended with domain methods
 */
export type StructuredLogger = Omit<Logger, 'child'> & DomainLogMethods;

// ============================================================================
// Default Configuration
// ============================================================================

function defaultConfig(): LoggerConfig {
  return {
    level: process.env.LOG_LEVEL || 'info',
    pretty: process.env.LOG_PRETTY === 'true',
    service: process.env.SERVICE_NAME || 'cachesim',
    version: process.env.SERVICE_VERSION || '1.0.0',
    environment: process.env.NODE_ENV || 'development',
  };
}

function errorCode(error: Error): unknown {
  return 'code' in error ? error.code : undefined;
}

// ============================================================================
// Domain Method Extensions
// ============================================================================

/**
 * Extends a Pino logger with domain-specific methods
 */
function extendWithDomainMethods(logger: Logger): StructuredLogger {
  // Object.assign below replaces child; keep pino's own for the overrides
  const originalChild = logger.child.bind(logger);

  const methods: DomainLogMethods = {
    child(bindings: LogContext): StructuredLogger {
      return extendWithDomainMethods(originalChild(bindings));
    },

    withContext(context: LogContext): StructuredLogger {
      return extendWithDomainMethods(originalChild(context));
    },

    simulationStarted(simulation, levelCount, metadata) {
      logger.info(
        {
          event: 'simulation_started',
          simulation,
          levelCount,
          ...metadata,
        },
        `Simulation ${simulation} started with ${levelCount} levels`
      );
    },

    simulationCompleted(simulation, accesses, duration, skipped) {
      logger.info(
        {
          event: 'simulation_completed',
          simulation,
          accesses,
          skipped,
          durationMs: duration,
          accessesPerSecond: duration > 0 ? Math.round((accesses / duration) * 1000) : 0,
        },
        `Simulation completed: ${accesses} accesses${skipped ? `, ${skipped} skipped` : ''} in ${duration}ms`
      );
    },

    simulationFailed(simulation, error) {
      logger.error(
        {
          event: 'simulation_failed',
          simulation,
          err: error,
          errorCode: errorCode(error),
        },
        `Simulation failed: ${error.message}`
      );
    },

    traceLineSkipped(lineNumber, error) {
      logger.warn(
        {
          event: 'trace_line_skipped',
          lineNumber,
          errorCode: errorCode(error),
        },
        `Skipping trace line ${lineNumber}: ${error.message}`
      );
    },

    configLoaded(source, levelCount) {
      logger.debug(
        {
          event: 'config_loaded',
          source,
          levelCount,
        },
        `Configuration loaded from ${source} (${levelCount} levels)`
      );
    },

    levelConfigured(level, geometry) {
      logger.debug(
        {
          event: 'level_configured',
          level,
          ...geometry,
        },
        `Cache level ${level} configured`
      );
    },

    notifierFailed(hook, level, address, error) {
      logger.warn(
        {
          event: 'notifier_failed',
          hook,
          level,
          address,
          err: error,
        },
        `Notifier hook ${hook} failed at ${level} for 0x${address.toString(16)}: ${error.message}`
      );
    },

    performanceMetric(operation, duration, metadata) {
      logger.debug(
        {
          event: 'performance_metric',
          operation,
          durationMs: duration,
          ...metadata,
        },
        `${operation}: ${duration}ms`
      );
    },
  };

  return Object.assign(logger, methods);
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(
  name: string,
  baseContext?: LogContext,
  overrides: Partial<LoggerConfig> = {}
): StructuredLogger {
  const config = { ...defaultConfig(), ...overrides };

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
      env: config.environment,
    },
  };

  let destination: DestinationStream | undefined;

  if (config.pretty && config.environment !== 'production') {
    destination = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    });
  } else {
    // stdout carries reports; logs go to stderr
    destination = pino.destination(2);
  }

  const baseLogger = pino(options, destination);
  const logger = baseContext ? baseLogger.child(baseContext) : baseLogger;

  return extendWithDomainMethods(logger);
}

// ============================================================================
// Singleton Root Logger
// ============================================================================

let rootLogger: StructuredLogger | null = null;

/**
 * Gets the root logger instance (creates if not exists)
 */
export function getLogger(): StructuredLogger {
  if (!rootLogger) {
    rootLogger = createLogger('cachesim');
  }
  return rootLogger;
}

/**
 * Replaces the root logger, e.g. once the configuration's logging section is known
 */
export function initLogger(context?: LogContext, overrides?: Partial<LoggerConfig>): StructuredLogger {
  rootLogger = createLogger('cachesim', context, overrides);
  return rootLogger;
}

/**
 * Resets the root logger (primarily for testing)
 */
export function resetLogger(): void {
  rootLogger = null;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Creates a logger for a specific module/component
 */
export function createModuleLogger(moduleName: string): StructuredLogger {
  return getLogger().child({ module: moduleName });
}

/**
 * Wraps a synchronous function with timing and logging
 */
export function withTiming<T>(logger: StructuredLogger, operation: string, fn: () => T): T {
  const startTime = Date.now();
  try {
    const result = fn();
    logger.performanceMetric(operation, Date.now() - startTime, { status: 'success' });
    return result;
  } catch (error) {
    logger.performanceMetric(operation, Date.now() - startTime, { status: 'error' });
    throw error;
  }
}

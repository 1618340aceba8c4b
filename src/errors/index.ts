/**
 * Error Handling Module
 * @module errors
 *
 * Error classes and code tables for the cache hierarchy simulator.
 *
 * @example
 * ```typescript
 * import { ConfigurationError, ProtocolError, isBaseError } from './errors/index.js';
 *
 * throw ConfigurationError.geometry('blockSize', 'blockSize must be a power of two', 'L1');
 * ```
 */

// ============================================================================
// Error Codes
// ============================================================================

export {
  ConfigErrorCodes,
  ProtocolErrorCodes,
  CacheSetErrorCodes,
  TraceErrorCodes,
  GeneralErrorCodes,
  ErrorCodes,
  ExitCodes,
  type ErrorCode,
  type ConfigErrorCode,
  type ProtocolErrorCode,
  type CacheSetErrorCode,
  type TraceErrorCode,
  type GeneralErrorCode,
  type ExitCode,
  getExitCodeForCode,
  isConfigurationCode,
} from './codes.js';

// ============================================================================
// Base Error Classes
// ============================================================================

export {
  BaseError,
  type ErrorContext,
  type SerializedError,
  isBaseError,
  isOperationalError,
  hasErrorCode,
  wrapError,
  getErrorMessage,
} from './base.js';

// ============================================================================
// Domain Errors
// ============================================================================

export {
  ConfigurationError,
  type ConfigIssue,
  ProtocolError,
  CapacityExceededError,
  BlockNotFoundError,
  DuplicateBlockError,
  TraceParseError,
  TraceReadError,
} from './domain.js';

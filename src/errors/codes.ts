/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the cache hierarchy simulator.
 * Provides typed error codes and their mapping to CLI exit codes.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * Configuration Error Codes
 */
export const ConfigErrorCodes = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  CONFIG_VALIDATION_ERROR: 'CONFIG_VALIDATION_ERROR',
  CONFIG_FILE_ERROR: 'CONFIG_FILE_ERROR',

  // Geometry / policy
  INVALID_GEOMETRY: 'INVALID_GEOMETRY',
  INVALID_POLICY: 'INVALID_POLICY',
  INVALID_TOPOLOGY: 'INVALID_TOPOLOGY',
} as const;

export type ConfigErrorCode = typeof ConfigErrorCodes[keyof typeof ConfigErrorCodes];

/**
 * Protocol Error Codes (malformed requests against a cache level)
 */
export const ProtocolErrorCodes = {
  PROTOCOL_ERROR: 'PROTOCOL_ERROR',
  UNKNOWN_OPERATION: 'UNKNOWN_OPERATION',
  INVALID_ADDRESS: 'INVALID_ADDRESS',
} as const;

export type ProtocolErrorCode = typeof ProtocolErrorCodes[keyof typeof ProtocolErrorCodes];

/**
 * Cache Set Contract Codes
 *
 * Raised only when a level sequences set operations incorrectly.
 */
export const CacheSetErrorCodes = {
  CAPACITY_EXCEEDED: 'CAPACITY_EXCEEDED',
  BLOCK_NOT_FOUND: 'BLOCK_NOT_FOUND',
  DUPLICATE_BLOCK: 'DUPLICATE_BLOCK',
} as const;

export type CacheSetErrorCode = typeof CacheSetErrorCodes[keyof typeof CacheSetErrorCodes];

/**
 * Trace Error Codes
 */
export const TraceErrorCodes = {
  TRACE_PARSE_ERROR: 'TRACE_PARSE_ERROR',
  TRACE_READ_ERROR: 'TRACE_READ_ERROR',
} as const;

export type TraceErrorCode = typeof TraceErrorCodes[keyof typeof TraceErrorCodes];

/**
 * General Error Codes
 */
export const GeneralErrorCodes = {
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const;

export type GeneralErrorCode = typeof GeneralErrorCodes[keyof typeof GeneralErrorCodes];

// ============================================================================
// Combined Error Codes
// ============================================================================

export const ErrorCodes = {
  ...ConfigErrorCodes,
  ...ProtocolErrorCodes,
  ...CacheSetErrorCodes,
  ...TraceErrorCodes,
  ...GeneralErrorCodes,
} as const;

export type ErrorCode =
  | ConfigErrorCode
  | ProtocolErrorCode
  | CacheSetErrorCode
  | TraceErrorCode
  | GeneralErrorCode;

// ============================================================================
// Exit Code Mapping
// ============================================================================

export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  CONFIGURATION: 2,
} as const;

export type ExitCode = typeof ExitCodes[keyof typeof ExitCodes];

const configCodes: ReadonlySet<string> = new Set(Object.values(ConfigErrorCodes));

/**
 * Map an error code to the process exit code used by the CLI
 */
export function getExitCodeForCode(code: ErrorCode): ExitCode {
  return configCodes.has(code) ? ExitCodes.CONFIGURATION : ExitCodes.FAILURE;
}

/**
 * Check whether a code belongs to the configuration category
 */
export function isConfigurationCode(code: ErrorCode): code is ConfigErrorCode {
  return configCodes.has(code);
}

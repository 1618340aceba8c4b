/**
 * Domain Error Classes
 * @module errors/domain
 *
 * Error classes for configuration, cache protocol, cache set contract and
 * trace failures.
 */

import { BaseError, ErrorContext } from './base.js';
import {
  ConfigErrorCode,
  ConfigErrorCodes,
  ProtocolErrorCode,
  ProtocolErrorCodes,
  CacheSetErrorCodes,
  TraceErrorCodes,
} from './codes.js';

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * A single configuration problem, addressed by its path in the config tree
 */
export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Invalid cache geometry, policy, topology or configuration file.
 * Fatal at construction; never recovered.
 */
export class ConfigurationError extends BaseError {
  public readonly configKey: string;
  public readonly issues: ConfigIssue[];

  constructor(
    configKey: string,
    message?: string,
    code: ConfigErrorCode = ConfigErrorCodes.CONFIGURATION_ERROR,
    context: ErrorContext = {},
    issues: ConfigIssue[] = []
  ) {
    super(message ?? `Invalid or missing configuration: ${configKey}`, code, context, true);
    this.name = 'ConfigurationError';
    this.configKey = configKey;
    this.issues = issues;
  }

  static geometry(configKey: string, message: string, level?: string): ConfigurationError {
    return new ConfigurationError(configKey, message, ConfigErrorCodes.INVALID_GEOMETRY, { level });
  }

  static policy(configKey: string, value: string, allowed: readonly string[], level?: string): ConfigurationError {
    return new ConfigurationError(
      configKey,
      `Unsupported ${configKey} '${value}' (expected one of ${allowed.join(', ')})`,
      ConfigErrorCodes.INVALID_POLICY,
      { level, details: { value, allowed } }
    );
  }

  static topology(message: string, level?: string): ConfigurationError {
    return new ConfigurationError('levels', message, ConfigErrorCodes.INVALID_TOPOLOGY, { level });
  }

  static validation(issues: ConfigIssue[], source: string): ConfigurationError {
    const summary = issues.map(issue => `${issue.path}: ${issue.message}`).join('; ');
    return new ConfigurationError(
      source,
      `Configuration validation failed: ${summary}`,
      ConfigErrorCodes.CONFIG_VALIDATION_ERROR,
      { details: { source } },
      issues
    );
  }

  static file(filePath: string, cause: Error): ConfigurationError {
    return new ConfigurationError(
      filePath,
      `Cannot load configuration file ${filePath}: ${cause.message}`,
      ConfigErrorCodes.CONFIG_FILE_ERROR,
      { cause }
    );
  }

  toJSON() {
    return {
      ...super.toJSON(),
      configKey: this.configKey,
      issues: this.issues,
    };
  }
}

// ============================================================================
// Protocol Errors
// ============================================================================

/**
 * Malformed request against a cache level. Raised before any state changes.
 */
export class ProtocolError extends BaseError {
  constructor(
    message: string,
    code: ProtocolErrorCode = ProtocolErrorCodes.PROTOCOL_ERROR,
    context: ErrorContext = {}
  ) {
    super(message, code, context, true);
    this.name = 'ProtocolError';
  }

  static unknownOperation(operation: unknown, context: ErrorContext = {}): ProtocolError {
    return new ProtocolError(
      `Unknown operation code '${String(operation)}'`,
      ProtocolErrorCodes.UNKNOWN_OPERATION,
      { ...context, details: { ...context.details, operation } }
    );
  }

  static invalidAddress(address: unknown, context: ErrorContext = {}): ProtocolError {
    return new ProtocolError(
      `Address must be a non-negative safe integer, got ${String(address)}`,
      ProtocolErrorCodes.INVALID_ADDRESS,
      { ...context, details: { ...context.details, address } }
    );
  }
}

// ============================================================================
// Cache Set Contract Violations
// ============================================================================

/**
 * Insert into a full set. Indicates a sequencing bug in the owning level.
 */
export class CapacityExceededError extends BaseError {
  public readonly tag: number;
  public readonly associativity: number;

  constructor(tag: number, associativity: number) {
    super(
      `Cannot insert tag 0x${tag.toString(16)}: set already holds ${associativity} blocks`,
      CacheSetErrorCodes.CAPACITY_EXCEEDED,
      { details: { tag, associativity } },
      false
    );
    this.name = 'CapacityExceededError';
    this.tag = tag;
    this.associativity = associativity;
  }
}

/**
 * Operation on a tag the set does not hold.
 */
export class BlockNotFoundError extends BaseError {
  public readonly tag: number;

  constructor(tag: number) {
    super(
      `Tag 0x${tag.toString(16)} is not resident in this set`,
      CacheSetErrorCodes.BLOCK_NOT_FOUND,
      { details: { tag } },
      false
    );
    this.name = 'BlockNotFoundError';
    this.tag = tag;
  }
}

/**
 * Insert of a tag the set already holds.
 */
export class DuplicateBlockError extends BaseError {
  public readonly tag: number;

  constructor(tag: number) {
    super(
      `Tag 0x${tag.toString(16)} is already resident in this set`,
      CacheSetErrorCodes.DUPLICATE_BLOCK,
      { details: { tag } },
      false
    );
    this.name = 'DuplicateBlockError';
    this.tag = tag;
  }
}

// ============================================================================
// Trace Errors
// ============================================================================

/**
 * Malformed trace line
 */
export class TraceParseError extends BaseError {
  public readonly lineNumber: number;
  public readonly line: string;

  constructor(message: string, lineNumber: number, line: string, context: ErrorContext = {}) {
    super(
      `Line ${lineNumber}: ${message}`,
      TraceErrorCodes.TRACE_PARSE_ERROR,
      { ...context, details: { ...context.details, lineNumber, line } },
      true
    );
    this.name = 'TraceParseError';
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

/**
 * Trace file could not be opened or read
 */
export class TraceReadError extends BaseError {
  public readonly filePath: string;

  constructor(filePath: string, cause: Error) {
    super(
      `Cannot read trace file ${filePath}: ${cause.message}`,
      TraceErrorCodes.TRACE_READ_ERROR,
      { cause, details: { filePath } },
      true
    );
    this.name = 'TraceReadError';
    this.filePath = filePath;
  }
}

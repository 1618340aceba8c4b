/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas for hierarchy configuration files.
 * Geometry arithmetic (powers of two, divisibility) is checked again when the
 * levels are built; the schema covers shape, ranges and names.
 */

import { z } from 'zod';
import { isEvictionPolicy } from '../cache/eviction-policy.js';
import { EVICTION_POLICIES, WRITE_POLICIES } from '../cache/types.js';

// ============================================================================
// Logging Configuration
// ============================================================================

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

export const LoggingConfigSchema = z.object({
  level: LogLevel.default('info'),
  /** Pretty-print logs with pino-pretty */
  pretty: z.boolean().default(false),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ============================================================================
// Level Configuration
// ============================================================================

const positiveInt = (label: string) =>
  z.coerce.number({ invalid_type_error: `${label} must be a number` }).int().positive();

export const LevelConfigSchema = z.object({
  /** Level name, unique within the hierarchy */
  name: z.string().min(1),
  /** Total capacity in bytes */
  size: positiveInt('size'),
  /** Block size in bytes */
  blockSize: positiveInt('blockSize'),
  associativity: positiveInt('associativity'),
  evictionPolicy: z.string().refine(
    value => isEvictionPolicy(value.trim().toUpperCase()),
    { message: `evictionPolicy must be one of ${EVICTION_POLICIES.join(', ')}` }
  ),
  /** Only write-back is supported */
  writePolicy: z.string().refine(
    value => WRITE_POLICIES.some(policy => policy === value.trim().toUpperCase()),
    { message: 'writePolicy must be write-back (WB)' }
  ),
});

export type LevelConfig = z.infer<typeof LevelConfigSchema>;

// ============================================================================
// Simulation Configuration
// ============================================================================

export const DirtyOwnershipSchema = z.enum(['entry', 'authoritative']);

export const OnErrorSchema = z.enum(['abort', 'skip']);
export type OnError = z.infer<typeof OnErrorSchema>;

export const SimulatorConfigSchema = z.object({
  name: z.string().min(1).default('hierarchy'),
  /** Which level marks written blocks dirty */
  dirtyOwnership: DirtyOwnershipSchema.default('entry'),
  /** What trace replay does with a malformed or unknown line */
  onError: OnErrorSchema.default('abort'),
  /** Levels from the requester side (L1) to the backing side */
  levels: z.array(LevelConfigSchema).min(1, 'at least one level is required'),
  logging: LoggingConfigSchema.default({}),
}).superRefine((config, ctx) => {
  const seen = new Set<string>();
  config.levels.forEach((level, index) => {
    if (seen.has(level.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['levels', index, 'name'],
        message: `duplicate level name ${level.name}`,
      });
    }
    seen.add(level.name);
  });
});

export type SimulatorConfig = z.infer<typeof SimulatorConfigSchema>;

/**
 * Raw values contributed by one configuration source before validation
 */
export type ConfigLayer = Record<string, unknown>;

/**
 * Known keys a source may set; validated only after merging
 */
export type PartialSimulatorConfig = {
  name?: string;
  dirtyOwnership?: string;
  onError?: string;
  levels?: unknown[];
  logging?: {
    level?: string;
    pretty?: boolean;
  };
};

/**
 * Configuration Loader
 * @module config/loader
 *
 * Multi-source configuration loading with validation. Sources are merged in
 * priority order (file < environment < explicit overrides) and the result is
 * validated against {@link SimulatorConfigSchema}.
 */

import { existsSync, readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError, getErrorMessage } from '../errors/index.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';
import { ConfigLayer, PartialSimulatorConfig, SimulatorConfig, SimulatorConfigSchema } from './schema.js';

// Resolved per call so a root logger set up after import is picked up
function loaderLogger(): StructuredLogger {
  return createModuleLogger('config-loader');
}

// ============================================================================
// Configuration Source Interface
// ============================================================================

/**
 * Configuration source interface
 * Sources are loaded in order of priority (lowest first, highest overrides)
 */
export interface ConfigSource {
  /** Unique name for the source */
  name: string;
  /** Priority level (higher = overrides lower) */
  priority: number;
  load(): Promise<ConfigLayer>;
  isAvailable(): boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Recursively remove undefined values from an object
 */
function filterUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) {
      continue;
    }
    if (isRecord(value)) {
      const filtered = filterUndefined(value);
      if (Object.keys(filtered).length > 0) {
        result[key] = filtered;
      }
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Deep-merge plain objects; arrays and scalars from `override` replace `base`
 */
function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    result[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
  }

  return result;
}

// ============================================================================
// Environment Variable Configuration Source
// ============================================================================

/**
 * Maps environment variables onto the configuration structure
 */
export class EnvironmentConfigSource implements ConfigSource {
  public readonly name = 'environment';
  public readonly priority = 10;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<ConfigLayer> {
    const env = this.env;

    return filterUndefined({
      name: env.CACHESIM_NAME,
      onError: env.CACHESIM_ON_ERROR,
      dirtyOwnership: env.CACHESIM_DIRTY_OWNERSHIP,
      logging: {
        level: env.LOG_LEVEL,
        pretty: env.LOG_PRETTY ? env.LOG_PRETTY === 'true' : undefined,
      },
    });
  }
}

// ============================================================================
// File Configuration Source
// ============================================================================

/**
 * YAML (or JSON) hierarchy file
 */
export class FileConfigSource implements ConfigSource {
  public readonly name: string;
  public readonly priority: number;

  constructor(
    private readonly filePath: string,
    priority = 5
  ) {
    this.name = `file:${filePath}`;
    this.priority = priority;
  }

  isAvailable(): boolean {
    return existsSync(this.filePath);
  }

  async load(): Promise<ConfigLayer> {
    if (!this.isAvailable()) {
      throw ConfigurationError.file(this.filePath, new Error('file not found'));
    }

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      throw ConfigurationError.file(
        this.filePath,
        error instanceof Error ? error : new Error(getErrorMessage(error))
      );
    }

    if (!isRecord(parsed)) {
      throw ConfigurationError.file(this.filePath, new Error('top level must be a mapping'));
    }

    loaderLogger().debug({ filePath: this.filePath }, 'Loaded config from file');
    return parsed;
  }
}

// ============================================================================
// Static Configuration Source
// ============================================================================

/**
 * In-memory values, e.g. command-line flags
 */
export class StaticConfigSource implements ConfigSource {
  constructor(
    public readonly name: string,
    private readonly values: PartialSimulatorConfig,
    public readonly priority = 20
  ) {}

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<ConfigLayer> {
    return filterUndefined({ ...this.values });
  }
}

// ============================================================================
// Configuration Loader
// ============================================================================

export class ConfigLoader {
  private sources: ConfigSource[] = [];

  constructor(sources: ConfigSource[] = []) {
    for (const source of sources) {
      this.addSource(source);
    }
  }

  addSource(source: ConfigSource): this {
    this.sources.push(source);
    this.sources.sort((a, b) => a.priority - b.priority);
    return this;
  }

  getSources(): readonly ConfigSource[] {
    return this.sources;
  }

  /**
   * Load, merge and validate all sources
   */
  async load(): Promise<SimulatorConfig> {
    let merged: Record<string, unknown> = {};

    for (const source of this.sources) {
      const layer = await source.load();
      merged = deepMerge(merged, layer);
    }

    const sourceNames = this.sources.map(source => source.name).join(', ');
    return validateConfig(merged, sourceNames);
  }
}

/**
 * Validate a raw configuration object
 */
export function validateConfig(raw: unknown, source = 'inline'): SimulatorConfig {
  const result = SimulatorConfigSchema.safeParse(raw);

  if (!result.success) {
    throw ConfigurationError.validation(
      result.error.errors.map(issue => ({
        path: issue.path.join('.') || '(root)',
        message: issue.message,
      })),
      source
    );
  }

  loaderLogger().configLoaded(source, result.data.levels.length);
  return result.data;
}

export interface LoadConfigOptions {
  configPath: string;
  /** Highest-priority values, e.g. from command-line flags */
  overrides?: PartialSimulatorConfig;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load a hierarchy file with environment and explicit overrides applied
 */
export async function loadConfig(options: LoadConfigOptions): Promise<SimulatorConfig> {
  const loader = new ConfigLoader([
    new FileConfigSource(options.configPath),
    new EnvironmentConfigSource(options.env),
  ]);

  if (options.overrides) {
    loader.addSource(new StaticConfigSource('overrides', options.overrides));
  }

  return loader.load();
}

/**
 * Configuration Module
 * @module config
 */

export {
  LogLevel,
  LoggingConfigSchema,
  LevelConfigSchema,
  DirtyOwnershipSchema,
  OnErrorSchema,
  SimulatorConfigSchema,
  type LoggingConfig,
  type LevelConfig,
  type OnError,
  type SimulatorConfig,
  type ConfigLayer,
  type PartialSimulatorConfig,
} from './schema.js';

export {
  ConfigLoader,
  EnvironmentConfigSource,
  FileConfigSource,
  StaticConfigSource,
  loadConfig,
  validateConfig,
  type ConfigSource,
  type LoadConfigOptions,
} from './loader.js';

/**
 * cachesim
 *
 * Multi-level, set-associative, write-back, write-allocate, inclusive
 * cache hierarchy simulator.
 */

export {
  Operation,
  EVICTION_POLICIES,
  WRITE_POLICIES,
  isAccessOperation,
  type AccessOperation,
  type EvictionPolicyName,
  type DirtyOwnership,
  type CacheLevelConfig,
  type HierarchyNotifier,
  type CachePort,
  type LevelTopology,
  type BlockSnapshot,
  type SetSnapshot,
  type LevelSnapshot,
} from './cache/types.js';
export { AddressDecoder, computeNumSets, isPowerOfTwo, type CacheGeometry, type DecodedAddress } from './cache/address-decoder.js';
export { parseEvictionPolicy, selectVictim, type OrderedTags } from './cache/eviction-policy.js';
export { CacheSet, type BlockEntry } from './cache/cache-set.js';
export { CacheLevel, type CacheLevelDependencies, type CacheLevelGeometry } from './cache/cache-level.js';

export { LevelRegistry } from './hierarchy/level-registry.js';
export {
  CacheHierarchy,
  type HierarchySpec,
  type HierarchyOptions,
  type LevelSpec,
  type InclusionViolation,
} from './hierarchy/cache-hierarchy.js';

export { StatsCollector, type LevelCounters, type LevelStats } from './stats/stats-collector.js';
export {
  parseAddress,
  parseTraceLine,
  parseTraceLines,
  parseTrace,
  readTraceFile,
  type TraceEntry,
  type TraceLineResult,
} from './trace/trace-parser.js';
export { Simulator, type SimulatorOptions, type SimulationReport, type SkippedLine } from './simulator/simulator.js';
export { formatReport, formatGeometry, type ReportFormat } from './report/formatter.js';

export * from './config/index.js';
export * from './errors/index.js';
export * from './logging/index.js';

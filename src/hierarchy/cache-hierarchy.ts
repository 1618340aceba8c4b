/**
 * Cache Hierarchy
 * @module hierarchy/cache-hierarchy
 *
 * Builds a chain of cache levels from configuration, listed from the
 * requester side (L1) to the backing side (last level), and wires each
 * level's neighbours by name through a shared {@link LevelRegistry}.
 *
 * Each hierarchy owns its registry and levels; instances share no mutable
 * state. Calls into one hierarchy must be serialized by the caller.
 */

import { CacheLevel } from '../cache/cache-level.js';
import {
  AccessOperation,
  CacheLevelConfig,
  DirtyOwnership,
  HierarchyNotifier,
  LevelSnapshot,
  Operation,
} from '../cache/types.js';
import { ConfigurationError } from '../errors/index.js';
import { StructuredLogger, createModuleLogger } from '../logging/index.js';
import { LevelRegistry } from './level-registry.js';

/**
 * Level settings without links; links are derived from list order
 */
export type LevelSpec = Omit<CacheLevelConfig, 'requesterSide' | 'backingSide'>;

export interface HierarchySpec {
  name?: string;
  dirtyOwnership?: DirtyOwnership;
  levels: LevelSpec[];
}

export interface HierarchyOptions {
  notifier: HierarchyNotifier;
  logger?: StructuredLogger;
}

/**
 * A block resident at a requester-side level but missing from its backing side
 */
export interface InclusionViolation {
  level: string;
  backingSide: string;
  address: number;
}

export class CacheHierarchy {
  readonly name: string;
  readonly dirtyOwnership: DirtyOwnership;
  private readonly registry: LevelRegistry;
  private readonly chain: CacheLevel[];

  private constructor(name: string, dirtyOwnership: DirtyOwnership, registry: LevelRegistry, chain: CacheLevel[]) {
    this.name = name;
    this.dirtyOwnership = dirtyOwnership;
    this.registry = registry;
    this.chain = chain;
  }

  static fromConfig(spec: HierarchySpec, options: HierarchyOptions): CacheHierarchy {
    if (spec.levels.length === 0) {
      throw ConfigurationError.topology('A hierarchy needs at least one level');
    }

    spec.levels.forEach((level, position) => {
      const next = spec.levels[position + 1];
      if (next && next.blockSize < level.blockSize) {
        throw ConfigurationError.topology(
          `Level ${next.name} has blockSize ${next.blockSize}, smaller than requester-side ${level.name} (${level.blockSize})`,
          next.name
        );
      }
    });

    const logger = options.logger ?? createModuleLogger('hierarchy');
    const registry = new LevelRegistry();
    const dirtyOwnership = spec.dirtyOwnership ?? 'entry';

    const chain = spec.levels.map((level, position) => {
      const cacheLevel = new CacheLevel(
        {
          ...level,
          requesterSide: spec.levels[position - 1]?.name,
          backingSide: spec.levels[position + 1]?.name,
        },
        { topology: registry, notifier: options.notifier, dirtyOwnership, logger }
      );
      registry.register(cacheLevel);
      return cacheLevel;
    });

    return new CacheHierarchy(spec.name ?? 'hierarchy', dirtyOwnership, registry, chain);
  }

  /**
   * The level requests enter at
   */
  get entry(): CacheLevel {
    return this.chain[0];
  }

  get levels(): readonly CacheLevel[] {
    return this.chain;
  }

  level(name: string): CacheLevel {
    const level = this.chain.find(candidate => candidate.name === name);
    if (!level) {
      throw new ConfigurationError('levels', `Unknown level ${name} (known: ${this.registry.names().join(', ')})`);
    }
    return level;
  }

  access(operation: AccessOperation, address: number): void {
    this.entry.access(operation, address);
  }

  read(address: number): void {
    this.access(Operation.Read, address);
  }

  write(address: number): void {
    this.access(Operation.Write, address);
  }

  snapshot(): LevelSnapshot[] {
    return this.chain.map(level => level.snapshot());
  }

  /**
   * Blocks held by a level whose backing side does not hold them
   */
  inclusionViolations(): InclusionViolation[] {
    const violations: InclusionViolation[] = [];

    this.chain.forEach((level, position) => {
      const backing = this.chain[position + 1];
      if (!backing) return;

      for (const set of level.snapshot().sets) {
        for (const block of set.blocks) {
          if (!backing.hasBlock(block.address)) {
            violations.push({ level: level.name, backingSide: backing.name, address: block.address });
          }
        }
      }
    });

    return violations;
  }
}

/**
 * Cache Level
 * @module cache/cache-level
 *
 * One write-back, write-allocate level of an inclusive hierarchy. Drives the
 * hit / miss / eviction / invalidation protocol for its own sets and talks to
 * its neighbours only through the {@link CachePort} calls, resolved by name
 * through a {@link LevelTopology} at call time.
 *
 * Misses fetch from the backing side; dirty victims are written back to the
 * backing side; evictions invalidate the requester side first so inner copies
 * never outlive the outer one.
 */

import { ConfigurationError, ProtocolError, getErrorMessage } from '../errors/index.js';
import { StructuredLogger, createModuleLogger } from '../logging/index.js';
import { AddressDecoder, CacheGeometry } from './address-decoder.js';
import { CacheSet } from './cache-set.js';
import { parseEvictionPolicy } from './eviction-policy.js';
import {
  AccessOperation,
  CacheLevelConfig,
  CachePort,
  DirtyOwnership,
  EvictionPolicyName,
  HierarchyNotifier,
  LevelSnapshot,
  LevelTopology,
  Operation,
  WRITE_POLICIES,
  isAccessOperation,
} from './types.js';

export interface CacheLevelDependencies {
  topology: LevelTopology;
  notifier: HierarchyNotifier;
  /** Defaults to `entry` */
  dirtyOwnership?: DirtyOwnership;
  logger?: StructuredLogger;
}

export interface CacheLevelGeometry extends CacheGeometry {
  size: number;
  associativity: number;
}

function parseWritePolicy(value: string, level: string): void {
  const normalised = value.trim().toUpperCase();
  if (!WRITE_POLICIES.some(policy => policy === normalised)) {
    throw ConfigurationError.policy('writePolicy', value, WRITE_POLICIES, level);
  }
}

function isValidAddress(address: number): boolean {
  return Number.isSafeInteger(address) && address >= 0;
}

export class CacheLevel implements CachePort {
  readonly name: string;
  readonly size: number;
  readonly associativity: number;
  readonly evictionPolicy: EvictionPolicyName;
  readonly requesterSide: string | undefined;
  readonly backingSide: string | undefined;
  readonly dirtyOwnership: DirtyOwnership;

  private readonly decoder: AddressDecoder;
  private readonly sets: CacheSet[];
  private readonly topology: LevelTopology;
  private readonly notifier: HierarchyNotifier;
  private readonly logger: StructuredLogger;

  constructor(config: CacheLevelConfig, deps: CacheLevelDependencies) {
    this.name = config.name;
    this.size = config.size;
    this.associativity = config.associativity;
    this.evictionPolicy = parseEvictionPolicy(config.evictionPolicy, config.name);
    parseWritePolicy(config.writePolicy, config.name);

    if (config.requesterSide !== undefined && config.requesterSide === config.backingSide) {
      throw ConfigurationError.topology(
        `Level ${config.name} names ${config.requesterSide} as both requester and backing side`,
        config.name
      );
    }
    this.requesterSide = config.requesterSide;
    this.backingSide = config.backingSide;
    this.dirtyOwnership = deps.dirtyOwnership ?? 'entry';

    this.decoder = AddressDecoder.forLevel(config.size, config.blockSize, config.associativity, config.name);
    this.sets = Array.from(
      { length: this.decoder.numSets },
      () => new CacheSet(config.associativity, this.evictionPolicy)
    );

    this.topology = deps.topology;
    this.notifier = deps.notifier;
    this.logger = deps.logger ?? createModuleLogger('cache-level');
    this.logger.levelConfigured(this.name, { ...this.geometry(), evictionPolicy: this.evictionPolicy });
  }

  get numSets(): number {
    return this.decoder.numSets;
  }

  get blockSize(): number {
    return this.decoder.blockSize;
  }

  geometry(): CacheLevelGeometry {
    return {
      ...this.decoder.geometry(),
      size: this.size,
      associativity: this.associativity,
    };
  }

  // ==========================================================================
  // Protocol
  // ==========================================================================

  /**
   * Service a demand read or write
   */
  access(operation: AccessOperation, address: number): void {
    if (!isAccessOperation(operation)) {
      throw ProtocolError.unknownOperation(operation, { level: this.name, address });
    }
    this.assertAddress(address, operation);

    const blockAddress = this.decoder.blockAlign(address);
    const { tag, index } = this.decoder.decompose(blockAddress);
    const set = this.sets[index];

    if (set.contains(tag)) {
      this.emit('reportHit', address, () => this.notifier.reportHit(this.name, operation, address));
      if (operation === Operation.Write && this.ownsWrites()) {
        set.setDirty(tag, true);
      }
      set.touch(tag);
      return;
    }

    this.emit('reportMiss', address, () => this.notifier.reportMiss(this.name, operation, address));

    if (set.isFull) {
      this.evict(index);
    }

    // Write-allocate: a write miss still fetches the block as a read
    const backing = this.backing();
    backing?.access(Operation.Read, address);

    // A wider backing block may be dirty in bytes this block does not cover
    let dirty = operation === Operation.Write && this.ownsWrites();
    if (backing && backing.blockSize === this.blockSize && backing.isDirty(blockAddress)) {
      dirty = true;
    }
    set.insert(tag, dirty);
  }

  /**
   * Record a dirty block pushed in from the requester side. Never fetches.
   */
  acceptWriteback(address: number): void {
    this.assertAddress(address, Operation.WritebackNotify);

    const blockAddress = this.decoder.blockAlign(address);
    const { tag, index } = this.decoder.decompose(blockAddress);
    const set = this.sets[index];

    if (set.contains(tag)) {
      set.setDirty(tag, true);
    } else {
      if (set.isFull) {
        this.evict(index);
      }
      set.insert(tag, true);
    }

    this.emit('reportHit', address, () => this.notifier.reportHit(this.name, Operation.WritebackNotify, address));
  }

  /**
   * Evict the policy's victim from a set, invalidating requester-side copies first
   */
  evict(setIndex: number): void {
    const victimTag = this.sets[setIndex].selectVictim();
    if (victimTag === undefined) return;

    const victimAddress = this.decoder.recompose(victimTag, setIndex);
    this.invalidateRequesterCopies(victimAddress);
    this.invalidate(victimAddress, false);
  }

  /**
   * Drop a block, writing it back first when dirty. No-op when not resident.
   */
  invalidate(address: number, propagateToRequester: boolean): void {
    this.assertAddress(address, 'invalidate');

    const blockAddress = this.decoder.blockAlign(address);
    const { tag, index } = this.decoder.decompose(blockAddress);
    const set = this.sets[index];

    if (!set.contains(tag)) return;

    // Inner copies push their dirty data here before this copy goes away
    if (propagateToRequester) {
      this.invalidateRequesterCopies(blockAddress);
    }

    if (set.getDirty(tag)) {
      this.emit('reportWriteback', blockAddress, () => this.notifier.reportWriteback(this.name, blockAddress));
      this.backing()?.acceptWriteback(blockAddress);
      set.setDirty(tag, false);
    }

    set.remove(tag);
    this.emit('reportEviction', blockAddress, () => this.notifier.reportEviction(this.name, blockAddress));
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  hasBlock(address: number): boolean {
    if (!isValidAddress(address)) return false;
    const blockAddress = this.decoder.blockAlign(address);
    return this.sets[this.decoder.index(blockAddress)].contains(this.decoder.tag(blockAddress));
  }

  isDirty(address: number): boolean {
    if (!isValidAddress(address)) return false;
    const blockAddress = this.decoder.blockAlign(address);
    const set = this.sets[this.decoder.index(blockAddress)];
    const tag = this.decoder.tag(blockAddress);
    return set.contains(tag) && set.getDirty(tag);
  }

  /**
   * Number of resident blocks in one set
   */
  occupancy(setIndex: number): number {
    return this.sets[setIndex].size;
  }

  snapshot(): LevelSnapshot {
    return {
      name: this.name,
      numSets: this.numSets,
      associativity: this.associativity,
      evictionPolicy: this.evictionPolicy,
      sets: this.sets.map((set, index) => ({
        index,
        blocks: set.entries().map(entry => ({
          address: this.decoder.recompose(entry.tag, index),
          tag: entry.tag,
          dirty: entry.dirty,
        })),
      })),
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private ownsWrites(): boolean {
    return this.dirtyOwnership === 'entry'
      ? this.requesterSide === undefined
      : this.backingSide === undefined;
  }

  /**
   * Invalidate every requester-side block covered by one of ours. Requester
   * blocks are never larger than this level's.
   */
  private invalidateRequesterCopies(blockAddress: number): void {
    const requester = this.requester();
    if (!requester) return;

    const end = blockAddress + this.blockSize;
    for (let address = blockAddress; address < end; address += requester.blockSize) {
      if (requester.hasBlock(address)) {
        requester.invalidate(address, true);
      }
    }
  }

  private requester(): CachePort | undefined {
    return this.neighbour(this.requesterSide);
  }

  private backing(): CachePort | undefined {
    return this.neighbour(this.backingSide);
  }

  private neighbour(name: string | undefined): CachePort | undefined {
    if (name === undefined) return undefined;

    const level = this.topology.resolve(name);
    if (!level) {
      throw ConfigurationError.topology(`Level ${this.name} links to unknown level ${name}`, this.name);
    }
    return level;
  }

  private assertAddress(address: number, operation: string): void {
    if (!isValidAddress(address)) {
      throw ProtocolError.invalidAddress(address, { level: this.name, operation });
    }
  }

  /**
   * Notifier hooks are a side channel: failures are logged, never propagated
   */
  private emit(hook: keyof HierarchyNotifier, address: number, call: () => void): void {
    try {
      call();
    } catch (error) {
      this.logger.notifierFailed(
        hook,
        this.name,
        address,
        error instanceof Error ? error : new Error(getErrorMessage(error))
      );
    }
  }
}

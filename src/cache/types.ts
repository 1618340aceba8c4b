/**
 * Cache Core Types
 * @module cache/types
 *
 * Operation codes, level configuration, notifier and topology contracts
 * shared by the cache levels and the hierarchy that wires them.
 */

// ============================================================================
// Operations
// ============================================================================

/**
 * Operation codes understood by a cache level.
 * `WritebackNotify` is only ever sent by a requester-side level.
 */
export const Operation = {
  Read: 'R',
  Write: 'W',
  WritebackNotify: 'B',
} as const;

export type Operation = typeof Operation[keyof typeof Operation];

/**
 * Demand operations a caller may issue through `access`
 */
export type AccessOperation = typeof Operation.Read | typeof Operation.Write;

const ACCESS_OPERATIONS: readonly string[] = [Operation.Read, Operation.Write];

export function isAccessOperation(value: unknown): value is AccessOperation {
  return typeof value === 'string' && ACCESS_OPERATIONS.includes(value);
}

// ============================================================================
// Policies
// ============================================================================

export const EVICTION_POLICIES = ['FIFO', 'LRU', 'MRU'] as const;

export type EvictionPolicyName = typeof EVICTION_POLICIES[number];

/**
 * Accepted spellings of the only supported write policy
 */
export const WRITE_POLICIES = ['WB', 'WRITE-BACK', 'WRITEBACK'] as const;

/**
 * Which level marks written blocks dirty.
 * - `entry`: the level with no requester side (where requests enter)
 * - `authoritative`: the level with no backing side
 */
export type DirtyOwnership = 'entry' | 'authoritative';

// ============================================================================
// Level Configuration
// ============================================================================

export interface CacheLevelConfig {
  name: string;
  /** Total capacity in bytes */
  size: number;
  /** Block size in bytes, a power of two */
  blockSize: number;
  associativity: number;
  /** Case-insensitive FIFO | LRU | MRU */
  evictionPolicy: string;
  /** Accepted for completeness; only write-back is supported */
  writePolicy: string;
  /** Name of the neighbour closer to the requester */
  requesterSide?: string;
  /** Name of the neighbour closer to main memory */
  backingSide?: string;
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Receives hit, miss, write-back and eviction events from every level.
 * Return values are ignored; a throwing hook is logged and does not abort
 * the cascade in progress.
 */
export interface HierarchyNotifier {
  reportHit(level: string, operation: Operation, address: number): void;
  reportMiss(level: string, operation: Operation, address: number): void;
  reportWriteback(level: string, address: number): void;
  reportEviction(level: string, address: number): void;
}

/**
 * Cross-level protocol surface. A level only ever talks to its neighbours
 * through these calls.
 */
export interface CachePort {
  readonly name: string;
  readonly blockSize: number;
  access(operation: AccessOperation, address: number): void;
  acceptWriteback(address: number): void;
  invalidate(address: number, propagateToRequester: boolean): void;
  hasBlock(address: number): boolean;
  isDirty(address: number): boolean;
}

/**
 * Resolves level names to levels. Links are relations, not ownership.
 */
export interface LevelTopology {
  resolve(name: string): CachePort | undefined;
}

// ============================================================================
// Snapshots
// ============================================================================

export interface BlockSnapshot {
  address: number;
  tag: number;
  dirty: boolean;
}

export interface SetSnapshot {
  index: number;
  /** Resident blocks, oldest to newest in the policy's ordering */
  blocks: BlockSnapshot[];
}

export interface LevelSnapshot {
  name: string;
  numSets: number;
  associativity: number;
  evictionPolicy: EvictionPolicyName;
  sets: SetSnapshot[];
}

/**
 * Cache Set
 * @module cache/cache-set
 *
 * Ordered collection of resident blocks (tag -> dirty flag) bounded by the
 * level's associativity. Uses a doubly linked list + Map so insert, remove,
 * touch and victim selection are all O(1).
 */

import { BlockNotFoundError, CapacityExceededError, DuplicateBlockError } from '../errors/index.js';
import { OrderedTags, selectVictim, tracksRecency } from './eviction-policy.js';
import { EvictionPolicyName } from './types.js';

interface BlockNode {
  tag: number;
  dirty: boolean;
  prev: BlockNode | null;
  next: BlockNode | null;
}

export interface BlockEntry {
  tag: number;
  dirty: boolean;
}

export class CacheSet implements OrderedTags {
  readonly associativity: number;
  readonly policy: EvictionPolicyName;
  private readonly blocks = new Map<number, BlockNode>();
  /** Oldest end: first arrival (FIFO) or least recently used */
  private head: BlockNode | null = null;
  /** Newest end */
  private tail: BlockNode | null = null;

  constructor(associativity: number, policy: EvictionPolicyName) {
    this.associativity = associativity;
    this.policy = policy;
  }

  get size(): number {
    return this.blocks.size;
  }

  get isFull(): boolean {
    return this.blocks.size >= this.associativity;
  }

  contains(tag: number): boolean {
    return this.blocks.has(tag);
  }

  getDirty(tag: number): boolean {
    return this.require(tag).dirty;
  }

  setDirty(tag: number, dirty: boolean): void {
    this.require(tag).dirty = dirty;
  }

  /**
   * Insert at the newest end. Callers must evict first when the set is full.
   */
  insert(tag: number, dirty: boolean): void {
    if (this.blocks.has(tag)) {
      throw new DuplicateBlockError(tag);
    }
    if (this.isFull) {
      throw new CapacityExceededError(tag, this.associativity);
    }

    const node: BlockNode = { tag, dirty, prev: null, next: null };
    this.blocks.set(tag, node);
    this.append(node);
  }

  remove(tag: number): void {
    const node = this.require(tag);
    this.unlink(node);
    this.blocks.delete(tag);
  }

  /**
   * Record an access. Moves the tag to the newest end unless the policy is FIFO.
   */
  touch(tag: number): void {
    const node = this.require(tag);
    if (!tracksRecency(this.policy) || node === this.tail) return;

    this.unlink(node);
    this.append(node);
  }

  selectVictim(): number | undefined {
    return selectVictim(this.policy, this);
  }

  oldest(): number | undefined {
    return this.head?.tag;
  }

  newest(): number | undefined {
    return this.tail?.tag;
  }

  /**
   * Resident tags, oldest to newest
   */
  tags(): number[] {
    return this.entries().map(entry => entry.tag);
  }

  entries(): BlockEntry[] {
    const result: BlockEntry[] = [];
    for (let node = this.head; node; node = node.next) {
      result.push({ tag: node.tag, dirty: node.dirty });
    }
    return result;
  }

  // Private helper methods

  private require(tag: number): BlockNode {
    const node = this.blocks.get(tag);
    if (!node) {
      throw new BlockNotFoundError(tag);
    }
    return node;
  }

  private append(node: BlockNode): void {
    node.prev = this.tail;
    node.next = null;

    if (this.tail) {
      this.tail.next = node;
    }
    this.tail = node;

    if (!this.head) {
      this.head = node;
    }
  }

  private unlink(node: BlockNode): void {
    if (node.prev) {
      node.prev.next = node.next;
    } else {
      this.head = node.next;
    }

    if (node.next) {
      node.next.prev = node.prev;
    } else {
      this.tail = node.prev;
    }

    node.prev = null;
    node.next = null;
  }
}

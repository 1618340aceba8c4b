/**
 * Cache Set and Eviction Policy Tests
 * @module tests/unit/cache-set
 */

import { describe, it, expect } from 'vitest';
import { CacheSet } from '@/cache/cache-set.js';
import { parseEvictionPolicy, selectVictim, tracksRecency } from '@/cache/eviction-policy.js';
import type { EvictionPolicyName } from '@/cache/types.js';
import {
  BlockNotFoundError,
  CapacityExceededError,
  ConfigurationError,
  DuplicateBlockError,
  ErrorCodes,
} from '@/errors/index.js';
import { captureError } from '../helpers/index.js';

function filledSet(policy: EvictionPolicyName, tags: number[] = [1, 2, 3]): CacheSet {
  const set = new CacheSet(tags.length, policy);
  for (const tag of tags) {
    set.insert(tag, false);
  }
  return set;
}

describe('Eviction policy', () => {
  it('should pick the oldest tag for FIFO and LRU and the newest for MRU', () => {
    expect(filledSet('FIFO').selectVictim()).toBe(1);
    expect(filledSet('LRU').selectVictim()).toBe(1);
    expect(filledSet('MRU').selectVictim()).toBe(3);
  });

  it('should pick the next least recently used tag after a touch under LRU', () => {
    const set = filledSet('LRU');
    set.touch(1);
    expect(set.selectVictim()).toBe(2);
    expect(set.tags()).toEqual([2, 3, 1]);
  });

  it('should ignore touches under FIFO', () => {
    const set = filledSet('FIFO');
    set.touch(1);
    expect(set.selectVictim()).toBe(1);
    expect(set.tags()).toEqual([1, 2, 3]);
  });

  it('should pick the just-touched tag under MRU', () => {
    const set = filledSet('MRU');
    set.touch(1);
    expect(set.selectVictim()).toBe(1);
  });

  it('should return undefined for an empty set', () => {
    expect(new CacheSet(2, 'LRU').selectVictim()).toBeUndefined();
    expect(selectVictim('MRU', { oldest: () => undefined, newest: () => undefined })).toBeUndefined();
  });

  it('should only skip recency updates for FIFO', () => {
    expect(tracksRecency('FIFO')).toBe(false);
    expect(tracksRecency('LRU')).toBe(true);
    expect(tracksRecency('MRU')).toBe(true);
  });

  it('should parse policy names case-insensitively', () => {
    expect(parseEvictionPolicy('lru')).toBe('LRU');
    expect(parseEvictionPolicy(' Fifo ')).toBe('FIFO');
    expect(parseEvictionPolicy('mRu')).toBe('MRU');
  });

  it('should reject unknown policies with INVALID_POLICY', () => {
    const error = captureError(() => parseEvictionPolicy('random', 'L2'));
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      code: ErrorCodes.INVALID_POLICY,
      message: "Unsupported evictionPolicy 'random' (expected one of FIFO, LRU, MRU)",
    });
  });
});

describe('CacheSet', () => {
  it('should track dirty flags per tag', () => {
    const set = new CacheSet(2, 'LRU');
    set.insert(7, true);
    set.insert(8, false);

    expect(set.getDirty(7)).toBe(true);
    expect(set.getDirty(8)).toBe(false);

    set.setDirty(8, true);
    expect(set.entries()).toEqual([
      { tag: 7, dirty: true },
      { tag: 8, dirty: true },
    ]);
  });

  it('should report size and fullness', () => {
    const set = new CacheSet(2, 'FIFO');
    expect(set.size).toBe(0);
    expect(set.isFull).toBe(false);

    set.insert(1, false);
    set.insert(2, false);
    expect(set.size).toBe(2);
    expect(set.isFull).toBe(true);
  });

  it('should keep order consistent after removing from the middle', () => {
    const set = filledSet('LRU', [1, 2, 3, 4]);
    set.remove(2);
    expect(set.tags()).toEqual([1, 3, 4]);
    expect(set.oldest()).toBe(1);
    expect(set.newest()).toBe(4);

    set.remove(1);
    set.remove(4);
    expect(set.tags()).toEqual([3]);
    expect(set.oldest()).toBe(3);
    expect(set.newest()).toBe(3);
  });

  it('should throw CapacityExceededError when inserting into a full set', () => {
    const set = filledSet('LRU', [1, 2]);
    const error = captureError(() => set.insert(3, false));
    expect(error).toBeInstanceOf(CapacityExceededError);
    expect(error).toMatchObject({ code: ErrorCodes.CAPACITY_EXCEEDED, isOperational: false });
    expect(set.tags()).toEqual([1, 2]);
  });

  it('should throw DuplicateBlockError when inserting a resident tag', () => {
    const set = new CacheSet(2, 'LRU');
    set.insert(5, false);
    expect(() => set.insert(5, true)).toThrow(DuplicateBlockError);
    expect(set.getDirty(5)).toBe(false);
  });

  it('should throw BlockNotFoundError for absent tags', () => {
    const set = new CacheSet(1, 'LRU');
    expect(() => set.remove(9)).toThrow(BlockNotFoundError);
    expect(() => set.getDirty(9)).toThrow('Tag 0x9 is not resident in this set');
    expect(() => set.setDirty(9, true)).toThrow(BlockNotFoundError);
    expect(() => set.touch(9)).toThrow(BlockNotFoundError);
  });
});

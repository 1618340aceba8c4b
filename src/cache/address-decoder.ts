/**
 * Address Decoder
 * @module cache/address-decoder
 *
 * Splits byte addresses into (tag, set index, block offset) and back.
 *
 * Bitwise operators in JavaScript truncate to 32 bits, so shifts and masks
 * are computed with power-of-two division and multiplication. For non-negative
 * safe integers the results match `addr >> offsetBits`, `& (numSets - 1)` etc.
 */

import { ConfigurationError } from '../errors/index.js';

export interface DecodedAddress {
  tag: number;
  index: number;
  offset: number;
}

export interface CacheGeometry {
  blockSize: number;
  numSets: number;
  offsetBits: number;
  indexBits: number;
}

export function isPowerOfTwo(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0 && 2 ** Math.round(Math.log2(value)) === value;
}

/**
 * Number of sets for a level: size / (blockSize * associativity)
 */
export function computeNumSets(
  size: number,
  blockSize: number,
  associativity: number,
  level?: string
): number {
  for (const [key, value] of [['size', size], ['blockSize', blockSize], ['associativity', associativity]] as const) {
    if (!Number.isSafeInteger(value) || value <= 0) {
      throw ConfigurationError.geometry(key, `${key} must be a positive integer, got ${value}`, level);
    }
  }

  const setBytes = blockSize * associativity;
  if (size % setBytes !== 0) {
    throw ConfigurationError.geometry(
      'size',
      `size ${size} is not a multiple of blockSize * associativity (${setBytes})`,
      level
    );
  }

  const numSets = size / setBytes;
  if (numSets === 0) {
    throw ConfigurationError.geometry('size', 'configuration yields zero sets', level);
  }
  return numSets;
}

export class AddressDecoder {
  readonly blockSize: number;
  readonly numSets: number;
  readonly offsetBits: number;
  readonly indexBits: number;
  /** Bytes covered by one tag value: blockSize * numSets */
  private readonly tagStride: number;

  constructor(blockSize: number, numSets: number, level?: string) {
    if (!isPowerOfTwo(blockSize)) {
      throw ConfigurationError.geometry('blockSize', `blockSize ${blockSize} is not a power of two`, level);
    }
    if (!isPowerOfTwo(numSets)) {
      throw ConfigurationError.geometry('numSets', `number of sets ${numSets} is not a power of two`, level);
    }

    this.blockSize = blockSize;
    this.numSets = numSets;
    this.offsetBits = Math.log2(blockSize);
    this.indexBits = Math.log2(numSets);
    this.tagStride = blockSize * numSets;
  }

  static forLevel(size: number, blockSize: number, associativity: number, level?: string): AddressDecoder {
    return new AddressDecoder(blockSize, computeNumSets(size, blockSize, associativity, level), level);
  }

  index(address: number): number {
    return Math.floor(address / this.blockSize) % this.numSets;
  }

  tag(address: number): number {
    return Math.floor(address / this.tagStride);
  }

  offset(address: number): number {
    return address % this.blockSize;
  }

  blockAlign(address: number): number {
    return address - this.offset(address);
  }

  decompose(address: number): DecodedAddress {
    return {
      tag: this.tag(address),
      index: this.index(address),
      offset: this.offset(address),
    };
  }

  /**
   * Block address for a tag in a given set
   */
  recompose(tag: number, index: number): number {
    return tag * this.tagStride + index * this.blockSize;
  }

  geometry(): CacheGeometry {
    return {
      blockSize: this.blockSize,
      numSets: this.numSets,
      offsetBits: this.offsetBits,
      indexBits: this.indexBits,
    };
  }
}

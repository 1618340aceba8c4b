/**
 * Statistics Collector
 * @module stats/stats-collector
 *
 * HierarchyNotifier that counts hits, misses, write-backs and evictions per
 * level. Rates cover demand accesses only; write-back notifications received
 * from the requester side are counted separately.
 */

import { HierarchyNotifier, Operation } from '../cache/types.js';

export interface LevelCounters {
  reads: number;
  writes: number;
  readHits: number;
  readMisses: number;
  writeHits: number;
  writeMisses: number;
  /** Dirty blocks pushed in from the requester side */
  writebacksReceived: number;
  /** Dirty blocks this level wrote back on eviction or invalidation */
  writebacks: number;
  evictions: number;
}

export interface LevelStats extends LevelCounters {
  level: string;
  accesses: number;
  hits: number;
  misses: number;
  hitRate: number;
  missRate: number;
}

function emptyCounters(): LevelCounters {
  return {
    reads: 0,
    writes: 0,
    readHits: 0,
    readMisses: 0,
    writeHits: 0,
    writeMisses: 0,
    writebacksReceived: 0,
    writebacks: 0,
    evictions: 0,
  };
}

export class StatsCollector implements HierarchyNotifier {
  private readonly counters = new Map<string, LevelCounters>();

  /**
   * @param levelOrder - levels listed up front, so summaries keep hierarchy
   * order and include levels that never saw an event
   */
  constructor(levelOrder: readonly string[] = []) {
    for (const level of levelOrder) {
      this.counters.set(level, emptyCounters());
    }
  }

  reportHit(level: string, operation: Operation, _address: number): void {
    const counters = this.countersFor(level);
    switch (operation) {
      case Operation.Read:
        counters.reads++;
        counters.readHits++;
        break;
      case Operation.Write:
        counters.writes++;
        counters.writeHits++;
        break;
      case Operation.WritebackNotify:
        counters.writebacksReceived++;
        break;
    }
  }

  reportMiss(level: string, operation: Operation, _address: number): void {
    const counters = this.countersFor(level);
    switch (operation) {
      case Operation.Read:
        counters.reads++;
        counters.readMisses++;
        break;
      case Operation.Write:
        counters.writes++;
        counters.writeMisses++;
        break;
      case Operation.WritebackNotify:
        // write-back notifications never miss
        break;
    }
  }

  reportWriteback(level: string, _address: number): void {
    this.countersFor(level).writebacks++;
  }

  reportEviction(level: string, _address: number): void {
    this.countersFor(level).evictions++;
  }

  get(level: string): LevelStats {
    return toStats(level, this.counters.get(level) ?? emptyCounters());
  }

  summary(): LevelStats[] {
    return [...this.counters.entries()].map(([level, counters]) => toStats(level, counters));
  }

  reset(): void {
    for (const level of this.counters.keys()) {
      this.counters.set(level, emptyCounters());
    }
  }

  private countersFor(level: string): LevelCounters {
    let counters = this.counters.get(level);
    if (!counters) {
      counters = emptyCounters();
      this.counters.set(level, counters);
    }
    return counters;
  }
}

function toStats(level: string, counters: LevelCounters): LevelStats {
  const hits = counters.readHits + counters.writeHits;
  const misses = counters.readMisses + counters.writeMisses;
  const accesses = hits + misses;

  return {
    level,
    ...counters,
    accesses,
    hits,
    misses,
    hitRate: accesses > 0 ? hits / accesses : 0,
    missRate: accesses > 0 ? misses / accesses : 0,
  };
}

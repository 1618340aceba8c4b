/**
 * Recording Notifier
 * @module tests/mocks/recording-notifier
 *
 * HierarchyNotifier test double that keeps every event in arrival order.
 */

import type { HierarchyNotifier, Operation } from '@/cache/types.js';

export type NotifierEvent =
  | { kind: 'hit' | 'miss'; level: string; operation: Operation; address: number }
  | { kind: 'writeback' | 'eviction'; level: string; address: number };

export class RecordingNotifier implements HierarchyNotifier {
  readonly events: NotifierEvent[] = [];

  reportHit(level: string, operation: Operation, address: number): void {
    this.events.push({ kind: 'hit', level, operation, address });
  }

  reportMiss(level: string, operation: Operation, address: number): void {
    this.events.push({ kind: 'miss', level, operation, address });
  }

  reportWriteback(level: string, address: number): void {
    this.events.push({ kind: 'writeback', level, address });
  }

  reportEviction(level: string, address: number): void {
    this.events.push({ kind: 'eviction', level, address });
  }

  /**
   * Compact `kind:level@0xaddr` strings, e.g. `writeback:L1@0x0`
   */
  trail(): string[] {
    return this.events.map(event => `${event.kind}:${event.level}@0x${event.address.toString(16)}`);
  }

  ofKind(kind: NotifierEvent['kind']): NotifierEvent[] {
    return this.events.filter(event => event.kind === kind);
  }

  clear(): void {
    this.events.length = 0;
  }
}

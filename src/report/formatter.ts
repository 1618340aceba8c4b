/**
 * Report Formatter
 * @module report/formatter
 *
 * Renders a {@link SimulationReport} as plain text or JSON.
 */

import { CacheLevelGeometry } from '../cache/cache-level.js';
import { LevelSnapshot } from '../cache/types.js';
import { SimulationReport } from '../simulator/simulator.js';
import { LevelStats } from '../stats/stats-collector.js';

export type ReportFormat = 'text' | 'json';

export const REPORT_FORMATS: readonly ReportFormat[] = ['text', 'json'];

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some(format => format === value);
}

export function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(2)}%`;
}

export function formatAddress(address: number): string {
  return `0x${address.toString(16)}`;
}

const LABEL_WIDTH = 12;

function row(label: string, value: string): string {
  return `  ${label.padEnd(LABEL_WIDTH)}${value}`;
}

export function formatLevelStats(stats: LevelStats): string[] {
  return [
    stats.level,
    row('reads', `${stats.reads} (hits ${stats.readHits}, misses ${stats.readMisses})`),
    row('writes', `${stats.writes} (hits ${stats.writeHits}, misses ${stats.writeMisses})`),
    row('hit rate', formatPercent(stats.hitRate)),
    row('writebacks', String(stats.writebacks)),
    row('received', String(stats.writebacksReceived)),
    row('evictions', String(stats.evictions)),
  ];
}

/**
 * One line per resident block, oldest first within a set; dirty blocks are marked [D]
 */
export function formatContents(snapshot: LevelSnapshot): string[] {
  const lines = [`${snapshot.name} contents`];

  for (const set of snapshot.sets) {
    for (const block of set.blocks) {
      lines.push(`  set ${set.index}: ${formatAddress(block.address)}${block.dirty ? ' [D]' : ''}`);
    }
  }

  if (lines.length === 1) {
    lines.push('  (empty)');
  }
  return lines;
}

export interface DescribedLevel {
  name: string;
  evictionPolicy: string;
  geometry(): CacheLevelGeometry;
}

/**
 * One line per level with the derived set count and address split
 */
export function formatGeometry(levels: readonly DescribedLevel[]): string {
  const lines = levels.map(level => {
    const g = level.geometry();
    return (
      `${level.name}: ${g.size} bytes, ${g.associativity}-way, ${g.blockSize}-byte blocks, ` +
      `${g.numSets} sets (offset ${g.offsetBits} bits, index ${g.indexBits} bits), ${level.evictionPolicy}`
    );
  });
  return `${lines.join('\n')}\n`;
}

function formatText(report: SimulationReport): string {
  const lines = [
    `=== ${report.name} ===`,
    `accesses: ${report.accesses}  skipped: ${report.skipped.length}  dirty ownership: ${report.dirtyOwnership}`,
  ];

  for (const stats of report.levels) {
    lines.push('', ...formatLevelStats(stats));
  }

  for (const snapshot of report.contents ?? []) {
    lines.push('', ...formatContents(snapshot));
  }

  if (report.skipped.length > 0) {
    lines.push('', 'skipped lines');
    for (const skipped of report.skipped) {
      lines.push(`  ${skipped.lineNumber}: ${skipped.message}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

export function formatReport(report: SimulationReport, format: ReportFormat): string {
  switch (format) {
    case 'json':
      return `${JSON.stringify(report, null, 2)}\n`;
    case 'text':
      return formatText(report);
  }
}

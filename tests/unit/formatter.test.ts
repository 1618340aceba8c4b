/**
 * Report Formatter Tests
 * @module tests/unit/formatter
 */

import { describe, it, expect } from 'vitest';
import { validateConfig } from '@/config/index.js';
import {
  formatAddress,
  formatGeometry,
  formatPercent,
  formatReport,
  isReportFormat,
} from '@/report/formatter.js';
import { Simulator, type SimulationReport } from '@/simulator/simulator.js';
import { parseTraceLines } from '@/trace/trace-parser.js';
import { L1_SPEC, L2_SPEC, createHierarchy } from '../factories/index.js';

function conflictReport(includeContents = false): SimulationReport {
  const simulator = new Simulator(validateConfig({ name: 'two-level', levels: [L1_SPEC, L2_SPEC] }));
  simulator.run(parseTraceLines(['W 0x00', 'R 0x40', 'R 0x40']));
  return simulator.report(includeContents);
}

const STATS_TEXT = [
  '=== two-level ===',
  'accesses: 3  skipped: 0  dirty ownership: entry',
  '',
  'L1',
  '  reads       2 (hits 1, misses 1)',
  '  writes      1 (hits 0, misses 1)',
  '  hit rate    33.33%',
  '  writebacks  1',
  '  received    0',
  '  evictions   1',
  '',
  'L2',
  '  reads       2 (hits 0, misses 2)',
  '  writes      0 (hits 0, misses 0)',
  '  hit rate    0.00%',
  '  writebacks  0',
  '  received    1',
  '  evictions   0',
];

describe('formatReport', () => {
  it('should render per-level counters as text', () => {
    expect(formatReport(conflictReport(), 'text')).toBe(`${STATS_TEXT.join('\n')}\n`);
  });

  it('should append a contents dump with dirty markers', () => {
    const expected = [
      ...STATS_TEXT,
      '',
      'L1 contents',
      '  set 0: 0x40',
      '',
      'L2 contents',
      '  set 0: 0x0 [D]',
      '  set 0: 0x40',
    ];
    expect(formatReport(conflictReport(true), 'text')).toBe(`${expected.join('\n')}\n`);
  });

  it('should list skipped lines', () => {
    const report: SimulationReport = {
      name: 'h',
      dirtyOwnership: 'entry',
      accesses: 0,
      skipped: [{ lineNumber: 4, code: 'TRACE_PARSE_ERROR', message: "Line 4: invalid address 'zz'" }],
      levels: [],
    };

    expect(formatReport(report, 'text')).toBe(
      [
        '=== h ===',
        'accesses: 0  skipped: 1  dirty ownership: entry',
        '',
        'skipped lines',
        "  4: Line 4: invalid address 'zz'",
        '',
      ].join('\n')
    );
  });

  it('should mark an empty level in the contents dump', () => {
    const report: SimulationReport = {
      name: 'h',
      dirtyOwnership: 'entry',
      accesses: 0,
      skipped: [],
      levels: [],
      contents: createHierarchy([L1_SPEC]).snapshot(),
    };

    expect(formatReport(report, 'text')).toBe(
      ['=== h ===', 'accesses: 0  skipped: 0  dirty ownership: entry', '', 'L1 contents', '  (empty)', ''].join('\n')
    );
  });

  it('should render the report as indented JSON', () => {
    const report = conflictReport(true);
    const output = formatReport(report, 'json');

    expect(output.startsWith('{\n  "name": "two-level",\n')).toBe(true);
    expect(output.endsWith('}\n')).toBe(true);
    expect(JSON.parse(output)).toEqual(report);
  });
});

describe('formatGeometry', () => {
  it('should describe each level on one line', () => {
    const hierarchy = createHierarchy([L1_SPEC, L2_SPEC]);

    expect(formatGeometry(hierarchy.levels)).toBe(
      [
        'L1: 64 bytes, 1-way, 16-byte blocks, 4 sets (offset 4 bits, index 2 bits), LRU',
        'L2: 128 bytes, 2-way, 16-byte blocks, 4 sets (offset 4 bits, index 2 bits), LRU',
        '',
      ].join('\n')
    );
  });
});

describe('formatting helpers', () => {
  it('should format rates and addresses', () => {
    expect(formatPercent(1 / 3)).toBe('33.33%');
    expect(formatPercent(1)).toBe('100.00%');
    expect(formatAddress(255)).toBe('0xff');
  });

  it('should recognise supported formats', () => {
    expect(isReportFormat('json')).toBe(true);
    expect(isReportFormat('xml')).toBe(false);
  });
});

/**
 * Trace Parser Tests
 * @module tests/unit/trace-parser
 */

import { describe, it, expect } from 'vitest';
import { Operation } from '@/cache/types.js';
import { ErrorCodes, ProtocolError, TraceParseError, TraceReadError } from '@/errors/index.js';
import { parseAddress, parseTrace, parseTraceLine, parseTraceLines, readTraceFile } from '@/trace/trace-parser.js';
import { captureError, captureRejection, collectAsync, fixturePath } from '../helpers/index.js';

describe('parseAddress', () => {
  it('should accept hex and decimal addresses', () => {
    expect(parseAddress('0x1F40')).toBe(8000);
    expect(parseAddress('0X10')).toBe(16);
    expect(parseAddress('8000')).toBe(8000);
    expect(parseAddress('0')).toBe(0);
  });

  it('should reject malformed and unsafe values', () => {
    expect(parseAddress('0x')).toBeUndefined();
    expect(parseAddress('-16')).toBeUndefined();
    expect(parseAddress('1e3')).toBeUndefined();
    expect(parseAddress('0xfffffffffffffffff')).toBeUndefined();
  });
});

describe('parseTraceLine', () => {
  it('should parse an access line case-insensitively', () => {
    expect(parseTraceLine('w 0x40', 3)).toEqual({
      ok: true,
      value: { operation: Operation.Write, address: 0x40, lineNumber: 3 },
    });
  });

  it('should ignore blank lines and comments', () => {
    expect(parseTraceLine('', 1)).toBeNull();
    expect(parseTraceLine('   ', 1)).toBeNull();
    expect(parseTraceLine('# header', 1)).toBeNull();
  });

  it('should strip trailing comments', () => {
    expect(parseTraceLine('R 16 # second block', 2)).toEqual({
      ok: true,
      value: { operation: Operation.Read, address: 16, lineNumber: 2 },
    });
  });

  it('should report an unknown operation as a ProtocolError with its line number', () => {
    const result = parseTraceLine('B 0x00', 7);
    expect(result?.ok).toBe(false);
    if (result && !result.ok) {
      expect(result.error).toBeInstanceOf(ProtocolError);
      expect(result.error).toMatchObject({
        code: ErrorCodes.UNKNOWN_OPERATION,
        message: "Line 7: unknown operation code 'B'",
        context: { details: { lineNumber: 7, operation: 'B' } },
      });
    }
  });

  it('should report a wrong token count as a TraceParseError', () => {
    const result = parseTraceLine('R 0x00 0x10', 4);
    if (result === null || result.ok) {
      throw new Error('expected a parse error');
    }
    expect(result.error).toBeInstanceOf(TraceParseError);
    expect(result.error.message).toBe("Line 4: expected '<op> <address>', got 'R 0x00 0x10'");
  });

  it('should report a malformed address as a TraceParseError', () => {
    const result = parseTraceLine('R 0xZZ', 9);
    if (result === null || result.ok) {
      throw new Error('expected a parse error');
    }
    expect(result.error).toMatchObject({
      code: ErrorCodes.TRACE_PARSE_ERROR,
      message: "Line 9: invalid address '0xZZ'",
      lineNumber: 9,
      line: 'R 0xZZ',
    });
  });
});

describe('parseTraceLines', () => {
  it('should number lines from one, counting skipped lines', () => {
    const results = [...parseTraceLines(['# c', 'R 0', '', 'W 16'])];
    expect(results).toEqual([
      { ok: true, value: { operation: 'R', address: 0, lineNumber: 2 } },
      { ok: true, value: { operation: 'W', address: 16, lineNumber: 4 } },
    ]);
  });
});

describe('parseTrace', () => {
  it('should parse a whole trace with CRLF line endings', () => {
    expect(parseTrace('W 0x00\r\nR 0x40\r\n')).toEqual([
      { operation: 'W', address: 0, lineNumber: 1 },
      { operation: 'R', address: 0x40, lineNumber: 2 },
    ]);
  });

  it('should throw the first bad line', () => {
    const error = captureError(() => parseTrace('R 0\nR nope\nX 1'));
    expect(error).toBeInstanceOf(TraceParseError);
    expect(error).toMatchObject({ lineNumber: 2 });
  });
});

describe('readTraceFile', () => {
  it('should stream entries from a file', async () => {
    const results = await collectAsync(readTraceFile(fixturePath('traces', 'conflict.trace')));

    expect(results).toEqual([
      { ok: true, value: { operation: 'W', address: 0x00, lineNumber: 2 } },
      { ok: true, value: { operation: 'R', address: 0x40, lineNumber: 3 } },
      { ok: true, value: { operation: 'R', address: 64, lineNumber: 5 } },
    ]);
  });

  it('should yield bad lines as errors and keep going', async () => {
    const results = await collectAsync(readTraceFile(fixturePath('traces', 'malformed.trace')));

    expect(results.map(result => (result.ok ? `ok@${result.value.lineNumber}` : result.error.code))).toEqual([
      'ok@1',
      ErrorCodes.UNKNOWN_OPERATION,
      ErrorCodes.TRACE_PARSE_ERROR,
      ErrorCodes.TRACE_PARSE_ERROR,
      'ok@5',
    ]);
  });

  it('should raise TraceReadError for a missing file', async () => {
    const missing = fixturePath('traces', 'missing.trace');
    const error = await captureRejection(() => collectAsync(readTraceFile(missing)));

    expect(error).toBeInstanceOf(TraceReadError);
    expect(error).toMatchObject({ code: ErrorCodes.TRACE_READ_ERROR, exitCode: 1 });
  });
});

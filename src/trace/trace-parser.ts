/**
 * Trace Parser
 * @module trace/trace-parser
 *
 * Reads memory access traces: one `<op> <address>` pair per line, where
 * `op` is R or W (case-insensitive) and `address` is hex (`0x1f40`) or
 * decimal (`8000`). Blank lines and `#` comments are ignored.
 *
 * Lines are parsed independently so a replay can skip a bad line and go on.
 */

import { once } from 'events';
import { createReadStream } from 'fs';
import { createInterface } from 'readline';
import { AccessOperation, isAccessOperation } from '../cache/types.js';
import {
  ProtocolError,
  ProtocolErrorCodes,
  TraceParseError,
  TraceReadError,
  getErrorMessage,
} from '../errors/index.js';
import { Result, collect, err, ok, unwrap } from '../utils/result.js';

export interface TraceEntry {
  operation: AccessOperation;
  address: number;
  lineNumber: number;
}

export type TraceLineError = TraceParseError | ProtocolError;

export type TraceLineResult = Result<TraceEntry, TraceLineError>;

const HEX_ADDRESS = /^0x[0-9a-f]+$/i;
const DECIMAL_ADDRESS = /^\d+$/;

/**
 * Parse an address token. Returns undefined when the token is malformed or
 * the value is beyond the safe integer range.
 */
export function parseAddress(token: string): number | undefined {
  let value: number;
  if (HEX_ADDRESS.test(token)) {
    value = Number.parseInt(token.slice(2), 16);
  } else if (DECIMAL_ADDRESS.test(token)) {
    value = Number.parseInt(token, 10);
  } else {
    return undefined;
  }
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Parse one trace line. Returns null for blank and comment-only lines.
 */
export function parseTraceLine(rawLine: string, lineNumber: number): TraceLineResult | null {
  const commentStart = rawLine.indexOf('#');
  const line = (commentStart >= 0 ? rawLine.slice(0, commentStart) : rawLine).trim();
  if (line === '') {
    return null;
  }

  const tokens = line.split(/\s+/);
  if (tokens.length !== 2) {
    return err(new TraceParseError(`expected '<op> <address>', got '${line}'`, lineNumber, rawLine));
  }

  const [opToken, addressToken] = tokens;
  const operation = opToken.toUpperCase();
  if (!isAccessOperation(operation)) {
    return err(new ProtocolError(
      `Line ${lineNumber}: unknown operation code '${opToken}'`,
      ProtocolErrorCodes.UNKNOWN_OPERATION,
      { details: { lineNumber, operation: opToken } }
    ));
  }

  const address = parseAddress(addressToken);
  if (address === undefined) {
    return err(new TraceParseError(`invalid address '${addressToken}'`, lineNumber, rawLine));
  }

  return ok({ operation, address, lineNumber });
}

/**
 * Parse a sequence of lines, numbering them from 1
 */
export function* parseTraceLines(lines: Iterable<string>): Generator<TraceLineResult> {
  let lineNumber = 0;
  for (const line of lines) {
    lineNumber++;
    const result = parseTraceLine(line, lineNumber);
    if (result) {
      yield result;
    }
  }
}

/**
 * Parse a whole trace, throwing on the first malformed line
 */
export function parseTrace(text: string): TraceEntry[] {
  return unwrap(collect(parseTraceLines(text.split(/\r?\n/))));
}

/**
 * Stream a trace file line by line
 */
export async function* readTraceFile(filePath: string): AsyncGenerator<TraceLineResult> {
  const stream = createReadStream(filePath, { encoding: 'utf-8' });

  try {
    await once(stream, 'open');
  } catch (error) {
    stream.destroy();
    throw new TraceReadError(filePath, error instanceof Error ? error : new Error(getErrorMessage(error)));
  }

  // Interface is created after open so no line is emitted before iteration starts
  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  let lineNumber = 0;
  try {
    for await (const line of lines) {
      lineNumber++;
      const result = parseTraceLine(line, lineNumber);
      if (result) {
        yield result;
      }
    }
  } catch (error) {
    throw new TraceReadError(filePath, error instanceof Error ? error : new Error(getErrorMessage(error)));
  } finally {
    lines.close();
    stream.destroy();
  }
}

/**
 * Simulator
 * @module simulator/simulator
 *
 * Replays a parsed trace against a cache hierarchy and collects per-level
 * statistics. One access is fully resolved, cascades included, before the
 * next is issued.
 */

import { LevelSnapshot } from '../cache/types.js';
import { OnError, SimulatorConfig } from '../config/index.js';
import { ProtocolError, TraceParseError } from '../errors/index.js';
import { CacheHierarchy } from '../hierarchy/cache-hierarchy.js';
import { StructuredLogger, createModuleLogger } from '../logging/index.js';
import { LevelStats, StatsCollector } from '../stats/stats-collector.js';
import { TraceEntry, TraceLineResult } from '../trace/trace-parser.js';

export interface SimulatorOptions {
  /** Overrides the configured behaviour for bad trace lines */
  onError?: OnError;
  logger?: StructuredLogger;
}

export interface SkippedLine {
  lineNumber: number;
  code: string;
  message: string;
}

export interface SimulationReport {
  name: string;
  dirtyOwnership: string;
  accesses: number;
  skipped: SkippedLine[];
  levels: LevelStats[];
  /** Final resident blocks per level, when requested */
  contents?: LevelSnapshot[];
}

function isSkippable(error: unknown): error is ProtocolError | TraceParseError {
  return error instanceof ProtocolError || error instanceof TraceParseError;
}

function lineNumberOf(error: ProtocolError | TraceParseError, fallback: number): number {
  if (error instanceof TraceParseError) {
    return error.lineNumber;
  }
  const lineNumber = error.context.details?.lineNumber;
  return typeof lineNumber === 'number' ? lineNumber : fallback;
}

export class Simulator {
  readonly hierarchy: CacheHierarchy;
  readonly stats: StatsCollector;
  readonly onError: OnError;
  private readonly logger: StructuredLogger;
  private accesses = 0;
  private skipped: SkippedLine[] = [];

  constructor(config: SimulatorConfig, options: SimulatorOptions = {}) {
    this.logger = options.logger ?? createModuleLogger('simulator');
    this.onError = options.onError ?? config.onError;
    this.stats = new StatsCollector(config.levels.map(level => level.name));
    this.hierarchy = CacheHierarchy.fromConfig(
      { name: config.name, dirtyOwnership: config.dirtyOwnership, levels: config.levels },
      { notifier: this.stats, logger: this.logger }
    );
  }

  /**
   * Issue one access at the entry level
   */
  apply(entry: TraceEntry): void {
    this.hierarchy.access(entry.operation, entry.address);
    this.accesses++;
  }

  /**
   * Replay already-parsed trace lines
   */
  run(lines: Iterable<TraceLineResult>): SimulationReport {
    const startTime = Date.now();
    this.started();

    try {
      for (const line of lines) {
        this.handle(line);
      }
    } catch (error) {
      this.failed(error);
      throw error;
    }

    this.completed(startTime);
    return this.report();
  }

  /**
   * Replay a streamed trace, e.g. from {@link readTraceFile}
   */
  async runAsync(lines: AsyncIterable<TraceLineResult>): Promise<SimulationReport> {
    const startTime = Date.now();
    this.started();

    try {
      for await (const line of lines) {
        this.handle(line);
      }
    } catch (error) {
      this.failed(error);
      throw error;
    }

    this.completed(startTime);
    return this.report();
  }

  report(includeContents = false): SimulationReport {
    return {
      name: this.hierarchy.name,
      dirtyOwnership: this.hierarchy.dirtyOwnership,
      accesses: this.accesses,
      skipped: [...this.skipped],
      levels: this.stats.summary(),
      ...(includeContents ? { contents: this.hierarchy.snapshot() } : {}),
    };
  }

  private handle(line: TraceLineResult): void {
    if (!line.ok) {
      this.reject(line.error, 0);
      return;
    }

    try {
      this.apply(line.value);
    } catch (error) {
      if (!isSkippable(error)) throw error;
      this.reject(error, line.value.lineNumber);
    }
  }

  private reject(error: ProtocolError | TraceParseError, lineNumber: number): void {
    if (this.onError === 'abort') {
      throw error;
    }

    const resolvedLine = lineNumberOf(error, lineNumber);
    this.skipped.push({ lineNumber: resolvedLine, code: error.code, message: error.message });
    this.logger.traceLineSkipped(resolvedLine, error);
  }

  private started(): void {
    this.logger.simulationStarted(this.hierarchy.name, this.hierarchy.levels.length, {
      onError: this.onError,
      dirtyOwnership: this.hierarchy.dirtyOwnership,
    });
  }

  private completed(startTime: number): void {
    this.logger.simulationCompleted(
      this.hierarchy.name,
      this.accesses,
      Date.now() - startTime,
      this.skipped.length
    );
  }

  private failed(error: unknown): void {
    if (error instanceof Error) {
      this.logger.simulationFailed(this.hierarchy.name, error);
    }
  }
}

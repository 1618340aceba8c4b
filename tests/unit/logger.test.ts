/**
 * Structured Logger Tests
 * @module tests/unit/logger
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  createLogger,
  createModuleLogger,
  getLogger,
  initLogger,
  resetLogger,
  withTiming,
} from '@/logging/index.js';

describe('Structured logger', () => {
  afterEach(() => {
    resetLogger();
  });

  it('should take its level from the environment by default', () => {
    expect(createLogger('test').level).toBe('silent');
  });

  it('should let explicit settings override the environment', () => {
    expect(createLogger('test', undefined, { level: 'warn' }).level).toBe('warn');
  });

  it('should keep domain methods on child loggers', () => {
    const child = createLogger('test').child({ module: 'cache-level' });
    expect(typeof child.notifierFailed).toBe('function');
    expect(typeof child.withContext({ level: 'L1' }).simulationStarted).toBe('function');
  });

  it('should build module loggers whose children log and keep their bindings', () => {
    const child = createModuleLogger('hierarchy').child({ simulation: 'two-level' });

    expect(() => child.info('built')).not.toThrow();
    expect(child.bindings()).toMatchObject({ module: 'hierarchy', simulation: 'two-level' });
  });

  it('should nest withContext and child calls without losing bindings', () => {
    const nested = createLogger('test').withContext({ simulation: 'two-level' }).child({ module: 'simulator' });

    expect(() => nested.simulationStarted('two-level', 2)).not.toThrow();
    expect(nested.bindings()).toMatchObject({ simulation: 'two-level', module: 'simulator' });
  });

  it('should reuse the root logger until it is replaced', () => {
    const root = getLogger();
    expect(getLogger()).toBe(root);

    const replaced = initLogger({ simulation: 'two-level' }, { level: 'error' });
    expect(getLogger()).toBe(replaced);
    expect(replaced.level).toBe('error');
    expect(createModuleLogger('trace').level).toBe('error');
  });

  describe('withTiming', () => {
    it('should record a successful operation', () => {
      const logger = createLogger('test');
      const metric = vi.spyOn(logger, 'performanceMetric');

      expect(withTiming(logger, 'build', () => 42)).toBe(42);
      expect(metric).toHaveBeenCalledWith('build', expect.any(Number), { status: 'success' });
    });

    it('should record and rethrow a failure', () => {
      const logger = createLogger('test');
      const metric = vi.spyOn(logger, 'performanceMetric');
      const failure = new Error('nope');

      expect(() =>
        withTiming(logger, 'build', () => {
          throw failure;
        })
      ).toThrow(failure);
      expect(metric).toHaveBeenCalledWith('build', expect.any(Number), { status: 'error' });
    });
  });
});

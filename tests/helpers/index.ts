/**
 * Test Helpers
 * @module tests/helpers
 */

import { fileURLToPath } from 'url';

/**
 * Run `fn` and return what it throws; fails when nothing is thrown
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

/**
 * Async variant of {@link captureError}
 */
export async function captureRejection(fn: () => Promise<unknown>): Promise<unknown> {
  try {
    await fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

/**
 * Collect an async iterable into an array
 */
export async function collectAsync<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

/**
 * Absolute path of a file under tests/fixtures
 */
export function fixturePath(...segments: string[]): string {
  return fileURLToPath(new URL(`../fixtures/${segments.join('/')}`, import.meta.url));
}

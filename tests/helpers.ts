import type { Sequence } from '../src/sequence.js';
import type { UnsignedValue } from '../src/widths.js';

/**
 * Produce values until the sequence exhausts
 * Throws after `limit` values so a runaway sequence fails the test instead of hanging it.
 */
export function drain<T extends UnsignedValue>(sequence: Sequence<T>, limit = 100_000): T[] {
  const values: T[] = [];
  for (let value = sequence.next(); value !== undefined; value = sequence.next()) {
    values.push(value);
    if (values.length > limit) {
      throw new Error(`Sequence did not exhaust within ${limit} values`);
    }
  }
  return values;
}

/**
 * Inclusive numeric range with a stride, for expected values
 */
export function range(start: number, end: number, step = 1): number[] {
  const values: number[] = [];
  for (let value = start; value <= end; value += step) {
    values.push(value);
  }
  return values;
}

/**
 * Run `fn` and return the error it throws
 * Fails when nothing is thrown or the error is not an instance of `type`.
 */
export function catchError<E extends Error>(fn: () => unknown, type: new (...args: never[]) => E): E {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected function to throw');
}

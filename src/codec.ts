import { SequenceError } from './error.js';
import { Sequence } from './sequence.js';
import type { EncodedSequenceState, SequenceOptions, SequenceState } from './types.js';
import { isEncodedSequenceState } from './utils/typeGuards.js';
import type { UnsignedValue, UnsignedWidth } from './widths.js';

/**
 * Persisted-state codec
 *
 * Kept apart from {@link Sequence} so the core type carries no serialization
 * concerns. The encoded form is plain JSON data:
 *
 * ```json
 * {"width":"u32","start":22,"current":33,"step":11,"end":99,"exhausted":false}
 * ```
 *
 * bigint widths (u64, u128) store their values as decimal strings.
 */

/**
 * Encode a sequence state into its JSON-safe form
 */
export function encodeState<T extends UnsignedValue>(
  width: UnsignedWidth<T>,
  state: SequenceState<T>
): EncodedSequenceState {
  return {
    width: width.name,
    start: width.encode(state.start),
    current: width.encode(state.current),
    step: width.encode(state.step),
    end: width.encode(state.end),
    exhausted: state.exhausted,
  };
}

/**
 * Decode a persisted state for the given width
 *
 * `end` defaults to the width's maximum and `exhausted` to `false` when
 * absent; the next production recomputes exhaustion either way.
 *
 * @throws {SequenceError} INVALID_STATE if `raw` is malformed, belongs to another width, or holds out-of-range values
 */
export function decodeState<T extends UnsignedValue>(
  width: UnsignedWidth<T>,
  raw: unknown
): SequenceState<T> {
  if (!isEncodedSequenceState(raw)) {
    throw SequenceError.invalidState();
  }

  if (raw.width !== width.name) {
    throw SequenceError.invalidState(
      `Invalid state: persisted width ${raw.width} does not match ${width.name}`,
      { expected: width.name, actual: raw.width }
    );
  }

  const field = (name: 'start' | 'current' | 'step' | 'end', encoded: number | string): T => {
    const value = width.decode(encoded);
    if (value === undefined) {
      throw SequenceError.invalidState(`Invalid state: ${name} is not a ${width.name} integer`, {
        field: name,
        value: encoded,
      });
    }
    return value;
  };

  return {
    start: field('start', raw.start),
    current: field('current', raw.current),
    step: field('step', raw.step),
    end: raw.end === undefined ? width.max : field('end', raw.end),
    exhausted: raw.exhausted ?? false,
  };
}

/**
 * Serialize a sequence to JSON text
 */
export function serializeSequence<T extends UnsignedValue>(sequence: Sequence<T>): string {
  return JSON.stringify(encodeState(sequence.width, sequence.getState()));
}

/**
 * Rebuild a sequence from JSON text produced by {@link serializeSequence}
 *
 * @example
 * ```typescript
 * const saved = serializeSequence(ids);
 * const resumed = deserializeSequence(u64, saved);
 * resumed.next() === ids.next(); // true
 * ```
 *
 * @throws {SequenceError} INVALID_STATE if `text` is not valid JSON or not a persisted sequence of `width`
 */
export function deserializeSequence<T extends UnsignedValue>(
  width: UnsignedWidth<T>,
  text: string,
  options: SequenceOptions = {}
): Sequence<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw SequenceError.invalidState('Invalid state: not valid JSON', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  return Sequence.fromState(width, decodeState(width, parsed), options);
}

import type { EncodedSequenceState } from '../types.js';
import { isWidthName } from '../widths.js';

/**
 * Type guard to check if a value is a plain (non-array) object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Type guard to check if a value has the persisted form of a number field
 * bigint widths persist decimal strings, number widths plain numbers
 */
export function isEncodedNumber(value: unknown): value is number | string {
  return typeof value === 'number' || typeof value === 'string';
}

/**
 * Type guard to check if a value has the shape of an encoded sequence state
 * Has: width, start, current, step; optionally end and exhausted
 *
 * Only the shape is checked here; ranges are the width's concern.
 */
export function isEncodedSequenceState(value: unknown): value is EncodedSequenceState {
  return (
    isRecord(value) &&
    isWidthName(value.width) &&
    isEncodedNumber(value.start) &&
    isEncodedNumber(value.current) &&
    isEncodedNumber(value.step) &&
    (value.end === undefined || isEncodedNumber(value.end)) &&
    (value.exhausted === undefined || typeof value.exhausted === 'boolean')
  );
}

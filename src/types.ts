import type { SequenceError } from './error.js';
import type { Logger } from './logger.js';
import type { UnsignedValue, UnsignedWidth, WidthName } from './widths.js';

/**
 * Sequence Options
 * Everything a sequence can be configured with besides its width
 */
export interface SequenceOptions {
  /**
   * Enable debug logging
   * @default false
   */
  debug?: boolean;

  /**
   * Custom logger
   * Takes precedence over `debug`
   */
  logger?: Logger;
}

/**
 * Sequence Configuration
 */
export interface SequenceConfig<T extends UnsignedValue> extends SequenceOptions {
  /**
   * Unsigned width the sequence counts in
   */
  width: UnsignedWidth<T>;

  /**
   * First value produced
   * @default width.zero
   */
  start?: T;

  /**
   * Increment added after each produced value
   * Zero yields a constant sequence that never exhausts
   * @default width.one
   */
  step?: T;

  /**
   * Inclusive upper limit
   * @default width.max
   */
  end?: T;
}

/**
 * Snapshot of a sequence, sufficient to resume it
 * Fields are listed in their persisted order
 */
export interface SequenceState<T extends UnsignedValue> {
  start: T;
  current: T;
  step: T;
  end: T;
  exhausted: boolean;
}

/**
 * JSON-safe form of a sequence state
 * bigint widths persist their values as decimal strings
 */
export interface EncodedSequenceState {
  width: WidthName;
  start: number | string;
  current: number | string;
  step: number | string;
  end?: number | string;
  exhausted?: boolean;
}

/**
 * Outcome of a fast-forward
 */
export type FastForwardResult<T extends UnsignedValue> =
  | { ok: true; current: T; error?: never }
  | { ok: false; current?: never; error: SequenceError };

/**
 * uint-sequence
 * Monotonic sequence-number generator over checked unsigned integer widths
 *
 * @module uint-sequence
 */

// Core generator
export { Sequence, createSequence } from './sequence.js';

// Widths
export {
  getWidth,
  isWidthName,
  u8,
  u16,
  u32,
  u64,
  u128,
  usize,
  widths,
  type UnsignedValue,
  type UnsignedWidth,
  type WidthName,
} from './widths.js';

// Persisted state
export { decodeState, deserializeSequence, encodeState, serializeSequence } from './codec.js';

// Types
export type {
  EncodedSequenceState,
  FastForwardResult,
  SequenceConfig,
  SequenceOptions,
  SequenceState,
} from './types.js';

// Error class
export {
  SequenceError,
  isSequenceError,
  type SequenceErrorCode,
  type SequenceErrorObject,
} from './error.js';

// Logger
export {
  createLogger,
  defaultLogger,
  noopLogger,
  type LogFormat,
  type Logger,
  type LoggerConfig,
  type LogLevel,
} from './logger.js';

// Utilities
export { isEncodedNumber, isEncodedSequenceState, isRecord } from './utils/typeGuards.js';

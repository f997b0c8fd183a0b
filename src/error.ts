/**
 * Error codes raised by sequences
 *
 * - OVERFLOW: a fast-forward would exceed the width's maximum
 * - INVALID_VALUE: an argument is not a value of the sequence's width
 * - INVALID_STATE: persisted or restored state is malformed
 */
export type SequenceErrorCode = 'OVERFLOW' | 'INVALID_VALUE' | 'INVALID_STATE';

/**
 * Plain representation of a sequence error
 */
export interface SequenceErrorObject {
  code: SequenceErrorCode;
  message: string;
  data?: unknown;
}

/**
 * Sequence Error class
 * Extends Error with a machine-readable code and JSON-safe data
 */
export class SequenceError extends Error implements SequenceErrorObject {
  code: SequenceErrorCode;
  data?: unknown;

  constructor(code: SequenceErrorCode, message: string, data?: unknown) {
    super(message);
    this.code = code;
    this.data = data;

    this.name = 'SequenceError';

    // Maintain proper stack trace for debugging
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SequenceError);
    }
  }

  static readonly OVERFLOW = 'OVERFLOW';
  static readonly INVALID_VALUE = 'INVALID_VALUE';
  static readonly INVALID_STATE = 'INVALID_STATE';

  /**
   * Create an overflow error for a rejected fast-forward
   * Values are passed in their encoded form
   */
  static overflow(width: string, current: number | string, skipBy: number | string): SequenceError {
    return new SequenceError(
      SequenceError.OVERFLOW,
      `Overflow: cannot skip ${skipBy} from ${current} within ${width}`,
      { width, current, skipBy }
    );
  }

  /**
   * Create an invalid value error for an argument outside the width
   */
  static invalidValue(width: string, field: string, value: unknown): SequenceError {
    return new SequenceError(
      SequenceError.INVALID_VALUE,
      `Invalid value: ${field} is not a ${width} integer`,
      { width, field, value: describe(value) }
    );
  }

  /**
   * Create an invalid state error
   */
  static invalidState(message?: string, data?: unknown): SequenceError {
    return new SequenceError(
      SequenceError.INVALID_STATE,
      message || 'Invalid state: not a persisted sequence',
      data
    );
  }

  /**
   * Convert to a plain error object
   */
  toJSON(): SequenceErrorObject {
    return {
      code: this.code,
      message: this.message,
      ...(this.data !== undefined && { data: this.data }),
    };
  }
}

/**
 * Type guard for sequence errors
 */
export function isSequenceError(error: unknown): error is SequenceError {
  return error instanceof SequenceError;
}

function describe(value: unknown): string {
  return typeof value === 'bigint' ? `${value}n` : String(value);
}

/**
 * Unsigned integer widths
 *
 * A width describes everything a sequence needs to know about its value type:
 * its bounds, checked addition, ordering, and how values are persisted.
 * Widths up to 32 bits (and the native safe-integer width) are backed by
 * `number`; 64 and 128 bits are backed by `bigint`.
 */

/** Names of the supported widths */
export type WidthName = 'u8' | 'u16' | 'u32' | 'u64' | 'u128' | 'usize';

/** Primitive types a width can be backed by */
export type UnsignedValue = number | bigint;

/**
 * Numeric capability of an unsigned integer type
 */
export interface UnsignedWidth<T extends UnsignedValue> {
  readonly name: WidthName;
  readonly bits: number;
  readonly zero: T;
  readonly one: T;
  readonly max: T;

  /**
   * Add two values of this width
   * @returns The sum, or `undefined` when it exceeds `max`
   */
  checkedAdd(a: T, b: T): T | undefined;

  /** Negative, zero or positive, like a sort comparator */
  compare(a: T, b: T): number;

  /** Whether `value` is an integer of this width (right primitive, in range) */
  isValue(value: unknown): value is T;

  /** Convert a value to its JSON-safe persisted form */
  encode(value: T): number | string;

  /**
   * Parse a persisted value
   * @returns The value, or `undefined` if `raw` is not a valid value of this width
   */
  decode(raw: unknown): T | undefined;
}

function numberWidth(name: WidthName, bits: number, max: number): UnsignedWidth<number> {
  const isValue = (value: unknown): value is number =>
    typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= max;

  return {
    name,
    bits,
    zero: 0,
    one: 1,
    max,
    // Safe integers sum to at most 2^54 - 2; rounding above 2^53 never lands back at or below max.
    checkedAdd: (a, b) => {
      const sum = a + b;
      return sum > max ? undefined : sum;
    },
    compare: (a, b) => a - b,
    isValue,
    encode: (value) => value,
    decode: (raw) => (isValue(raw) ? raw : undefined),
  };
}

function bigintWidth(name: WidthName, bits: number): UnsignedWidth<bigint> {
  const max = (1n << BigInt(bits)) - 1n;

  const isValue = (value: unknown): value is bigint =>
    typeof value === 'bigint' && value >= 0n && value <= max;

  const decode = (raw: unknown): bigint | undefined => {
    let candidate: bigint;
    if (typeof raw === 'string' && /^\d+$/.test(raw)) {
      candidate = BigInt(raw);
    } else if (typeof raw === 'number' && Number.isSafeInteger(raw)) {
      candidate = BigInt(raw);
    } else {
      return undefined;
    }
    return isValue(candidate) ? candidate : undefined;
  };

  return {
    name,
    bits,
    zero: 0n,
    one: 1n,
    max,
    checkedAdd: (a, b) => {
      const sum = a + b;
      return sum > max ? undefined : sum;
    },
    compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
    isValue,
    encode: (value) => value.toString(),
    decode,
  };
}

/** 8-bit unsigned, max 255 */
export const u8 = numberWidth('u8', 8, 0xff);

/** 16-bit unsigned, max 65535 */
export const u16 = numberWidth('u16', 16, 0xffff);

/** 32-bit unsigned, max 4294967295 */
export const u32 = numberWidth('u32', 32, 0xffffffff);

/**
 * Native width: the integers a JavaScript `number` represents exactly,
 * max `Number.MAX_SAFE_INTEGER` (2^53 - 1)
 */
export const usize = numberWidth('usize', 53, Number.MAX_SAFE_INTEGER);

/** 64-bit unsigned, backed by bigint */
export const u64 = bigintWidth('u64', 64);

/** 128-bit unsigned, backed by bigint */
export const u128 = bigintWidth('u128', 128);

/**
 * All widths by name
 */
export const widths = {
  u8,
  u16,
  u32,
  u64,
  u128,
  usize,
} as const;

/**
 * Type guard for width names
 */
export function isWidthName(value: unknown): value is WidthName {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(widths, value);
}

/**
 * Look up a width by name
 */
export function getWidth(name: WidthName): UnsignedWidth<number> | UnsignedWidth<bigint> {
  return widths[name];
}

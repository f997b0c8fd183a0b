import { SequenceError } from './error.js';
import { type Logger, createLogger, noopLogger } from './logger.js';
import type { FastForwardResult, SequenceConfig, SequenceOptions, SequenceState } from './types.js';
import type { UnsignedValue, UnsignedWidth } from './widths.js';

/**
 * Monotonic sequence-number generator
 *
 * Produces `start`, `start + step`, `start + 2 * step`, ... in the chosen
 * unsigned width. Every advance is a checked addition: when the next value
 * would exceed the width's maximum (or the configured `end`), the value in
 * hand is still returned and the sequence latches as exhausted. From then on
 * `next()` returns `undefined` until `reset()`.
 *
 * Can be fast-forwarded to skip values, but never wound back except by reset.
 *
 * @example
 * ```typescript
 * const ids = Sequence.create(u8);
 * ids.next(); // 0
 * ids.next(); // 1
 *
 * ids.fastForward(200); // { ok: true, current: 202 }
 * ids.fastForward(100); // { ok: false, error: SequenceError(OVERFLOW) }
 * ids.next(); // 202
 * ```
 */
export class Sequence<T extends UnsignedValue> implements Iterable<T> {
  readonly width: UnsignedWidth<T>;
  private readonly start: T;
  private readonly step: T;
  private readonly end: T;
  private current: T;
  private exhausted = false;
  private logger: Logger;

  /**
   * Create a new sequence
   *
   * @throws {SequenceError} INVALID_VALUE if `start`, `step` or `end` is not a value of `width`
   */
  constructor(config: SequenceConfig<T>) {
    this.width = config.width;
    this.start = this.requireValue('start', config.start ?? config.width.zero);
    this.step = this.requireValue('step', config.step ?? config.width.one);
    this.end = this.requireValue('end', config.end ?? config.width.max);
    this.current = this.start;

    this.logger = config.logger ?? (config.debug ? createLogger({ level: 'debug' }) : noopLogger);
  }

  /**
   * Sequence starting at zero, incrementing by one
   */
  static create<T extends UnsignedValue>(width: UnsignedWidth<T>, options: SequenceOptions = {}): Sequence<T> {
    return new Sequence({ ...options, width });
  }

  /**
   * Sequence starting at `start`, incrementing by one
   */
  static withStart<T extends UnsignedValue>(
    width: UnsignedWidth<T>,
    start: T,
    options: SequenceOptions = {}
  ): Sequence<T> {
    return new Sequence({ ...options, width, start });
  }

  /**
   * Sequence starting at zero, incrementing by `step`
   */
  static withStep<T extends UnsignedValue>(
    width: UnsignedWidth<T>,
    step: T,
    options: SequenceOptions = {}
  ): Sequence<T> {
    return new Sequence({ ...options, width, step });
  }

  /**
   * Sequence starting at `start`, incrementing by `step`
   *
   * @param start - First value produced
   * @param step - Increment; zero yields a constant sequence
   */
  static withStartAndStep<T extends UnsignedValue>(
    width: UnsignedWidth<T>,
    start: T,
    step: T,
    options: SequenceOptions = {}
  ): Sequence<T> {
    return new Sequence({ ...options, width, start, step });
  }

  /**
   * Sequence with an explicit inclusive upper limit
   *
   * @example
   * ```typescript
   * [...Sequence.withStartEndStep(u8, 23, 38, 3)]; // [23, 26, 29, 32, 35, 38]
   * ```
   */
  static withStartEndStep<T extends UnsignedValue>(
    width: UnsignedWidth<T>,
    start: T,
    end: T,
    step: T,
    options: SequenceOptions = {}
  ): Sequence<T> {
    return new Sequence({ ...options, width, start, end, step });
  }

  /**
   * Sequence starting at `value + 1`
   *
   * When `value` is the width's maximum there is nothing left to produce: the
   * sequence starts at the maximum with an `end` of zero, so it is born
   * exhausted and stays so across resets and restores.
   */
  static startAfter<T extends UnsignedValue>(
    width: UnsignedWidth<T>,
    value: T,
    options: SequenceOptions = {}
  ): Sequence<T> {
    const after = Sequence.requireWidthValue(width, 'value', value);
    const start = width.checkedAdd(after, width.one);
    if (start !== undefined) {
      return new Sequence({ ...options, width, start });
    }

    const sequence = new Sequence({ ...options, width, start: width.max, end: width.zero });
    sequence.exhausted = true;
    return sequence;
  }

  /**
   * Sequence starting after the highest of `values` (after zero when there are none)
   * Useful to resume numbering past identifiers that already exist.
   */
  static startAfterHighest<T extends UnsignedValue>(
    width: UnsignedWidth<T>,
    values: Iterable<T>,
    options: SequenceOptions = {}
  ): Sequence<T> {
    let highest = width.zero;
    for (const value of values) {
      const checked = Sequence.requireWidthValue(width, 'values', value);
      if (width.compare(checked, highest) > 0) {
        highest = checked;
      }
    }
    return Sequence.startAfter(width, highest, options);
  }

  /**
   * Rebuild a sequence from a snapshot taken with {@link Sequence.getState}
   *
   * @throws {SequenceError} INVALID_STATE if a field is out of range or `current` is below `start`
   */
  static fromState<T extends UnsignedValue>(
    width: UnsignedWidth<T>,
    state: SequenceState<T>,
    options: SequenceOptions = {}
  ): Sequence<T> {
    for (const field of ['start', 'current', 'step', 'end'] as const) {
      if (!width.isValue(state[field])) {
        throw SequenceError.invalidState(`Invalid state: ${field} is not a ${width.name} integer`, {
          field,
        });
      }
    }
    if (typeof state.exhausted !== 'boolean') {
      throw SequenceError.invalidState('Invalid state: exhausted must be a boolean', {
        field: 'exhausted',
      });
    }
    if (width.compare(state.current, state.start) < 0) {
      throw SequenceError.invalidState('Invalid state: current is below start', {
        start: width.encode(state.start),
        current: width.encode(state.current),
      });
    }

    const sequence = new Sequence({
      ...options,
      width,
      start: state.start,
      step: state.step,
      end: state.end,
    });
    sequence.current = state.current;
    sequence.exhausted = state.exhausted;
    return sequence;
  }

  /**
   * Produce the next value
   *
   * @returns The next value, or `undefined` once the sequence is exhausted
   */
  next(): T | undefined {
    if (this.exhausted) {
      return undefined;
    }

    // Reachable after a fast-forward past `end`, or a restored state
    if (this.width.compare(this.current, this.end) > 0) {
      this.exhaust();
      return undefined;
    }

    const result = this.current;
    const candidate = this.width.checkedAdd(result, this.step);

    if (candidate === undefined || this.width.compare(candidate, this.end) > 0) {
      this.exhaust(result);
    } else {
      this.current = candidate;
    }

    return result;
  }

  /**
   * Get the value the next production would return, without advancing
   * Does not consult the exhausted flag; see {@link Sequence.isExhausted}.
   */
  peek(): T {
    return this.current;
  }

  /**
   * Skip ahead by `skipBy`
   *
   * Never sets the exhausted flag itself: landing exactly on the maximum is
   * valid, and the following `next()` observes the limit.
   *
   * @returns `{ ok: true, current }` on success; on overflow `{ ok: false, error }`
   *   with an OVERFLOW error, and the sequence left unchanged
   * @throws {SequenceError} INVALID_VALUE if `skipBy` is not a value of the width
   */
  fastForward(skipBy: T): FastForwardResult<T> {
    const delta = this.requireValue('skipBy', skipBy);
    const advanced = this.width.checkedAdd(this.current, delta);

    if (advanced === undefined) {
      const error = SequenceError.overflow(
        this.width.name,
        this.width.encode(this.current),
        this.width.encode(delta)
      );
      this.logger.debug('Fast-forward rejected:', error.data);
      return { ok: false, error };
    }

    this.current = advanced;
    return { ok: true, current: advanced };
  }

  /**
   * Make sure the sequence never produces `value`, advancing past it if needed
   *
   * The new position is `value + step` (`value + 1` for a zero step) unless
   * the sequence is already beyond that. If that addition overflows, the
   * sequence is exhausted.
   *
   * @throws {SequenceError} INVALID_VALUE if `value` is not a value of the width
   */
  continueAfter(value: T): void {
    const after = this.requireValue('value', value);
    const increment = this.width.compare(this.step, this.width.zero) === 0 ? this.width.one : this.step;
    const candidate = this.width.checkedAdd(after, increment);

    if (candidate === undefined) {
      this.logger.debug('Cannot continue after value:', {
        width: this.width.name,
        value: this.width.encode(after),
      });
      this.exhaust();
      return;
    }

    if (this.width.compare(candidate, this.current) > 0) {
      this.current = candidate;
    }
  }

  /**
   * Rewind to the start value and clear the exhausted flag
   * A sequence whose start lies beyond its end stays exhausted.
   */
  reset(): void {
    this.current = this.start;
    this.exhausted = this.width.compare(this.start, this.end) > 0;
    this.logger.trace('Sequence reset:', { start: this.width.encode(this.start) });
  }

  /**
   * Whether the sequence has stopped producing values
   * @returns `true` once `next()` returns `undefined`, until a reset
   */
  isExhausted(): boolean {
    return this.exhausted;
  }

  /**
   * Get the value the sequence started at, and returns to on reset
   */
  getStart(): T {
    return this.start;
  }

  /**
   * Get the increment added after each produced value
   */
  getStep(): T {
    return this.step;
  }

  /**
   * Get the inclusive upper limit
   */
  getEnd(): T {
    return this.end;
  }

  /**
   * Continue this sequence with a different increment
   *
   * The returned sequence produces the same next value; the new step applies
   * from the value after it. An exhausted sequence keeps its old step.
   * This sequence is left untouched.
   *
   * @example
   * ```typescript
   * const ids = Sequence.create(u8).withIncrement(5);
   * ids.take(3); // [0, 5, 10]
   * ```
   *
   * @param step - New increment
   * @returns A new sequence sharing start, end, position and exhaustion
   * @throws {SequenceError} INVALID_VALUE if `step` is not a value of the width
   */
  withIncrement(step: T): Sequence<T> {
    const increment = this.requireValue('step', step);
    const sequence = new Sequence({
      width: this.width,
      start: this.start,
      step: this.exhausted ? this.step : increment,
      end: this.end,
      logger: this.logger,
    });
    sequence.current = this.current;
    sequence.exhausted = this.exhausted;
    return sequence;
  }

  /**
   * Produce up to `count` values
   * Returns fewer when the sequence exhausts first.
   */
  take(count: number): T[] {
    const values: T[] = [];
    while (values.length < count) {
      const value = this.next();
      if (value === undefined) {
        break;
      }
      values.push(value);
    }
    return values;
  }

  /**
   * Snapshot the sequence
   * Feeding the result to {@link Sequence.fromState} yields an equivalent sequence.
   */
  getState(): SequenceState<T> {
    return {
      start: this.start,
      current: this.current,
      step: this.step,
      end: this.end,
      exhausted: this.exhausted,
    };
  }

  /**
   * Iterate until exhaustion
   * A zero-step sequence never exhausts; bound the loop yourself.
   */
  *[Symbol.iterator](): Generator<T, void, undefined> {
    for (let value = this.next(); value !== undefined; value = this.next()) {
      yield value;
    }
  }

  private exhaust(last?: T): void {
    this.exhausted = true;
    this.logger.debug('Sequence exhausted:', {
      width: this.width.name,
      last: last === undefined ? undefined : this.width.encode(last),
    });
  }

  private requireValue(field: string, value: unknown): T {
    return Sequence.requireWidthValue(this.width, field, value);
  }

  private static requireWidthValue<T extends UnsignedValue>(
    width: UnsignedWidth<T>,
    field: string,
    value: unknown
  ): T {
    if (!width.isValue(value)) {
      throw SequenceError.invalidValue(width.name, field, value);
    }
    return value;
  }
}

/**
 * Create a sequence from a configuration object
 */
export function createSequence<T extends UnsignedValue>(config: SequenceConfig<T>): Sequence<T> {
  return new Sequence(config);
}

import { describe, expect, it } from 'vitest';
import { decodeState, deserializeSequence, encodeState, serializeSequence } from '../src/codec.js';
import { SequenceError } from '../src/error.js';
import { Sequence } from '../src/sequence.js';
import { u8, u32, u64 } from '../src/widths.js';
import { catchError, drain } from './helpers.js';
import { MockLogger } from './mocks/mockLogger.js';

describe('Sequence codec', () => {
  describe('Serialization', () => {
    it('should serialize fields in a stable order', () => {
      const sequence = Sequence.withStartEndStep(u32, 22, 99, 11);
      sequence.next();

      expect(serializeSequence(sequence)).toBe(
        '{"width":"u32","start":22,"current":33,"step":11,"end":99,"exhausted":false}'
      );
    });

    it('should encode bigint widths as decimal strings', () => {
      const sequence = Sequence.withStart(u64, 2n ** 63n);
      sequence.next();

      expect(encodeState(u64, sequence.getState())).toEqual({
        width: 'u64',
        start: '9223372036854775808',
        current: '9223372036854775809',
        step: '1',
        end: '18446744073709551615',
        exhausted: false,
      });
    });
  });

  describe('Round trip', () => {
    it('should resume where the serialized sequence left off', () => {
      const sequence = Sequence.withStartEndStep(u32, 22, 99, 11);
      sequence.next();

      const restored = deserializeSequence(u32, serializeSequence(sequence));

      expect(drain(restored)).toEqual([33, 44, 55, 66, 77, 88, 99]);
      expect(drain(sequence)).toEqual([33, 44, 55, 66, 77, 88, 99]);
    });

    it('should keep the exhausted status', () => {
      const sequence = Sequence.withStartAndStep(u8, 250, 10);
      sequence.next();

      const restored = deserializeSequence(u8, serializeSequence(sequence));

      expect(restored.isExhausted()).toBe(true);
      expect(restored.next()).toBeUndefined();
      restored.reset();
      expect(restored.next()).toBe(250);
    });

    it('should keep a sequence started after the maximum exhausted across reset', () => {
      const sequence = Sequence.startAfter(u8, 255);

      const restored = deserializeSequence(u8, serializeSequence(sequence));
      sequence.reset();
      restored.reset();

      expect(restored.isExhausted()).toBe(sequence.isExhausted());
      expect(restored.isExhausted()).toBe(true);
      expect(restored.next()).toBeUndefined();
      expect(sequence.next()).toBeUndefined();
    });

    it('should resume bigint sequences', () => {
      const sequence = Sequence.withStart(u64, u64.max - 1n);
      sequence.next();

      const restored = deserializeSequence(u64, serializeSequence(sequence));

      expect(restored.peek()).toBe(u64.max);
      expect(restored.next()).toBe(u64.max);
      expect(restored.next()).toBeUndefined();
    });

    it('should pass options to the restored sequence', () => {
      const logger = new MockLogger();
      const sequence = Sequence.withStart(u8, 255);

      const restored = deserializeSequence(u8, serializeSequence(sequence), { logger });
      restored.next();

      expect(logger.messages('debug')).toEqual(['Sequence exhausted:']);
    });
  });

  describe('Older persisted forms', () => {
    it('should default end to the width maximum and exhausted to false', () => {
      const restored = deserializeSequence(u32, '{"width":"u32","start":0,"current":88,"step":11}');

      expect(restored.getEnd()).toBe(u32.max);
      expect(restored.isExhausted()).toBe(false);
      expect(restored.take(4)).toEqual([88, 99, 110, 121]);
    });

    it('should accept plain numbers for bigint widths', () => {
      expect(decodeState(u64, { width: 'u64', start: 0, current: 5, step: 1 })).toEqual({
        start: 0n,
        current: 5n,
        step: 1n,
        end: u64.max,
        exhausted: false,
      });
    });
  });

  describe('Invalid input', () => {
    it('should reject text that is not JSON', () => {
      const error = catchError(() => deserializeSequence(u8, 'not json'), SequenceError);

      expect(error.code).toBe('INVALID_STATE');
      expect(error.message).toBe('Invalid state: not valid JSON');
    });

    it('should reject values that are not persisted sequences', () => {
      const error = catchError(() => decodeState(u8, null), SequenceError);

      expect(error.code).toBe('INVALID_STATE');
      expect(error.message).toBe('Invalid state: not a persisted sequence');
      expect(() => decodeState(u8, { width: 'u9', start: 0, current: 0, step: 1 })).toThrow(
        SequenceError
      );
      expect(() =>
        decodeState(u8, { width: 'u8', start: 0, current: 0, step: 1, exhausted: 'no' })
      ).toThrow(SequenceError);
    });

    it('should reject state persisted for another width', () => {
      const error = catchError(
        () => decodeState(u8, { width: 'u16', start: 0, current: 0, step: 1 }),
        SequenceError
      );

      expect(error.data).toEqual({ expected: 'u8', actual: 'u16' });
    });

    it('should reject out-of-range values', () => {
      const error = catchError(
        () => decodeState(u8, { width: 'u8', start: 0, current: 256, step: 1 }),
        SequenceError
      );

      expect(error.code).toBe('INVALID_STATE');
      expect(error.data).toEqual({ field: 'current', value: 256 });
    });

    it('should reject negative bigint strings', () => {
      const error = catchError(
        () => decodeState(u64, { width: 'u64', start: '-1', current: '0', step: '1' }),
        SequenceError
      );

      expect(error.data).toEqual({ field: 'start', value: '-1' });
    });

    it('should reject a current below start', () => {
      const error = catchError(
        () => deserializeSequence(u8, '{"width":"u8","start":10,"current":5,"step":1}'),
        SequenceError
      );

      expect(error.message).toBe('Invalid state: current is below start');
    });
  });
});

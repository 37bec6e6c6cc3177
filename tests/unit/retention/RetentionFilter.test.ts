import { describe, expect, test } from '@jest/globals';
import { InvalidFormatError } from '../../../src/errors/ArchiveErrors.js';
import {
  cutoffDay,
  cutoffFrom,
  describeFilter,
  formatCutoffDate,
  parseTimeRange,
} from '../../../src/retention/RetentionFilter.js';

describe('RetentionFilter', () => {
  describe('parseTimeRange', () => {
    test.each([
      ['30D', '30D', 30],
      ['2W', '2W', 14],
      ['6M', '6M', 180],
      ['1Y', '1Y', 365],
      ['2w', '2W', 14],
      [' 6m ', '6M', 180],
      ['007D', '7D', 7],
    ])('parses %p as %p (%p days)', (input, expression, days) => {
      expect(parseTimeRange(input)).toEqual({ expression, days });
    });

    test.each(['', '30', 'D30', '1.5M', '30X', '-1D', '30 D', '1Y2M'])('rejects %p', (input) => {
      expect(() => parseTimeRange(input)).toThrow(InvalidFormatError);
    });

    test('explains the accepted formats', () => {
      expect(() => parseTimeRange('30X')).toThrow(
        "Invalid time range format: '30X'. Use formats like: 30D (days), 6M (months), 1Y (years), 2W (weeks)"
      );
    });

    test('rejects ranges whose cutoff a Date cannot hold', () => {
      expect(parseTimeRange('100000000D')).toEqual({ expression: '100000000D', days: 100_000_000 });
      expect(() => parseTimeRange('100000001D')).toThrow(InvalidFormatError);
      expect(() => parseTimeRange('300000Y')).toThrow(
        "Time range '300000Y' is too large: at most 100000000 days can be represented"
      );
      expect(() => parseTimeRange('99999999999999999999D')).toThrow(InvalidFormatError);
    });

    test('carries the rejected input on the error', () => {
      try {
        parseTimeRange('soon');
        throw new Error('expected parseTimeRange to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidFormatError);
        expect(error).toMatchObject({ input: 'soon', code: 'INVALID_FORMAT' });
      }
    });
  });

  describe('cutoffFrom', () => {
    const now = new Date('2024-06-15T12:00:00.000Z');

    test('subtracts whole days', () => {
      expect(cutoffFrom(parseTimeRange('30D'), now).toISOString()).toBe('2024-05-16T12:00:00.000Z');
      expect(cutoffFrom(parseTimeRange('2W'), now).toISOString()).toBe('2024-06-01T12:00:00.000Z');
    });

    test('refuses a cutoff before the earliest representable date', () => {
      const earliest = new Date(-8.64e15);
      expect(() => cutoffFrom({ expression: '1D', days: 1 }, earliest)).toThrow(
        "Time range '1D' reaches before the earliest date"
      );
    });

    test('treats a year as 365 days, even across a leap day', () => {
      const march = new Date('2024-03-01T00:00:00.000Z');
      expect(cutoffFrom(parseTimeRange('1Y'), march).toISOString()).toBe('2023-03-02T00:00:00.000Z');
    });
  });

  describe('cutoffDay', () => {
    test('truncates to the start of the UTC day', () => {
      expect(cutoffDay(new Date('2024-05-16T12:34:56.789Z')).toISOString()).toBe('2024-05-16T00:00:00.000Z');
    });
  });

  describe('describeFilter', () => {
    test('describes a cutoff by its date', () => {
      const cutoff = new Date('2024-05-16T12:00:00.000Z');
      expect(formatCutoffDate(cutoff)).toBe('2024-05-16');
      expect(describeFilter(cutoff)).toBe('older than 2024-05-16');
    });

    test('describes a missing cutoff as every message', () => {
      expect(describeFilter()).toBe('all messages');
    });
  });
});

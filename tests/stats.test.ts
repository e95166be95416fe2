import { describe, expect, it } from 'vitest';

import { average, median, percentile, summarizeLatencies } from '../src/stats';

/**
 * Test suite for the statistics utility functions.
 */
describe('stats', () => {
  describe('average', () => {
    it('should return 0 for an empty array', () => {
      expect(average([])).toBe(0);
    });

    it('should calculate the average of an array of numbers', () => {
      expect(average([1, 2, 3, 4, 5])).toBe(3);
    });
  });

  describe('percentile', () => {
    const tenValues = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];

    it('should return 0 for an empty array', () => {
      expect(percentile([], 0.5)).toBe(0);
      expect(percentile([], 0.99)).toBe(0);
    });

    /**
     * round(0.9 * 9) = 8, the ninth value.
     */
    it('should pick the nearest rank for p90 of ten values', () => {
      expect(percentile(tenValues, 0.9)).toBe(9);
    });

    /**
     * round(0.5 * 9) rounds 4.5 up to 5; an interpolated median would be 5.5.
     */
    it('should use nearest rank rather than interpolation for the median', () => {
      expect(percentile(tenValues, 0.5)).toBe(6);
    });

    it('should pick the last value for p99 of ten values', () => {
      // 0.99 * 9 = 8.91 -> 9
      expect(percentile(tenValues, 0.99)).toBe(10);
    });

    it('should clamp out-of-range quantiles to the array bounds', () => {
      expect(percentile(tenValues, 0)).toBe(1);
      expect(percentile(tenValues, 1.5)).toBe(10);
      expect(percentile(tenValues, -1)).toBe(1);
    });

    it('should handle an array with a single element', () => {
      expect(percentile([10], 0.95)).toBe(10);
    });

    it('should pick the middle value of an odd-length array', () => {
      expect(percentile([1, 2, 3, 4, 5], 0.5)).toBe(3);
    });
  });

  describe('median', () => {
    it('should return 0 for an empty array', () => {
      expect(median([])).toBe(0);
    });

    it('should return the middle value for an odd count', () => {
      expect(median([30, 10, 20])).toBe(20);
    });

    it('should average the two middle values for an even count', () => {
      expect(median([40, 10, 30, 20])).toBe(25);
    });

    it('should not reorder its input', () => {
      const values = [3, 1, 2];
      median(values);
      expect(values).toEqual([3, 1, 2]);
    });
  });

  describe('summarizeLatencies', () => {
    it('should return all zeros for no successes', () => {
      expect(summarizeLatencies([])).toEqual({
        successfulRequests: 0,
        minMs: 0,
        avgMs: 0,
        p50Ms: 0,
        p90Ms: 0,
        p99Ms: 0,
        maxMs: 0,
      });
    });

    it('should summarize unsorted latencies', () => {
      const latencies = [10, 1, 9, 2, 8, 3, 7, 4, 6, 5];
      expect(summarizeLatencies(latencies)).toEqual({
        successfulRequests: 10,
        minMs: 1,
        avgMs: 5.5,
        p50Ms: 6,
        p90Ms: 9,
        p99Ms: 10,
        maxMs: 10,
      });
      expect(latencies[0]).toBe(10);
    });
  });
});

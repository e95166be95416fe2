/**
 * Latency statistics over the successful requests of one run.
 * All values are in milliseconds; every field is zero when there were no successes.
 */
export interface LatencyStats {
  successfulRequests: number;
  minMs: number;
  avgMs: number;
  p50Ms: number;
  p90Ms: number;
  p99Ms: number;
  maxMs: number;
}

/**
 * Calculates the arithmetic mean of an array of numbers.
 * @returns The average, or 0 for an empty array.
 */
export function average(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * Nearest-rank percentile of an ascending-sorted array.
 *
 * The index is `round(q * (n - 1))`, rounding halves up, clamped to the
 * array bounds. No interpolation happens between neighbours, so for ten
 * values `q = 0.9` picks index 8 and `q = 0.5` picks index 5.
 *
 * @param sorted Values sorted ascending.
 * @param q Quantile in [0, 1].
 * @returns The value at the computed rank, or 0 for an empty array.
 */
export function percentile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) return 0;
  const lastIndex = sorted.length - 1;
  const index = Math.max(0, Math.min(Math.floor(q * lastIndex + 0.5), lastIndex));
  return sorted[index];
}

/**
 * Median with the usual even-length rule (mean of the two middle values).
 * @returns The median, or 0 for an empty array.
 */
export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1
    ? sorted[middle]
    : 0.5 * (sorted[middle - 1] + sorted[middle]);
}

/**
 * Summarizes the latencies of successful requests. The input is not modified.
 */
export function summarizeLatencies(latenciesMs: readonly number[]): LatencyStats {
  if (latenciesMs.length === 0) {
    return {
      successfulRequests: 0,
      minMs: 0,
      avgMs: 0,
      p50Ms: 0,
      p90Ms: 0,
      p99Ms: 0,
      maxMs: 0,
    };
  }

  const sorted = [...latenciesMs].sort((a, b) => a - b);
  return {
    successfulRequests: sorted.length,
    minMs: sorted[0],
    avgMs: average(sorted),
    p50Ms: percentile(sorted, 0.5),
    p90Ms: percentile(sorted, 0.9),
    p99Ms: percentile(sorted, 0.99),
    maxMs: sorted[sorted.length - 1],
  };
}

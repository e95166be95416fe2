export interface DistributionBucket {
  /** Range label in milliseconds, e.g. `1.20-1.45` or `3.10+` for the last bucket. */
  latency: string;
  count: number;
  /** Share of all samples, e.g. `12%`. */
  percent: string;
  /** Share of samples at or below this bucket. */
  cumulative: string;
  chart: string;
}

export interface DistributionOptions {
  /** Number of equal-width buckets. */
  count: number;
  /** Width in characters of the largest bar. Defaults to 20. */
  chartWidth?: number;
}

/**
 * Groups latencies into equal-width buckets between the fastest and the
 * slowest sample for console display.
 */
export function buildLatencyDistribution(
  latenciesMs: readonly number[],
  options: DistributionOptions,
): DistributionBucket[] {
  if (latenciesMs.length === 0 || options.count < 1) {
    return [];
  }

  let min = Infinity;
  let max = -Infinity;
  for (const latency of latenciesMs) {
    if (latency < min) min = latency;
    if (latency > max) max = latency;
  }

  const bucketCount = options.count;
  const bucketSize = (max - min) / bucketCount || 1;
  const counts = new Array<number>(bucketCount).fill(0);

  for (const latency of latenciesMs) {
    const index = Math.min(
      Math.floor((latency - min) / bucketSize),
      bucketCount - 1,
    );
    counts[index]++;
  }

  const total = latenciesMs.length;
  const largest = Math.max(...counts);
  const chartWidth = options.chartWidth ?? 20;
  let cumulative = 0;

  return counts.map((count, i) => {
    cumulative += count;
    const lower = min + i * bucketSize;
    const upper = lower + bucketSize;
    return {
      latency:
        i === bucketCount - 1
          ? `${lower.toFixed(2)}+`
          : `${lower.toFixed(2)}-${upper.toFixed(2)}`,
      count,
      percent: `${((count / total) * 100).toFixed(0)}%`,
      cumulative: `${((cumulative / total) * 100).toFixed(0)}%`,
      chart: '█'.repeat(Math.round((count / largest) * chartWidth)),
    };
  });
}

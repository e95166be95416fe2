import { average, LatencyStats, median } from './stats';

/**
 * The result of one closed-loop or open-loop run.
 */
export interface RunSummary extends LatencyStats {
  /** Requests that failed for any reason. */
  errors: number;
  /** Requests issued, successes plus errors. */
  totalRequests: number;
  /** Wall-clock duration of the measured batch, including the open-loop drain. */
  wallTimeSec: number;
  /** Successful requests per second of wall time. */
  throughput: number;
}

/**
 * Extra bookkeeping reported by an open-loop run.
 */
export interface OpenRunSummary extends RunSummary {
  /** Requests accepted by the dispatch loop. Equal to `totalRequests`. */
  dispatched: number;
  /** Highest number of dispatched-but-unfinished requests at any instant. */
  peakOutstanding: number;
  /** Highest number of requests executing at any instant. */
  peakExecuting: number;
}

/**
 * Median-of-repeats view over several runs with the same parameters.
 */
export interface RepeatedRunSummary {
  throughput: number;
  p50Ms: number;
  p90Ms: number;
  p99Ms: number;
  /** Mean failure count per run. */
  errors: number;
  runs: RunSummary[];
}

/**
 * Builds a {@link RunSummary} from the latency stats of a completed run.
 */
export function toRunSummary(
  stats: LatencyStats,
  errors: number,
  wallTimeSec: number,
): RunSummary {
  return {
    ...stats,
    errors,
    totalRequests: stats.successfulRequests + errors,
    wallTimeSec,
    throughput: wallTimeSec > 0 ? stats.successfulRequests / wallTimeSec : 0,
  };
}

/**
 * Collapses repeated runs into element-wise medians, with the mean error count.
 */
export function aggregateRuns(runs: RunSummary[]): RepeatedRunSummary {
  return {
    throughput: median(runs.map((r) => r.throughput)),
    p50Ms: median(runs.map((r) => r.p50Ms)),
    p90Ms: median(runs.map((r) => r.p90Ms)),
    p99Ms: median(runs.map((r) => r.p99Ms)),
    errors: average(runs.map((r) => r.errors)),
    runs,
  };
}

import ora from 'ora';
import { performance } from 'perf_hooks';

import { executeRequest, executeSafely, RequestExecutor } from './executor';
import {
  printClosedRunDetail,
  printLatencies,
  printLatencyDistribution,
  printRepeatedSummary,
  printRunHeader,
} from './printer';
import { summarizeLatencies } from './stats';
import {
  aggregateRuns,
  RepeatedRunSummary,
  RunSummary,
  toRunSummary,
} from './summarizer';
import { buildTarget, Target } from './target';
import {
  requireNonNegativeInteger,
  requirePositiveInteger,
  requirePositiveNumber,
} from './utils';

/**
 * Options for a closed-loop benchmark: a fixed number of requests pushed
 * through a bounded number of concurrent slots.
 */
export interface ClosedLoopOptions {
  /** Plain-HTTP URL of the endpoint under test. */
  url: string;
  /** Requests per measured run. */
  total: number;
  /** Maximum requests in flight. */
  concurrency: number;
  /** Connect and per-read timeout, in seconds. */
  timeoutSec: number;
  /** Unmeasured requests issued once before the first run. Defaults to 0. */
  warmup?: number;
  /** Number of measured runs. Defaults to 1. */
  repeat?: number;
  /** Suppress console output. Does not change the returned values. */
  quiet?: boolean;
  /** Replaces the TCP executor, mainly for tests. */
  executor?: RequestExecutor;
}

export interface ClosedRunParams {
  target: Target;
  total: number;
  concurrency: number;
  timeoutMs: number;
  executor?: RequestExecutor;
}

interface ClosedRunResult {
  summary: RunSummary;
  latenciesMs: number[];
}

async function closedBatch(params: ClosedRunParams): Promise<ClosedRunResult> {
  const { target, total, concurrency, timeoutMs } = params;
  const executor = params.executor ?? executeRequest;
  const latenciesMs: number[] = [];
  let errors = 0;
  let next = 0;

  // A fixed pool of `concurrency` workers pulling from a shared counter is
  // the bounded gate: at most that many requests are ever in flight.
  const worker = async (): Promise<void> => {
    while (next < total) {
      next++;
      const outcome = await executeSafely(executor, target, timeoutMs);
      if (outcome.ok) {
        latenciesMs.push(outcome.latencyMs);
      } else {
        errors++;
      }
    }
  };

  const start = performance.now();
  await Promise.all(
    Array.from({ length: Math.min(concurrency, total) }, () => worker()),
  );
  const wallTimeSec = (performance.now() - start) / 1000;

  return {
    summary: toRunSummary(summarizeLatencies(latenciesMs), errors, wallTimeSec),
    latenciesMs,
  };
}

/**
 * Runs one closed-loop batch: exactly `total` requests, never more than
 * `concurrency` at once, and resolves only after every one has finished.
 *
 * @throws {RangeError} for invalid numeric parameters.
 */
export async function runClosedOnce(params: ClosedRunParams): Promise<RunSummary> {
  requireNonNegativeInteger('total', params.total);
  requirePositiveInteger('concurrency', params.concurrency);
  requirePositiveNumber('timeoutMs', params.timeoutMs);
  const { summary } = await closedBatch(params);
  return summary;
}

/**
 * Runs the closed-loop benchmark `repeat` times, one after another, and
 * returns the median of each statistic across runs.
 *
 * @throws {InvalidTargetError} if the URL is not plain HTTP.
 * @throws {RangeError} for invalid numeric options.
 */
export async function runClosed(
  options: ClosedLoopOptions,
): Promise<RepeatedRunSummary> {
  const { url, total, concurrency, timeoutSec, executor } = options;
  const warmup = options.warmup ?? 0;
  const repeat = options.repeat ?? 1;
  const quiet = options.quiet ?? false;

  requireNonNegativeInteger('total', total);
  requirePositiveInteger('concurrency', concurrency);
  requirePositiveNumber('timeoutSec', timeoutSec);
  requireNonNegativeInteger('warmup', warmup);
  requirePositiveInteger('repeat', repeat);

  const target = buildTarget(url);
  const timeoutMs = timeoutSec * 1000;

  if (warmup > 0) {
    const spinner = quiet
      ? undefined
      : ora(`Warming up with ${warmup} requests...`).start();
    await closedBatch({ target, total: warmup, concurrency, timeoutMs, executor });
    spinner?.succeed('Warmup complete');
  }

  const runs: RunSummary[] = [];
  for (let i = 0; i < repeat; i++) {
    if (!quiet) printRunHeader('closed', i, repeat);
    const { summary, latenciesMs } = await closedBatch({
      target,
      total,
      concurrency,
      timeoutMs,
      executor,
    });
    if (!quiet) {
      printClosedRunDetail(url, concurrency, summary);
      printLatencies(summary);
      printLatencyDistribution(latenciesMs);
    }
    runs.push(summary);
  }

  const aggregated = aggregateRuns(runs);
  if (!quiet) printRepeatedSummary('closed', aggregated);
  return aggregated;
}

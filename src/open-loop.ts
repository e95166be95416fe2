import ora from 'ora';
import { performance } from 'perf_hooks';

import { executeRequest, executeSafely, RequestExecutor } from './executor';
import {
  printLatencies,
  printLatencyDistribution,
  printOpenRunDetail,
  printRepeatedSummary,
  printRunHeader,
} from './printer';
import { Semaphore } from './semaphore';
import { summarizeLatencies } from './stats';
import {
  aggregateRuns,
  OpenRunSummary,
  RepeatedRunSummary,
  RunSummary,
  toRunSummary,
} from './summarizer';
import { buildTarget, Target } from './target';
import {
  requireNonNegativeNumber,
  requirePositiveInteger,
  requirePositiveNumber,
  sleep,
} from './utils';

/** Upper bound on one idle wait of the dispatch loop, in milliseconds. */
const DISPATCH_TICK_MS = 1;

/**
 * Dispatched-but-unfinished requests may reach this multiple of the
 * concurrency cap before the loop stops accepting new arrivals.
 */
export const OUTSTANDING_FACTOR = 4;

/**
 * Options for an open-loop benchmark: requests arrive at a fixed rate for a
 * fixed duration, independent of how fast the server answers.
 */
export interface OpenLoopOptions {
  /** Plain-HTTP URL of the endpoint under test. */
  url: string;
  /** Target arrival rate in requests per second. */
  rps: number;
  /** Length of the dispatch window in seconds. */
  durationSec: number;
  /** Maximum requests executing at once. */
  concurrency: number;
  /** Connect and per-read timeout, in seconds. */
  timeoutSec: number;
  /** Length of an unmeasured open-loop run before the first measured one. Defaults to 0. */
  warmupSec?: number;
  /** Number of measured runs. Defaults to 1. */
  repeat?: number;
  /** Suppress console output. Does not change the returned values. */
  quiet?: boolean;
  /** Replaces the TCP executor, mainly for tests. */
  executor?: RequestExecutor;
}

export interface OpenRunParams {
  target: Target;
  rps: number;
  durationSec: number;
  concurrency: number;
  timeoutMs: number;
  executor?: RequestExecutor;
}

interface OpenRunResult {
  summary: OpenRunSummary;
  latenciesMs: number[];
}

async function openWindow(params: OpenRunParams): Promise<OpenRunResult> {
  const { target, rps, durationSec, concurrency, timeoutMs } = params;
  const executor = params.executor ?? executeRequest;

  // Two separate gates: `outstanding` paces admission (up to 4x the cap),
  // the semaphore bounds actual execution (up to the cap).
  const executionGate = new Semaphore(concurrency);
  const outstanding = new Set<Promise<void>>();
  const maxOutstanding = OUTSTANDING_FACTOR * concurrency;

  const latenciesMs: number[] = [];
  let errors = 0;
  let dispatched = 0;
  let executing = 0;
  let peakExecuting = 0;
  let peakOutstanding = 0;

  const perform = (): Promise<void> =>
    executionGate.use(async () => {
      executing++;
      peakExecuting = Math.max(peakExecuting, executing);
      try {
        const outcome = await executeSafely(executor, target, timeoutMs);
        if (outcome.ok) {
          latenciesMs.push(outcome.latencyMs);
        } else {
          errors++;
        }
      } finally {
        executing--;
      }
    });

  const intervalMs = 1000 / Math.max(rps, 1e-9);
  const durationMs = durationSec * 1000;
  const start = performance.now();
  let nextScheduled = start;

  for (;;) {
    const now = performance.now();
    if (now - start >= durationMs) break;

    if (now >= nextScheduled && outstanding.size < maxOutstanding) {
      const task: Promise<void> = perform().finally(() => {
        outstanding.delete(task);
      });
      outstanding.add(task);
      dispatched++;
      peakOutstanding = Math.max(peakOutstanding, outstanding.size);
      nextScheduled += intervalMs;
    } else {
      await sleep(Math.min(DISPATCH_TICK_MS, Math.max(0, nextScheduled - now)));
    }
  }

  // Trailing requests still count: drain everything before measuring.
  await Promise.all(outstanding);
  const wallTimeSec = (performance.now() - start) / 1000;

  return {
    summary: {
      ...toRunSummary(summarizeLatencies(latenciesMs), errors, wallTimeSec),
      dispatched,
      peakOutstanding,
      peakExecuting,
    },
    latenciesMs,
  };
}

/**
 * Runs one open-loop window. Requests are accepted on a fixed schedule of
 * `1 / rps` seconds for `durationSec` seconds; at most `4 * concurrency`
 * may be outstanding and at most `concurrency` may execute at once.
 * Resolves after every dispatched request has completed, and the wall time
 * includes that drain.
 *
 * @throws {RangeError} for invalid numeric parameters.
 */
export async function runOpenOnce(params: OpenRunParams): Promise<OpenRunSummary> {
  requirePositiveNumber('rps', params.rps);
  requireNonNegativeNumber('durationSec', params.durationSec);
  requirePositiveInteger('concurrency', params.concurrency);
  requirePositiveNumber('timeoutMs', params.timeoutMs);
  const { summary } = await openWindow(params);
  return summary;
}

/**
 * Runs the open-loop benchmark `repeat` times, one after another, and
 * returns the median of each statistic across runs.
 *
 * @throws {InvalidTargetError} if the URL is not plain HTTP.
 * @throws {RangeError} for invalid numeric options.
 */
export async function runOpen(options: OpenLoopOptions): Promise<RepeatedRunSummary> {
  const { url, rps, durationSec, concurrency, timeoutSec, executor } = options;
  const warmupSec = options.warmupSec ?? 0;
  const repeat = options.repeat ?? 1;
  const quiet = options.quiet ?? false;

  requirePositiveNumber('rps', rps);
  requireNonNegativeNumber('durationSec', durationSec);
  requirePositiveInteger('concurrency', concurrency);
  requirePositiveNumber('timeoutSec', timeoutSec);
  requireNonNegativeNumber('warmupSec', warmupSec);
  requirePositiveInteger('repeat', repeat);

  const target = buildTarget(url);
  const timeoutMs = timeoutSec * 1000;

  if (warmupSec > 0) {
    const spinner = quiet
      ? undefined
      : ora(`Warming up for ${warmupSec}s at ${rps.toFixed(1)} rps...`).start();
    await openWindow({
      target,
      rps,
      durationSec: warmupSec,
      concurrency,
      timeoutMs,
      executor,
    });
    spinner?.succeed('Warmup complete');
  }

  const runs: RunSummary[] = [];
  for (let i = 0; i < repeat; i++) {
    if (!quiet) printRunHeader('open', i, repeat);
    const { summary, latenciesMs } = await openWindow({
      target,
      rps,
      durationSec,
      concurrency,
      timeoutMs,
      executor,
    });
    if (!quiet) {
      printOpenRunDetail(url, rps, durationSec, concurrency, summary);
      printLatencies(summary);
      printLatencyDistribution(latenciesMs);
    }
    runs.push(summary);
  }

  const aggregated = aggregateRuns(runs);
  if (!quiet) printRepeatedSummary('open', aggregated);
  return aggregated;
}

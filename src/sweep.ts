import { runClosed } from './closed-loop';
import { RequestExecutor } from './executor';
import { printSweepPoint, printSweepTitle } from './printer';
import { RepeatedRunSummary } from './summarizer';
import { buildTarget } from './target';
import { requirePositiveInteger } from './utils';

export interface SweepOptions {
  url: string;
  /** Requests per run at each concurrency. */
  total: number;
  /** Concurrency values to test, in order. */
  concurrencies: readonly number[];
  timeoutSec: number;
  warmup?: number;
  repeat?: number;
  /** Suppress the per-point summary lines. Per-run detail is always suppressed. */
  quiet?: boolean;
  executor?: RequestExecutor;
}

export interface SweepPoint {
  concurrency: number;
  summary: RepeatedRunSummary;
}

/**
 * Runs the closed-loop benchmark once per concurrency value, in input order.
 * Points share nothing but their parameters; each is measured from scratch.
 */
export async function runSweep(options: SweepOptions): Promise<SweepPoint[]> {
  const { url, total, concurrencies, timeoutSec, warmup, repeat, executor } =
    options;
  const quiet = options.quiet ?? false;

  if (concurrencies.length === 0) {
    throw new RangeError('At least one concurrency value is required');
  }
  concurrencies.forEach((c) => requirePositiveInteger('concurrency', c));
  // Fail on a bad URL before the first point runs.
  buildTarget(url);

  if (!quiet) printSweepTitle();

  const points: SweepPoint[] = [];
  for (const concurrency of concurrencies) {
    const summary = await runClosed({
      url,
      total,
      concurrency,
      timeoutSec,
      warmup,
      repeat,
      quiet: true,
      executor,
    });
    points.push({ concurrency, summary });
    if (!quiet) printSweepPoint(concurrency, summary);
  }
  return points;
}

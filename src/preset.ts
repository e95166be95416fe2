import ora from 'ora';

import {
  BenchConfig,
  ClosedPreset,
  OpenPreset,
  ProfileName,
} from './config';
import { RequestExecutor } from './executor';
import { defaultReportPath, ReportRow, writeReport } from './exporter';
import { runOpen } from './open-loop';
import {
  printCalibration,
  printOpenTarget,
  printPresetResult,
} from './printer';
import { runSweep, SweepPoint } from './sweep';
import { buildTarget } from './target';
import { formatLocalTimestamp, requirePositiveNumber } from './utils';

export interface PresetProfile {
  closed: ClosedPreset;
  open: OpenPreset;
}

/** Open-loop targets never go below this rate, in requests per second. */
export const MIN_OPEN_TARGET_RPS = 50;
/** Multipliers of the calibrated rate: under, near and over capacity. */
export const OPEN_TARGET_FACTORS = [0.5, 0.9, 1.1] as const;
/** Open-loop concurrency cap as a multiple of the best sweep concurrency. */
export const CAP_FACTOR = 2.5;
/** Absolute ceiling on the open-loop concurrency cap. */
export const MAX_CONCURRENCY_CAP = 2000;

export const PRESET_PROFILES: Readonly<Record<ProfileName, PresetProfile>> = {
  smoke: {
    closed: {
      concurrencies: [1, 10, 50, 100],
      totalPerConcurrency: 1000,
      warmup: 200,
      repeat: 2,
    },
    open: { durationSec: 8, warmupSec: 3 },
  },
  standard: {
    closed: {
      concurrencies: [1, 2, 5, 10, 20, 50, 100, 200, 400],
      totalPerConcurrency: 5000,
      warmup: 1000,
      repeat: 3,
    },
    open: { durationSec: 15, warmupSec: 5 },
  },
  stress: {
    closed: {
      concurrencies: [100, 200, 400, 800, 1200],
      totalPerConcurrency: 15000,
      warmup: 2000,
      repeat: 3,
    },
    open: { durationSec: 25, warmupSec: 8 },
  },
};

/**
 * Built-in profile defaults with any overrides from the configuration
 * merged over them, field by field.
 */
export function resolvePreset(
  profile: ProfileName,
  config?: BenchConfig,
): PresetProfile {
  const base = PRESET_PROFILES[profile];
  const closed = config?.presets?.[profile]?.closed;
  const open = config?.presets?.[profile]?.open;
  return {
    closed: {
      concurrencies: [...(closed?.concurrencies ?? base.closed.concurrencies)],
      totalPerConcurrency:
        closed?.totalPerConcurrency ?? base.closed.totalPerConcurrency,
      warmup: closed?.warmup ?? base.closed.warmup,
      repeat: closed?.repeat ?? base.closed.repeat,
    },
    open: {
      durationSec: open?.durationSec ?? base.open.durationSec,
      warmupSec: open?.warmupSec ?? base.open.warmupSec,
    },
  };
}

/**
 * The sweep point with the highest median throughput. Ties go to the
 * earliest point.
 * @throws {RangeError} for an empty sweep.
 */
export function selectBest(points: readonly SweepPoint[]): SweepPoint {
  if (points.length === 0) {
    throw new RangeError('Cannot select the best point of an empty sweep');
  }
  let best = points[0];
  for (const point of points.slice(1)) {
    if (point.summary.throughput > best.summary.throughput) {
      best = point;
    }
  }
  return best;
}

export function deriveOpenTargets(calibratedRps: number): number[] {
  return OPEN_TARGET_FACTORS.map((factor) =>
    Math.max(MIN_OPEN_TARGET_RPS, factor * calibratedRps),
  );
}

export function deriveConcurrencyCap(bestConcurrency: number): number {
  return Math.max(
    1,
    Math.min(Math.floor(CAP_FACTOR * bestConcurrency), MAX_CONCURRENCY_CAP),
  );
}

export interface PresetOptions {
  url: string;
  profile: ProfileName;
  timeoutSec: number;
  /** Optional overrides of the built-in profiles. */
  config?: BenchConfig;
  /** CSV destination. Defaults to `preset_{profile}_{unixSeconds}.csv`. */
  csvPath?: string;
  /** Set to false to skip writing the report. Defaults to true. */
  writeCsv?: boolean;
  /** Also write an `.xlsx` workbook next to the CSV. */
  xlsx?: boolean;
  /** Suppress console output. */
  quiet?: boolean;
  executor?: RequestExecutor;
  /** Clock used for the report timestamp and default file name. */
  now?: () => Date;
}

export interface PresetReport {
  profile: ProfileName;
  url: string;
  timestamp: string;
  sweep: SweepPoint[];
  bestConcurrency: number;
  calibratedRps: number;
  openTargets: number[];
  concurrencyCap: number;
  rows: ReportRow[];
  /** Where the CSV was written, if it was. */
  csvPath?: string;
}

function sweepRow(
  base: Pick<ReportRow, 'profile' | 'url' | 'timestamp'>,
  closed: ClosedPreset,
  point: SweepPoint,
): ReportRow {
  return {
    ...base,
    phase: 'closed_sweep',
    concurrency: point.concurrency,
    totalRequests: closed.totalPerConcurrency,
    warmup: closed.warmup,
    repeat: closed.repeat,
    throughputRps: point.summary.throughput,
    p50Ms: point.summary.p50Ms,
    p90Ms: point.summary.p90Ms,
    p99Ms: point.summary.p99Ms,
    errors: point.summary.errors,
  };
}

/**
 * Calibrates with a closed-loop sweep, then probes the server open-loop at
 * 50%, 90% and 110% of the best measured throughput.
 *
 * The three open-loop runs happen one after another, capped at
 * `min(2.5 * bestConcurrency, 2000)` concurrent requests. One report row is
 * produced per sweep point and per open-loop target, and written to CSV
 * unless `writeCsv` is false.
 */
export async function runPreset(options: PresetOptions): Promise<PresetReport> {
  const { url, profile, timeoutSec, executor } = options;
  const quiet = options.quiet ?? false;
  const now = (options.now ?? (() => new Date()))();

  requirePositiveNumber('timeoutSec', timeoutSec);
  buildTarget(url);

  const preset = resolvePreset(profile, options.config);
  const { closed, open } = preset;
  const timestamp = formatLocalTimestamp(now);
  const base = { profile, url, timestamp };

  const sweep = await runSweep({
    url,
    total: closed.totalPerConcurrency,
    concurrencies: closed.concurrencies,
    timeoutSec,
    warmup: closed.warmup,
    repeat: closed.repeat,
    quiet,
    executor,
  });
  const rows = sweep.map((point) => sweepRow(base, closed, point));

  const best = selectBest(sweep);
  const calibratedRps = best.summary.throughput;
  const openTargets = deriveOpenTargets(calibratedRps);
  const concurrencyCap = deriveConcurrencyCap(best.concurrency);

  if (!quiet) printCalibration(calibratedRps, best.concurrency);

  for (const targetRps of openTargets) {
    if (!quiet) printOpenTarget(targetRps, open.durationSec, concurrencyCap);
    const summary = await runOpen({
      url,
      rps: targetRps,
      durationSec: open.durationSec,
      concurrency: concurrencyCap,
      timeoutSec,
      warmupSec: open.warmupSec,
      repeat: closed.repeat,
      quiet,
      executor,
    });
    rows.push({
      ...base,
      phase: 'open_loop',
      concurrency: concurrencyCap,
      openDurationSec: open.durationSec,
      warmup: open.warmupSec,
      repeat: closed.repeat,
      openTargetRps: targetRps,
      throughputRps: summary.throughput,
      p50Ms: summary.p50Ms,
      p90Ms: summary.p90Ms,
      p99Ms: summary.p99Ms,
      errors: summary.errors,
    });
  }

  let csvPath: string | undefined;
  if (options.writeCsv ?? true) {
    csvPath = options.csvPath ?? defaultReportPath(profile, now);
    const spinner = quiet ? undefined : ora('Writing preset report...').start();
    try {
      await writeReport(rows, csvPath, { xlsx: options.xlsx });
      spinner?.succeed(`Wrote ${rows.length} rows to ${csvPath}`);
    } catch (err) {
      spinner?.fail(
        `Failed to write report: ${err instanceof Error ? err.message : String(err)}`,
      );
      throw err;
    }
  }

  if (!quiet) {
    printPresetResult(
      calibratedRps,
      best.concurrency,
      openTargets,
      concurrencyCap,
      csvPath,
    );
  }

  return {
    profile,
    url,
    timestamp,
    sweep,
    bestConcurrency: best.concurrency,
    calibratedRps,
    openTargets,
    concurrencyCap,
    rows,
    csvPath,
  };
}

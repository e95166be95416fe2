/* eslint-disable no-console */
import chalk from 'chalk';
import ora from 'ora';
import { z } from 'zod';

import { ClosedLoopOptions, runClosed } from './closed-loop';
import { BenchConfig, loadConfig } from './config';
import { OpenLoopOptions, runOpen } from './open-loop';
import { PresetOptions, PresetReport, runPreset } from './preset';
import { RepeatedRunSummary } from './summarizer';
import { runSweep, SweepOptions, SweepPoint } from './sweep';
import { InvalidTargetError } from './target';

export { buildTarget, InvalidTargetError } from './target';
export type { Target } from './target';
export { executeRequest } from './executor';
export type { RequestExecutor, RequestOutcome } from './executor';
export { average, median, percentile, summarizeLatencies } from './stats';
export type { LatencyStats } from './stats';
export { Semaphore } from './semaphore';
export { aggregateRuns } from './summarizer';
export type {
  OpenRunSummary,
  RepeatedRunSummary,
  RunSummary,
} from './summarizer';
export { runClosed, runClosedOnce } from './closed-loop';
export type { ClosedLoopOptions } from './closed-loop';
export { runOpen, runOpenOnce } from './open-loop';
export type { OpenLoopOptions } from './open-loop';
export { runSweep } from './sweep';
export type { SweepOptions, SweepPoint } from './sweep';
export {
  deriveConcurrencyCap,
  deriveOpenTargets,
  PRESET_PROFILES,
  resolvePreset,
  runPreset,
  selectBest,
} from './preset';
export type { PresetOptions, PresetReport } from './preset';
export { loadConfig } from './config';
export type { BenchConfig, ProfileName } from './config';
export { toCsv, writeReport } from './exporter';
export type { ReportRow } from './exporter';
export { startTargetServer } from './target-server';
export type { TargetServer } from './target-server';

/**
 * Defines one benchmark invocation. The `mode` picks the workload model.
 */
export type RunOptions =
  | ({ mode: 'closed' } & ClosedLoopOptions)
  | ({ mode: 'open' } & OpenLoopOptions)
  | ({ mode: 'sweep' } & SweepOptions)
  | ({ mode: 'preset' } & Omit<PresetOptions, 'config'> & {
        /** Path, URL or object holding preset overrides. */
        config?: string | BenchConfig;
      });

export type RunResult = RepeatedRunSummary | SweepPoint[] | PresetReport;

async function loadPresetConfig(
  input: string | BenchConfig | undefined,
  quiet: boolean,
): Promise<BenchConfig | undefined> {
  if (input === undefined) return undefined;
  if (typeof input === 'object') return loadConfig(input);

  const spinner = quiet ? undefined : ora('Loading config...').start();
  try {
    const config = await loadConfig(input);
    spinner?.succeed(`Loaded config from ${input}`);
    return config;
  } catch (err) {
    spinner?.fail(`Failed to load config from ${input}`);
    throw err;
  }
}

function reportFailure(err: unknown): void {
  if (err instanceof InvalidTargetError) {
    console.error(chalk.red(`Invalid target: ${err.message}`));
  } else if (err instanceof RangeError) {
    console.error(chalk.red(`Invalid parameter: ${err.message}`));
  } else if (err instanceof z.ZodError) {
    console.error(chalk.red('Config validation failed:'));
    console.error(JSON.stringify(err.errors, null, 2));
  } else {
    console.error(
      chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`),
    );
  }
}

/**
 * Runs one benchmark in the selected workload model.
 *
 * Invalid targets, parameters and configs are printed in red and rethrown,
 * before any request is sent. Failed requests never throw; they are
 * counted in the returned summaries.
 */
export async function runLoadTest(options: RunOptions): Promise<RunResult> {
  try {
    switch (options.mode) {
      case 'closed':
        return await runClosed(options);
      case 'open':
        return await runOpen(options);
      case 'sweep':
        return await runSweep(options);
      case 'preset': {
        const config = await loadPresetConfig(
          options.config,
          options.quiet ?? false,
        );
        return await runPreset({ ...options, config });
      }
    }
  } catch (err) {
    reportFailure(err);
    throw err;
  }
}

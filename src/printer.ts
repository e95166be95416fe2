/* eslint-disable no-console */
import chalk from 'chalk';
import Table from 'cli-table3';

import { buildLatencyDistribution } from './distribution';
import { LatencyStats } from './stats';
import { OpenRunSummary, RepeatedRunSummary, RunSummary } from './summarizer';

export type WorkloadModel = 'closed' | 'open';

function ms(value: number): string {
  return `${value.toFixed(2)}ms`;
}

export function printRunHeader(
  model: WorkloadModel,
  index: number,
  repeat: number,
): void {
  console.log(chalk.dim(`--- ${model} run ${index + 1}/${repeat} ---`));
}

export function printClosedRunDetail(
  url: string,
  concurrency: number,
  summary: RunSummary,
): void {
  console.log(`URL: ${url}`);
  console.log(
    `Total: ${summary.totalRequests}, Concurrency: ${concurrency}, Errors: ${
      summary.errors > 0 ? chalk.red(summary.errors) : summary.errors
    }`,
  );
  console.log(
    `Wall time: ${summary.wallTimeSec.toFixed(3)}s, Throughput: ${summary.throughput.toFixed(1)} req/s`,
  );
}

export function printOpenRunDetail(
  url: string,
  targetRps: number,
  durationSec: number,
  concurrencyCap: number,
  summary: OpenRunSummary,
): void {
  console.log(`URL: ${url}`);
  console.log(
    `Mode: open-loop, Target: ${targetRps.toFixed(1)} rps for ${durationSec.toFixed(1)}s, Concurrency cap: ${concurrencyCap}`,
  );
  console.log(
    `Wall time: ${summary.wallTimeSec.toFixed(3)}s, Achieved: ${summary.throughput.toFixed(1)} req/s, Errors: ${
      summary.errors > 0 ? chalk.red(summary.errors) : summary.errors
    }`,
  );
  console.log(
    chalk.dim(
      `Dispatched: ${summary.dispatched}, Peak outstanding: ${summary.peakOutstanding}, Peak executing: ${summary.peakExecuting}`,
    ),
  );
}

export function printLatencies(stats: LatencyStats): void {
  if (stats.successfulRequests === 0) return;
  console.log(
    [
      'Latency:',
      `min=${ms(stats.minMs)}`,
      `avg=${ms(stats.avgMs)}`,
      `p50=${ms(stats.p50Ms)}`,
      `p90=${ms(stats.p90Ms)}`,
      `p99=${ms(stats.p99Ms)}`,
      `max=${ms(stats.maxMs)}`,
    ].join(' '),
  );
}

export function printLatencyDistribution(latenciesMs: readonly number[]): void {
  const distribution = buildLatencyDistribution(latenciesMs, {
    count: 8,
    chartWidth: 20,
  });
  if (distribution.length === 0) return;

  const table = new Table({
    head: ['Range (ms)', 'Count', '% of Total', 'Cumulative %', 'Chart'],
    colWidths: [20, 10, 15, 15, 25],
  });
  for (const bucket of distribution) {
    if (bucket.count === 0) continue;
    table.push([
      bucket.latency,
      bucket.count,
      bucket.percent,
      bucket.cumulative,
      chalk.green(bucket.chart),
    ]);
  }
  console.log(table.toString());
}

export function printRepeatedSummary(
  model: WorkloadModel,
  summary: RepeatedRunSummary,
): void {
  const table = new Table({
    head: ['Stat', 'Median'],
    colWidths: [20, 20],
  });
  table.push(
    [
      model === 'closed' ? 'Throughput' : 'Achieved',
      `${summary.throughput.toFixed(1)} req/s`,
    ],
    ['p50 Latency', ms(summary.p50Ms)],
    ['p90 Latency', ms(summary.p90Ms)],
    ['p99 Latency', ms(summary.p99Ms)],
    [
      chalk.red('Errors (mean)'),
      summary.errors.toFixed(summary.errors % 1 === 0 ? 0 : 1),
    ],
  );

  console.log('\n' + chalk.bold(`=== ${model} summary (median) ===`));
  console.log(table.toString());
}

export function printSweepTitle(): void {
  console.log(chalk.bold('=== sweep (closed-loop medians) ==='));
}

export function printSweepPoint(
  concurrency: number,
  summary: RepeatedRunSummary,
): void {
  console.log(
    `c=${String(concurrency).padStart(4)} -> thr=${summary.throughput
      .toFixed(1)
      .padStart(8)} rps  p50=${ms(summary.p50Ms).padStart(9)}  p90=${ms(
      summary.p90Ms,
    ).padStart(9)}  p99=${ms(summary.p99Ms).padStart(9)}`,
  );
}

export function printCalibration(
  calibratedRps: number,
  bestConcurrency: number,
): void {
  console.log(
    '\n' + chalk.bold('=== preset: open-loop around calibrated capacity ==='),
  );
  console.log(
    `Calibrated from closed-loop: T*=${calibratedRps.toFixed(1)} rps at C*=${bestConcurrency}`,
  );
}

export function printOpenTarget(
  targetRps: number,
  durationSec: number,
  concurrencyCap: number,
): void {
  console.log(
    '\n' +
      chalk.cyan(
        `--- open target ~ ${targetRps.toFixed(0)} rps for ${durationSec.toFixed(0)}s (cap ${concurrencyCap}) ---`,
      ),
  );
}

export function printPresetResult(
  calibratedRps: number,
  bestConcurrency: number,
  openTargets: readonly number[],
  concurrencyCap: number,
  csvPath?: string,
): void {
  if (csvPath) {
    console.log('\n' + chalk.green(`Saved preset CSV to ${csvPath}`));
  }
  console.log(
    `Best closed-loop: ${calibratedRps.toFixed(1)} rps at concurrency ${bestConcurrency}`,
  );
  console.log(
    `Open-loop targets tested: [${openTargets
      .map((t) => Math.trunc(t))
      .join(', ')}] rps with cap ${concurrencyCap}`,
  );
}

#!/usr/bin/env node
/* eslint-disable no-console */
import chalk from 'chalk';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { promises as fs } from 'fs';
import path from 'path';

import pkg from '../package.json';
import { runLoadTest } from '.';
import {
  DEFAULT_CONFIG_FILE,
  findDefaultConfig,
  ProfileName,
  ProfileNameSchema,
} from './config';
import { PRESET_PROFILES } from './preset';
import { startTargetServer, TargetServer } from './target-server';

const DEFAULT_URL = 'http://127.0.0.1:8000/';

/**
 * Template for a JSON configuration file with the built-in preset profiles.
 */
const jsonConfigTemplate = `${JSON.stringify(
  { presets: PRESET_PROFILES },
  null,
  2,
)}\n`;

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function parseIntegerList(value: string): number[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(parseInteger);
}

interface ClosedCommandOptions {
  url: string;
  total: number;
  concurrency: number;
  timeout: number;
  warmup: number;
  repeat: number;
  quiet: boolean;
}

interface OpenCommandOptions {
  url: string;
  rps: number;
  duration: number;
  concurrency: number;
  timeout: number;
  warmupSec: number;
  repeat: number;
  quiet: boolean;
}

interface SweepCommandOptions {
  url: string;
  total: number;
  concurrencies: number[];
  timeout: number;
  warmup: number;
  repeat: number;
  quiet: boolean;
}

interface PresetCommandOptions {
  url: string;
  profile: ProfileName;
  timeout: number;
  csv?: string;
  xlsx: boolean;
}

interface ServeCommandOptions {
  host: string;
  port: number;
  delay: number;
}

async function resolveConfigPath(
  explicit: string | undefined,
): Promise<string | undefined> {
  return explicit ?? (await findDefaultConfig());
}

/**
 * Builds a fresh commander program. A new instance per parse keeps option
 * state from leaking between invocations.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('loopbench')
    .description(
      'HTTP load generator with closed-loop and open-loop workload models, concurrency sweeps and capacity calibration.',
    )
    .version(pkg.version)
    .option(
      '--config <path>',
      `Path or URL to a JSON config with preset overrides. Defaults to ./${DEFAULT_CONFIG_FILE} when present`,
    )
    .exitOverride();

  program
    .command('closed')
    .description('Fixed number of requests with bounded concurrency')
    .option('--url <url>', 'Target URL (plain http)', DEFAULT_URL)
    .option('-n, --total <n>', 'Requests per run', parseInteger, 1000)
    .option('-c, --concurrency <n>', 'Maximum requests in flight', parseInteger, 100)
    .option('--timeout <sec>', 'Connect and read timeout', parseNumber, 5)
    .option('--warmup <n>', 'Unmeasured warmup requests', parseInteger, 0)
    .option('--repeat <n>', 'Measured runs (median reported)', parseInteger, 1)
    .option('--quiet', 'Suppress progress and per-run output', false)
    .action(async (opts: ClosedCommandOptions) => {
      await runLoadTest({
        mode: 'closed',
        url: opts.url,
        total: opts.total,
        concurrency: opts.concurrency,
        timeoutSec: opts.timeout,
        warmup: opts.warmup,
        repeat: opts.repeat,
        quiet: opts.quiet,
      });
    });

  program
    .command('open')
    .description('Fixed arrival rate for a fixed duration')
    .option('--url <url>', 'Target URL (plain http)', DEFAULT_URL)
    .option('--rps <rate>', 'Target requests per second', parseNumber, 1000)
    .option('--duration <sec>', 'Dispatch window in seconds', parseNumber, 10)
    .option('--concurrency <n>', 'Concurrency cap', parseInteger, 500)
    .option('--timeout <sec>', 'Connect and read timeout', parseNumber, 5)
    .option('--warmup-sec <sec>', 'Unmeasured warmup run length', parseNumber, 0)
    .option('--repeat <n>', 'Measured runs (median reported)', parseInteger, 1)
    .option('--quiet', 'Suppress progress and per-run output', false)
    .action(async (opts: OpenCommandOptions) => {
      await runLoadTest({
        mode: 'open',
        url: opts.url,
        rps: opts.rps,
        durationSec: opts.duration,
        concurrency: opts.concurrency,
        timeoutSec: opts.timeout,
        warmupSec: opts.warmupSec,
        repeat: opts.repeat,
        quiet: opts.quiet,
      });
    });

  program
    .command('sweep')
    .description('Closed-loop medians across a list of concurrencies')
    .option('--url <url>', 'Target URL (plain http)', DEFAULT_URL)
    .option('-n, --total <n>', 'Requests per run', parseInteger, 1000)
    .option(
      '--concurrencies <list>',
      'Comma-separated concurrency values',
      parseIntegerList,
      [1, 2, 5, 10, 20, 50, 100, 200],
    )
    .option('--timeout <sec>', 'Connect and read timeout', parseNumber, 5)
    .option('--warmup <n>', 'Unmeasured warmup requests per point', parseInteger, 0)
    .option('--repeat <n>', 'Measured runs per point', parseInteger, 1)
    .option('--quiet', 'Suppress progress and per-run output', false)
    .action(async (opts: SweepCommandOptions) => {
      await runLoadTest({
        mode: 'sweep',
        url: opts.url,
        total: opts.total,
        concurrencies: opts.concurrencies,
        timeoutSec: opts.timeout,
        warmup: opts.warmup,
        repeat: opts.repeat,
        quiet: opts.quiet,
      });
    });

  program
    .command('preset')
    .description('Calibrate with a closed-loop sweep, then run open-loop targets and write a CSV')
    .option('--url <url>', 'Target URL (plain http)', DEFAULT_URL)
    .addOption(
      new Option('--profile <name>', 'Preset profile')
        .choices(ProfileNameSchema.options)
        .default('standard'),
    )
    .option('--timeout <sec>', 'Connect and read timeout', parseNumber, 5)
    .option('--csv <path>', 'CSV destination (default: preset_<profile>_<unix>.csv)')
    .option('--xlsx', 'Also write an .xlsx workbook next to the CSV', false)
    .action(async (opts: PresetCommandOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<{ config?: string }>();
      await runLoadTest({
        mode: 'preset',
        url: opts.url,
        profile: opts.profile,
        timeoutSec: opts.timeout,
        config: await resolveConfigPath(globalOpts.config),
        csvPath: opts.csv,
        xlsx: opts.xlsx,
      });
    });

  program
    .command('serve')
    .description('Start a minimal HTTP target that answers 200 OK and closes each connection')
    .option('--host <host>', 'Interface to bind', '127.0.0.1')
    .option('--port <port>', 'Port to bind', parseInteger, 8000)
    .option('--delay <ms>', 'Delay before each response', parseNumber, 0)
    .action(async (opts: ServeCommandOptions) => {
      let server: TargetServer;
      try {
        server = await startTargetServer({
          host: opts.host,
          port: opts.port,
          delayMs: opts.delay,
        });
      } catch (err) {
        console.error(
          chalk.red(
            `Failed to start server: ${err instanceof Error ? err.message : String(err)}`,
          ),
        );
        throw err;
      }
      console.log(chalk.green(`listening on ${server.url}`));
      process.once('SIGINT', () => {
        server.close().then(
          () => console.log('Server closed'),
          (err: unknown) => {
            console.error(chalk.red(`Failed to close server: ${String(err)}`));
            process.exitCode = 1;
          },
        );
      });
    });

  program
    .command('init')
    .summary(`Create a ${DEFAULT_CONFIG_FILE} file`)
    .description('Create a configuration file with the built-in preset profiles')
    .action(async () => {
      const filePath = path.resolve(process.cwd(), DEFAULT_CONFIG_FILE);

      if (await findDefaultConfig()) {
        console.log(
          chalk.yellow(
            `Configuration file ${DEFAULT_CONFIG_FILE} already exists. Skipping.`,
          ),
        );
        return;
      }

      try {
        await fs.writeFile(filePath, jsonConfigTemplate);
        console.log(
          chalk.green(`Successfully created ${DEFAULT_CONFIG_FILE} at ${filePath}`),
        );
      } catch (err) {
        console.error(
          chalk.red(
            `Failed to create config file: ${err instanceof Error ? err.message : String(err)}`,
          ),
        );
        throw err;
      }
    });

  program.addHelpText(
    'after',
    `
Examples:
  # Serve a local target
  $ loopbench serve --port 8000

  # 1000 requests, 100 in flight, median of 3 runs
  $ loopbench closed --url http://127.0.0.1:8000/ -n 1000 -c 100 --repeat 3

  # 500 req/s for 10s with at most 200 executing
  $ loopbench open --rps 500 --duration 10 --concurrency 200

  # Calibrate and write preset_smoke_<unix>.csv
  $ loopbench preset --profile smoke
`,
  );

  return program;
}

/**
 * Parses the command line arguments and runs the program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(args);
}

if (typeof require !== 'undefined' && require.main === module) {
  runCli().catch((err: unknown) => {
    // every action prints its own failure before rethrowing
    process.exitCode = err instanceof CommanderError ? err.exitCode : 1;
  });
}

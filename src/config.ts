import { promises as fs } from 'fs';
import path from 'path';
import { request } from 'undici';
import { z } from 'zod';

/** File name looked up in the working directory when no config is given. */
export const DEFAULT_CONFIG_FILE = 'loopbench.config.json';

export const ProfileNameSchema = z.enum(['smoke', 'standard', 'stress']);

/**
 * Closed-loop calibration parameters of a preset profile.
 */
export const ClosedPresetSchema = z.object({
  /** Concurrency values swept during calibration, in order. */
  concurrencies: z
    .array(z.number().int().positive())
    .min(1, 'At least one concurrency must be specified'),
  /** Requests per run at each concurrency. */
  totalPerConcurrency: z.number().int().nonnegative(),
  /** Warmup requests before each sweep point. */
  warmup: z.number().int().nonnegative(),
  /** Repeats per point, and per open-loop target. */
  repeat: z.number().int().positive(),
});

/**
 * Open-loop parameters of a preset profile.
 */
export const OpenPresetSchema = z.object({
  /** Length of each measured open-loop run, in seconds. */
  durationSec: z.number().nonnegative(),
  /** Length of the open-loop warmup run, in seconds. */
  warmupSec: z.number().nonnegative(),
});

const PresetOverrideSchema = z.object({
  closed: ClosedPresetSchema.partial().optional(),
  open: OpenPresetSchema.partial().optional(),
});

/**
 * Zod schema for the optional JSON configuration file.
 */
export const BenchConfigSchema = z.object({
  /** A URL to the JSON schema for this configuration file. */
  $schema: z.string().optional(),
  /** Per-profile overrides merged over the built-in preset defaults. */
  presets: z
    .object({
      smoke: PresetOverrideSchema.optional(),
      standard: PresetOverrideSchema.optional(),
      stress: PresetOverrideSchema.optional(),
    })
    .strict()
    .optional(),
});

export type ProfileName = z.infer<typeof ProfileNameSchema>;
export type ClosedPreset = z.infer<typeof ClosedPresetSchema>;
export type OpenPreset = z.infer<typeof OpenPresetSchema>;
export type PresetOverride = z.infer<typeof PresetOverrideSchema>;
export type BenchConfig = z.infer<typeof BenchConfigSchema>;

/**
 * Loads and validates a configuration from a file, a URL, or an object.
 * @param configInput A local path, an `http(s)://` URL, or a config object.
 * @returns The validated configuration.
 */
export async function loadConfig(
  configInput: string | BenchConfig,
): Promise<BenchConfig> {
  if (typeof configInput === 'object') {
    return BenchConfigSchema.parse(configInput);
  }

  let rawContent: unknown;
  if (configInput.startsWith('http://') || configInput.startsWith('https://')) {
    const { statusCode, body } = await request(configInput);
    if (statusCode >= 400) {
      await body.dump();
      throw new Error(`Remote config fetch failed: ${statusCode}`);
    }
    rawContent = await body.json();
  } else {
    const absolutePath = path.resolve(configInput);
    const fileContent = await fs.readFile(absolutePath, 'utf-8');
    rawContent = JSON.parse(fileContent);
  }
  return BenchConfigSchema.parse(rawContent);
}

/**
 * Returns the path of `loopbench.config.json` in `cwd` if it exists.
 */
export async function findDefaultConfig(
  cwd: string = process.cwd(),
): Promise<string | undefined> {
  const candidate = path.resolve(cwd, DEFAULT_CONFIG_FILE);
  try {
    await fs.access(candidate);
    return candidate;
  } catch {
    return undefined;
  }
}

import { writeFile } from 'fs/promises';
import * as xlsx from 'xlsx';

import { getSafeFileName } from './utils';

export type ReportPhase = 'closed_sweep' | 'open_loop';

/**
 * One measurement point of a preset report. Optional fields are the ones
 * that do not apply to every phase and are written blank when absent.
 */
export interface ReportRow {
  phase: ReportPhase;
  profile: string;
  url: string;
  timestamp: string;
  /** Tested concurrency for sweep rows, the concurrency cap for open-loop rows. */
  concurrency: number;
  totalRequests?: number;
  openDurationSec?: number;
  /** Warmup requests for sweep rows, warmup seconds for open-loop rows. */
  warmup: number;
  repeat: number;
  openTargetRps?: number;
  throughputRps: number;
  p50Ms: number;
  p90Ms: number;
  p99Ms: number;
  /** Mean failures per run. */
  errors: number;
}

/**
 * Report columns in file order, mapped to the row field they come from.
 */
export const REPORT_COLUMNS: ReadonlyArray<readonly [string, keyof ReportRow]> = [
  ['phase', 'phase'],
  ['profile', 'profile'],
  ['url', 'url'],
  ['timestamp', 'timestamp'],
  ['concurrency', 'concurrency'],
  ['total_requests', 'totalRequests'],
  ['open_duration_sec', 'openDurationSec'],
  ['warmup', 'warmup'],
  ['repeat', 'repeat'],
  ['open_target_rps', 'openTargetRps'],
  ['throughput_rps', 'throughputRps'],
  ['p50_ms', 'p50Ms'],
  ['p90_ms', 'p90Ms'],
  ['p99_ms', 'p99Ms'],
  ['errors', 'errors'],
];

function escapeCsvField(value: string | number | undefined): string {
  if (value === undefined) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Renders report rows as CSV with a header line. Lines end in `\r\n`.
 */
export function toCsv(rows: readonly ReportRow[]): string {
  const header = REPORT_COLUMNS.map(([column]) => column).join(',');
  const lines = rows.map((row) =>
    REPORT_COLUMNS.map(([, key]) => escapeCsvField(row[key])).join(','),
  );
  return [header, ...lines].map((line) => `${line}\r\n`).join('');
}

function toSheetRecords(
  rows: readonly ReportRow[],
): Record<string, string | number>[] {
  return rows.map((row) => {
    const record: Record<string, string | number> = {};
    for (const [column, key] of REPORT_COLUMNS) {
      record[column] = row[key] ?? '';
    }
    return record;
  });
}

/**
 * Default CSV name for a preset run: `preset_{profile}_{unixSeconds}.csv`.
 */
export function defaultReportPath(profile: string, now: Date): string {
  return getSafeFileName(
    `preset_${profile}_${Math.floor(now.getTime() / 1000)}.csv`,
  );
}

export interface WriteReportOptions {
  /** Also write an `.xlsx` workbook next to the CSV. */
  xlsx?: boolean;
}

/**
 * Writes report rows to `csvPath`, and optionally a workbook with the same
 * rows at the same path with an `.xlsx` extension.
 * @returns The paths written.
 */
export async function writeReport(
  rows: readonly ReportRow[],
  csvPath: string,
  options: WriteReportOptions = {},
): Promise<string[]> {
  await writeFile(csvPath, toCsv(rows), 'utf-8');
  const written = [csvPath];

  if (options.xlsx) {
    const xlsxPath = csvPath.replace(/\.csv$/i, '') + '.xlsx';
    const wb = xlsx.utils.book_new();
    const ws = xlsx.utils.json_to_sheet(toSheetRecords(rows), {
      header: REPORT_COLUMNS.map(([column]) => column),
    });
    xlsx.utils.book_append_sheet(wb, ws, 'Preset Report');
    xlsx.writeFile(wb, xlsxPath);
    written.push(xlsxPath);
  }

  return written;
}

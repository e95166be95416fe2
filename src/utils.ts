/**
 * Resolves after `ms` milliseconds. Negative values resolve on the next timer tick.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

/**
 * Generates a file name that is safe on Windows, macOS and Linux.
 *
 * Unlike a directory name, path separators are replaced too, so the result
 * always names a single file in the target directory.
 *
 * @example
 * getSafeFileName('preset_smoke_1700000000.csv')
 * // Returns: "preset_smoke_1700000000.csv"
 *
 * @example
 * getSafeFileName('report: run/2')
 * // Returns: "report_run_2"
 */
export function getSafeFileName(input: string): string {
  const safeName = input
    .replace(/[<>:"|?*\x00-\x1f/\\]/g, '-')
    .trim()
    .replace(/^\.+|\.+$/g, '')
    .replace(/[\s-]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/[^a-zA-Z0-9._-]/g, '_')
    .slice(0, 200);

  if (!safeName || safeName === '_') {
    return '_unnamed';
  }
  return safeName;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formats a date as a local `YYYY-MM-DDTHH:mm:ss` timestamp (no zone, no milliseconds).
 */
export function formatLocalTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

export function requireNonNegativeInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

export function requirePositiveNumber(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive number, got ${value}`);
  }
}

export function requireNonNegativeNumber(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative number, got ${value}`);
  }
}
